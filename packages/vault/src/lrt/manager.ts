/**
 * LrtManager — borrow sizing and the base ⇄ LRT swaps.
 */

import { mulDiv, SAFE_MULTIPLIER } from "@levyield/math";
import type { OperationKernel } from "../base-vault.js";
import type { LrtReader } from "./reader.js";
import type { LrtVaultConfig } from "./types.js";

export class LrtManager {
  constructor(
    private readonly kernel: OperationKernel,
    private readonly config: LrtVaultConfig,
    private readonly reader: LrtReader,
  ) {}

  /** Wrapped-native amount that levers `depositValue` to the target. */
  async calcBorrow(depositValue: bigint): Promise<bigint> {
    const positionValue = mulDiv(depositValue, this.kernel.state.params.leverage, SAFE_MULTIPLIER);
    return this.kernel.oracle.amountOf(this.kernel.wrappedNative, positionValue - depositValue);
  }

  async calcRepay(shareRatio: bigint): Promise<bigint> {
    const { debtAmt } = await this.reader.accounts();
    return mulDiv(debtAmt, shareRatio, SAFE_MULTIPLIER);
  }

  async borrow(amount: bigint): Promise<void> {
    await this.kernel.trade.borrow(this.config.lending, amount);
  }

  async repay(amount: bigint): Promise<void> {
    await this.kernel.trade.repay(this.config.lending, amount);
  }

  /** @returns LRT received */
  async buyLrt(baseAmt: bigint, slippage: bigint): Promise<bigint> {
    return this.kernel.trade.swapExactIn(this.kernel.wrappedNative, this.config.lrt, baseAmt, slippage);
  }

  /** @returns wrapped native received */
  async sellLrt(lrtAmt: bigint, slippage: bigint): Promise<bigint> {
    return this.kernel.trade.swapExactIn(this.config.lrt, this.kernel.wrappedNative, lrtAmt, slippage);
  }

  async baseBalance(): Promise<bigint> {
    return this.kernel.bank.balanceOf(this.kernel.wrappedNative.address, this.kernel.address);
  }

  async lrtBalance(): Promise<bigint> {
    return this.kernel.bank.balanceOf(this.config.lrt.address, this.kernel.address);
  }
}
