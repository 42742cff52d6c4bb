/**
 * LpManager — borrow, repay and venue requests for the LP vault.
 */

import { applySlippage, checkedSub, mulDiv, SAFE_MULTIPLIER, subOrZero } from "@levyield/math";
import type { RequestKey } from "@levyield/types";
import type { OperationKernel } from "../base-vault.js";
import type { LpReader } from "./reader.js";
import type { LpVaultConfig, TokenPair } from "./types.js";

export class LpManager {
  constructor(
    private readonly kernel: OperationKernel,
    private readonly config: LpVaultConfig,
    private readonly reader: LpReader,
  ) {}

  // ─── Amounts ────────────────────────────────────────────────────────

  /**
   * Borrow amounts that lever `depositValue` to the target leverage.
   *
   *   position = depositValue × leverage / 1e18
   *   borrow   = position − depositValue
   *
   * Neutral borrows tokenA for the position's tokenA weight and tokenB
   * for the remainder; Long borrows tokenB only.
   */
  async calcBorrow(depositValue: bigint): Promise<TokenPair> {
    const { tokenA, tokenB } = this.config;
    const { leverage, delta } = this.kernel.state.params;
    const oracle = this.kernel.oracle;

    const positionValue = mulDiv(depositValue, leverage, SAFE_MULTIPLIER);
    const borrowValue = positionValue - depositValue;

    if (delta === "Long") {
      return { tokenA: 0n, tokenB: await oracle.amountOf(tokenB, borrowValue) };
    }

    const { weights } = await this.reader.accounts();
    const borrowValueA = mulDiv(positionValue, weights.tokenA, SAFE_MULTIPLIER);
    const borrowValueB = checkedSub(borrowValue, borrowValueA);
    return {
      tokenA: await oracle.amountOf(tokenA, borrowValueA),
      tokenB: await oracle.amountOf(tokenB, borrowValueB),
    };
  }

  /** Current debt × shareRatio / 1e18, per token. */
  async calcRepay(shareRatio: bigint): Promise<TokenPair> {
    const { debtAmt } = await this.reader.accounts();
    return {
      tokenA: mulDiv(debtAmt.tokenA, shareRatio, SAFE_MULTIPLIER),
      tokenB: mulDiv(debtAmt.tokenB, shareRatio, SAFE_MULTIPLIER),
    };
  }

  async calcMinLpOut(amounts: TokenPair, slippage: bigint): Promise<bigint> {
    const { lpTokenValue } = await this.reader.accounts();
    const oracle = this.kernel.oracle;
    const valueIn =
      (await oracle.valueOf(this.config.tokenA, amounts.tokenA)) +
      (await oracle.valueOf(this.config.tokenB, amounts.tokenB));
    const fairLp = lpTokenValue === 0n ? valueIn : mulDiv(valueIn, SAFE_MULTIPLIER, lpTokenValue);
    return applySlippage(fairLp, slippage);
  }

  async calcMinTokensOut(lpAmt: bigint, slippage: bigint): Promise<TokenPair> {
    const { pool } = await this.reader.accounts();
    if (pool.lpSupply === 0n) return { tokenA: 0n, tokenB: 0n };
    return {
      tokenA: applySlippage(mulDiv(pool.reserveA, lpAmt, pool.lpSupply), slippage),
      tokenB: applySlippage(mulDiv(pool.reserveB, lpAmt, pool.lpSupply), slippage),
    };
  }

  // ─── Lending ────────────────────────────────────────────────────────

  async borrow(amounts: TokenPair): Promise<void> {
    await this.kernel.trade.borrow(this.config.lendingA, amounts.tokenA);
    await this.kernel.trade.borrow(this.config.lendingB, amounts.tokenB);
  }

  async repay(amounts: TokenPair): Promise<void> {
    await this.kernel.trade.repay(this.config.lendingA, amounts.tokenA);
    await this.kernel.trade.repay(this.config.lendingB, amounts.tokenB);
  }

  /**
   * Cover a shortfall on one side of `repay` by buying exactly the
   * missing amount with the other token.
   *
   * @returns what is left of `available` once `repay` is paid
   */
  async swapForRepay(repay: TokenPair, available: TokenPair, slippage: bigint): Promise<TokenPair> {
    const { tokenA, tokenB } = this.config;
    let a = available.tokenA;
    let b = available.tokenB;

    if (a < repay.tokenA) {
      const shortfall = repay.tokenA - a;
      const spent = await this.kernel.trade.swapExactOut(tokenB, tokenA, shortfall, slippage);
      a += shortfall;
      b = subOrZero(b, spent);
    } else if (b < repay.tokenB) {
      const shortfall = repay.tokenB - b;
      const spent = await this.kernel.trade.swapExactOut(tokenA, tokenB, shortfall, slippage);
      b += shortfall;
      a = subOrZero(a, spent);
    }

    return { tokenA: subOrZero(a, repay.tokenA), tokenB: subOrZero(b, repay.tokenB) };
  }

  // ─── Venue ──────────────────────────────────────────────────────────

  async addLiquidity(amounts: TokenPair, slippage: bigint): Promise<RequestKey> {
    return this.config.venue.requestAddLiquidity({
      owner: this.kernel.address,
      tokenAAmt: amounts.tokenA,
      tokenBAmt: amounts.tokenB,
      minLpOut: await this.calcMinLpOut(amounts, slippage),
    });
  }

  async removeLiquidity(lpAmt: bigint, slippage: bigint): Promise<RequestKey> {
    const minOut = await this.calcMinTokensOut(lpAmt, slippage);
    return this.config.venue.requestRemoveLiquidity({
      owner: this.kernel.address,
      lpAmt,
      minTokenAOut: minOut.tokenA,
      minTokenBOut: minOut.tokenB,
    });
  }

  /** tokenA and tokenB held in custody outside the pool. */
  async idleBalances(): Promise<TokenPair> {
    const { bank, address } = this.kernel;
    return {
      tokenA: await bank.balanceOf(this.config.tokenA.address, address),
      tokenB: await bank.balanceOf(this.config.tokenB.address, address),
    };
  }

  async lpBalance(): Promise<bigint> {
    return this.kernel.bank.balanceOf(this.config.lpToken.address, this.kernel.address);
  }
}
