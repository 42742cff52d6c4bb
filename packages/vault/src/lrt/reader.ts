/**
 * LrtReader — derived accounting for the LRT vault.
 *
 * Asset is the tracked LRT, debt is the wrapped-native loan. Delta is
 * measured in the borrow token: the LRT amount is converted into
 * wrapped native before the debt is netted off.
 */

import { abs, mulDiv, SAFE_MULTIPLIER, subOrZero } from "@levyield/math";
import type { HealthParams, VaultMetrics } from "@levyield/types";
import type { OperationKernel } from "../base-vault.js";
import { svTokenValue } from "../fees.js";
import type { LrtStore, LrtVaultConfig } from "./types.js";

export interface LrtAccounts {
  readonly lrtAmt: bigint;
  /** LRT expressed in the borrow token */
  readonly assetAmt: bigint;
  readonly debtAmt: bigint;
  readonly assetValue: bigint;
  readonly debtValue: bigint;
  readonly equityValue: bigint;
}

export class LrtReader {
  constructor(
    private readonly kernel: OperationKernel,
    private readonly config: LrtVaultConfig,
    private readonly store: LrtStore,
  ) {}

  async accounts(): Promise<LrtAccounts> {
    const oracle = this.kernel.oracle;
    const base = this.kernel.wrappedNative;
    const lrtAmt = this.store.lrtAmt;

    const assetValue = await oracle.valueOf(this.config.lrt, lrtAmt);
    const debtAmt = await this.config.lending.maxRepay(this.kernel.address);
    const debtValue = await oracle.valueOf(base, debtAmt);

    return {
      lrtAmt,
      assetAmt: await oracle.amountOf(base, assetValue),
      debtAmt,
      assetValue,
      debtValue,
      equityValue: subOrZero(assetValue, debtValue),
    };
  }

  async assetValue(): Promise<bigint> {
    return (await this.accounts()).assetValue;
  }

  async debtValue(): Promise<bigint> {
    return (await this.accounts()).debtValue;
  }

  async equityValue(): Promise<bigint> {
    return (await this.accounts()).equityValue;
  }

  async debtRatio(): Promise<bigint> {
    const { assetValue, debtValue } = await this.accounts();
    return assetValue === 0n ? 0n : mulDiv(debtValue, SAFE_MULTIPLIER, assetValue);
  }

  async leverage(): Promise<bigint> {
    const { assetValue, equityValue } = await this.accounts();
    return equityValue === 0n ? 0n : mulDiv(assetValue, SAFE_MULTIPLIER, equityValue);
  }

  async delta(): Promise<bigint> {
    return this.deltaOf(await this.accounts());
  }

  /** available × 1e18 / (leverage − 1), in USD. */
  async additionalCapacity(): Promise<bigint> {
    const available = await this.kernel.oracle.valueOf(
      this.kernel.wrappedNative,
      await this.config.lending.totalAvailableAsset(),
    );
    return mulDiv(available, SAFE_MULTIPLIER, this.kernel.state.params.leverage - SAFE_MULTIPLIER);
  }

  async capacity(): Promise<bigint> {
    return (await this.additionalCapacity()) + (await this.equityValue());
  }

  async health(): Promise<HealthParams> {
    const accounts = await this.accounts();
    return {
      equityValue: accounts.equityValue,
      debtRatio: accounts.assetValue === 0n
        ? 0n
        : mulDiv(accounts.debtValue, SAFE_MULTIPLIER, accounts.assetValue),
      delta: await this.deltaOf(accounts),
      positionAmt: accounts.lrtAmt,
      svTokenValue: this.svTokenValueOf(accounts.equityValue),
    };
  }

  async metrics(): Promise<VaultMetrics> {
    const accounts = await this.accounts();
    const health = await this.health();
    const additionalCapacity = await this.additionalCapacity();
    const totalSupply = this.kernel.shares.totalSupply();
    return {
      status: this.kernel.state.status,
      assetValue: accounts.assetValue,
      debtValue: accounts.debtValue,
      equityValue: accounts.equityValue,
      debtRatio: health.debtRatio,
      leverage: accounts.equityValue === 0n
        ? 0n
        : mulDiv(accounts.assetValue, SAFE_MULTIPLIER, accounts.equityValue),
      delta: health.delta,
      svTokenValue: health.svTokenValue,
      pendingFee: this.kernel.supplyWithFee() - totalSupply,
      totalSupply,
      positionAmt: accounts.lrtAmt,
      additionalCapacity,
      capacity: additionalCapacity + accounts.equityValue,
    };
  }

  private async deltaOf(accounts: LrtAccounts): Promise<bigint> {
    const { assetAmt, debtAmt, equityValue } = accounts;
    if (equityValue === 0n || (assetAmt === 0n && debtAmt === 0n)) return 0n;
    const net = assetAmt - debtAmt;
    const magnitude = mulDiv(
      await this.kernel.oracle.valueOf(this.kernel.wrappedNative, abs(net)),
      SAFE_MULTIPLIER,
      equityValue,
    );
    return net < 0n ? -magnitude : magnitude;
  }

  private svTokenValueOf(equityValue: bigint): bigint {
    const supply = this.kernel.supplyWithFee();
    return supply === 0n ? 0n : svTokenValue(equityValue, supply);
  }
}
