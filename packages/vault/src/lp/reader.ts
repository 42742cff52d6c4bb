/**
 * LpReader — derived accounting for the LP vault.
 *
 * Every public method reads the venue, the lending pools and the oracle
 * once through `accounts()`; values are never stored.
 *
 *   assetAmt   = reserve × lpAmt / lpSupply            (per token)
 *   equity     = max(0, assetValue − debtValue)
 *   debtRatio  = debtValue × 1e18 / assetValue
 *   leverage   = assetValue × 1e18 / equity
 *   delta      = (assetAmtA − debtAmtA) × priceA / equity   (signed)
 */

import { abs, checkedSub, minBigInt, mulDiv, SAFE_MULTIPLIER, subOrZero } from "@levyield/math";
import type { HealthParams, PoolState, VaultMetrics } from "@levyield/types";
import type { OperationKernel } from "../base-vault.js";
import { svTokenValue } from "../fees.js";
import type { LpStore, LpVaultConfig, TokenPair } from "./types.js";

/**
 * One consistent read of everything the formulas need.
 */
export interface LpAccounts {
  readonly pool: PoolState;
  readonly lpAmt: bigint;
  readonly assetAmt: TokenPair;
  readonly debtAmt: TokenPair;
  readonly assetValue: bigint;
  readonly debtValue: bigint;
  readonly equityValue: bigint;
  /** USD value of one LP token (1e18) */
  readonly lpTokenValue: bigint;
  /** Reserve value weights, summing to ~1e18 */
  readonly weights: TokenPair;
}

export class LpReader {
  constructor(
    private readonly kernel: OperationKernel,
    private readonly config: LpVaultConfig,
    private readonly store: LpStore,
  ) {}

  /** @param lpAmt - position to value; defaults to the tracked amount */
  async accounts(lpAmt: bigint = this.store.lpAmt): Promise<LpAccounts> {
    const { tokenA, tokenB, lendingA, lendingB, venue } = this.config;
    const oracle = this.kernel.oracle;
    const pool = await venue.poolState();

    const reserveValueA = await oracle.valueOf(tokenA, pool.reserveA);
    const reserveValueB = await oracle.valueOf(tokenB, pool.reserveB);
    const poolValue = reserveValueA + reserveValueB;

    const assetAmt: TokenPair = pool.lpSupply === 0n
      ? { tokenA: 0n, tokenB: 0n }
      : {
          tokenA: mulDiv(pool.reserveA, lpAmt, pool.lpSupply),
          tokenB: mulDiv(pool.reserveB, lpAmt, pool.lpSupply),
        };
    const debtAmt: TokenPair = {
      tokenA: await lendingA.maxRepay(this.kernel.address),
      tokenB: await lendingB.maxRepay(this.kernel.address),
    };

    const assetValue =
      (await oracle.valueOf(tokenA, assetAmt.tokenA)) + (await oracle.valueOf(tokenB, assetAmt.tokenB));
    const debtValue =
      (await oracle.valueOf(tokenA, debtAmt.tokenA)) + (await oracle.valueOf(tokenB, debtAmt.tokenB));

    return {
      pool,
      lpAmt,
      assetAmt,
      debtAmt,
      assetValue,
      debtValue,
      equityValue: subOrZero(assetValue, debtValue),
      lpTokenValue: pool.lpSupply === 0n ? 0n : mulDiv(poolValue, SAFE_MULTIPLIER, pool.lpSupply),
      weights: poolValue === 0n
        ? { tokenA: 0n, tokenB: 0n }
        : {
            tokenA: mulDiv(reserveValueA, SAFE_MULTIPLIER, poolValue),
            tokenB: mulDiv(reserveValueB, SAFE_MULTIPLIER, poolValue),
          },
    };
  }

  // ─── Single values ──────────────────────────────────────────────────

  async lpTokenValue(): Promise<bigint> {
    return (await this.accounts()).lpTokenValue;
  }

  async tokenWeights(): Promise<TokenPair> {
    return (await this.accounts()).weights;
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

  async leverage(): Promise<bigint> {
    return leverageOf(await this.accounts());
  }

  async debtRatio(): Promise<bigint> {
    return debtRatioOf(await this.accounts());
  }

  async delta(): Promise<bigint> {
    return this.deltaOf(await this.accounts());
  }

  async additionalCapacity(): Promise<bigint> {
    return this.additionalCapacityOf(await this.accounts());
  }

  async capacity(): Promise<bigint> {
    const accounts = await this.accounts();
    return (await this.additionalCapacityOf(accounts)) + accounts.equityValue;
  }

  // ─── Snapshots ──────────────────────────────────────────────────────

  async health(lpAmt: bigint = this.store.lpAmt): Promise<HealthParams> {
    const accounts = await this.accounts(lpAmt);
    return {
      equityValue: accounts.equityValue,
      debtRatio: debtRatioOf(accounts),
      delta: await this.deltaOf(accounts),
      positionAmt: accounts.lpAmt,
      svTokenValue: this.svTokenValueOf(accounts.equityValue),
    };
  }

  async metrics(): Promise<VaultMetrics> {
    const accounts = await this.accounts();
    const additionalCapacity = await this.additionalCapacityOf(accounts);
    const totalSupply = this.kernel.shares.totalSupply();
    return {
      status: this.kernel.state.status,
      assetValue: accounts.assetValue,
      debtValue: accounts.debtValue,
      equityValue: accounts.equityValue,
      debtRatio: debtRatioOf(accounts),
      leverage: leverageOf(accounts),
      delta: await this.deltaOf(accounts),
      svTokenValue: this.svTokenValueOf(accounts.equityValue),
      pendingFee: this.kernel.supplyWithFee() - totalSupply,
      totalSupply,
      positionAmt: accounts.lpAmt,
      additionalCapacity,
      capacity: additionalCapacity + accounts.equityValue,
    };
  }

  // ─── Formulas ───────────────────────────────────────────────────────

  private async deltaOf(accounts: LpAccounts): Promise<bigint> {
    const { assetAmt, debtAmt, equityValue } = accounts;
    if (equityValue === 0n) return 0n;
    if (assetAmt.tokenA === 0n && debtAmt.tokenA === 0n) return 0n;

    const net = assetAmt.tokenA - debtAmt.tokenA;
    const magnitude = mulDiv(
      await this.kernel.oracle.valueOf(this.config.tokenA, abs(net)),
      SAFE_MULTIPLIER,
      equityValue,
    );
    return net < 0n ? -magnitude : magnitude;
  }

  /**
   * Equity the lending pools can still lever up.
   *
   * Neutral borrows tokenA for its whole pool weight and tokenB for the
   * rest of the position less the equity, so per unit of equity:
   *   A: leverage × wA      B: leverage × wB − 1
   * The binding token is the smaller quotient. The B term throws
   * UNDERFLOW when leverage × wB < 1.
   *
   * Long borrows tokenB only: available × 1e18 / (leverage − 1).
   */
  private async additionalCapacityOf(accounts: LpAccounts): Promise<bigint> {
    const { tokenA, tokenB, lendingA, lendingB } = this.config;
    const { leverage, delta } = this.kernel.state.params;
    const oracle = this.kernel.oracle;

    const availableB = await oracle.valueOf(tokenB, await lendingB.totalAvailableAsset());

    if (delta === "Long") {
      return mulDiv(availableB, SAFE_MULTIPLIER, leverage - SAFE_MULTIPLIER);
    }

    const availableA = await oracle.valueOf(tokenA, await lendingA.totalAvailableAsset());
    const perEquityA = mulDiv(leverage, accounts.weights.tokenA, SAFE_MULTIPLIER);
    const perEquityB = checkedSub(mulDiv(leverage, accounts.weights.tokenB, SAFE_MULTIPLIER), SAFE_MULTIPLIER);

    // A zero per-equity borrow leaves that token unconstrained
    if (perEquityB === 0n) return mulDiv(availableA, SAFE_MULTIPLIER, perEquityA);
    if (perEquityA === 0n) return mulDiv(availableB, SAFE_MULTIPLIER, perEquityB);
    return minBigInt(
      mulDiv(availableA, SAFE_MULTIPLIER, perEquityA),
      mulDiv(availableB, SAFE_MULTIPLIER, perEquityB),
    );
  }

  private svTokenValueOf(equityValue: bigint): bigint {
    const supply = this.kernel.supplyWithFee();
    return supply === 0n ? 0n : svTokenValue(equityValue, supply);
  }
}

function debtRatioOf(accounts: LpAccounts): bigint {
  if (accounts.assetValue === 0n) return 0n;
  return mulDiv(accounts.debtValue, SAFE_MULTIPLIER, accounts.assetValue);
}

function leverageOf(accounts: LpAccounts): bigint {
  if (accounts.equityValue === 0n) return 0n;
  return mulDiv(accounts.assetValue, SAFE_MULTIPLIER, accounts.equityValue);
}
