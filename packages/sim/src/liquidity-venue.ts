/**
 * SimLiquidityVenue — Two-token pool with deferred settlement.
 *
 * Requests escrow the owner's tokens and return a key. Nothing happens
 * to the pool until an outside party (a test, the devnet keeper) calls
 * `execute(key)` or `cancel(key)`; the venue then notifies the owner's
 * registered LiquidityCallbackHandler.
 *
 * Pricing:
 * - Adds mint LP at the pool's oracle value: valueIn × lpSupply / poolValue
 * - Removes return reserves pro rata: reserve × lpAmt / lpSupply
 * - `haircutBps` on execute shaves the output, to model adverse settlement
 * - Output under the request's minimum cancels instead of executing
 */

import { BPS_DENOMINATOR, mulDiv, pow10 } from "@levyield/math";
import type {
  AddLiquidityRequest,
  Address,
  CallbackOutcome,
  LiquidityCallbackHandler,
  LiquidityVenue,
  PoolState,
  PriceOracle,
  RemoveLiquidityRequest,
  RequestKey,
  TokenRef,
} from "@levyield/types";
import { SimError } from "./errors.js";
import type { InMemoryTokenBank } from "./token-bank.js";

// =============================================================================
// Types
// =============================================================================

export type PendingLiquidityRequest =
  | { readonly key: RequestKey; readonly kind: "add"; readonly request: AddLiquidityRequest }
  | { readonly key: RequestKey; readonly kind: "remove"; readonly request: RemoveLiquidityRequest };

export interface SettlementOptions {
  /** Reduce the settled output by this many basis points. Default: 0 */
  readonly haircutBps?: bigint;
}

export interface Settlement {
  readonly key: RequestKey;
  readonly kind: "add" | "remove";
  readonly status: "executed" | "cancelled";
  readonly lpOut: bigint;
  readonly tokenAOut: bigint;
  readonly tokenBOut: bigint;
  /** What the owner's callback handler did with the notification */
  readonly callback: CallbackOutcome;
}

export interface SimLiquidityVenueConfig {
  readonly address: Address;
  readonly lpToken: TokenRef;
  readonly tokenA: TokenRef;
  readonly tokenB: TokenRef;
}

// =============================================================================
// Venue
// =============================================================================

export class SimLiquidityVenue implements LiquidityVenue {
  readonly address: Address;
  readonly lpToken: Address;
  readonly tokenA: Address;
  readonly tokenB: Address;

  private readonly decimalsA: number;
  private readonly decimalsB: number;
  private reserveA = 0n;
  private reserveB = 0n;
  private lpSupply = 0n;
  private nonce = 0;
  private readonly pending = new Map<RequestKey, PendingLiquidityRequest>();
  private readonly handlers = new Map<Address, LiquidityCallbackHandler>();

  constructor(
    private readonly bank: InMemoryTokenBank,
    private readonly oracle: PriceOracle,
    config: SimLiquidityVenueConfig,
  ) {
    this.address = config.address;
    this.lpToken = config.lpToken.address;
    this.tokenA = config.tokenA.address;
    this.tokenB = config.tokenB.address;
    this.decimalsA = config.tokenA.decimals;
    this.decimalsB = config.tokenB.decimals;
  }

  // ─── LiquidityVenue ─────────────────────────────────────────────────

  async poolState(): Promise<PoolState> {
    return { reserveA: this.reserveA, reserveB: this.reserveB, lpSupply: this.lpSupply };
  }

  async requestAddLiquidity(request: AddLiquidityRequest): Promise<RequestKey> {
    if (request.tokenAAmt < 0n || request.tokenBAmt < 0n || request.tokenAAmt + request.tokenBAmt === 0n) {
      throw new SimError("INVALID_AMOUNT", "Add liquidity needs a positive amount of tokenA or tokenB");
    }
    await this.bank.transfer(this.tokenA, request.owner, this.address, request.tokenAAmt);
    await this.bank.transfer(this.tokenB, request.owner, this.address, request.tokenBAmt);

    const key = this.nextKey();
    this.pending.set(key, { key, kind: "add", request });
    return key;
  }

  async requestRemoveLiquidity(request: RemoveLiquidityRequest): Promise<RequestKey> {
    if (request.lpAmt <= 0n) {
      throw new SimError("INVALID_AMOUNT", `Remove liquidity needs a positive LP amount, got ${request.lpAmt}`);
    }
    await this.bank.transfer(this.lpToken, request.owner, this.address, request.lpAmt);

    const key = this.nextKey();
    this.pending.set(key, { key, kind: "remove", request });
    return key;
  }

  // ─── Settlement ─────────────────────────────────────────────────────

  /**
   * Settle a pending request and notify its owner.
   */
  async execute(key: RequestKey, options: SettlementOptions = {}): Promise<Settlement> {
    const entry = this.take(key);
    const haircut = options.haircutBps ?? 0n;

    if (entry.kind === "add") {
      const { request } = entry;
      const handler = this.handlerFor(request.owner);
      const valueIn = await this.valueOf(request.tokenAAmt, request.tokenBAmt);
      const poolValue = await this.valueOf(this.reserveA, this.reserveB);
      const fairLp = this.lpSupply === 0n ? valueIn : mulDiv(valueIn, this.lpSupply, poolValue);
      const lpOut = shave(fairLp, haircut);

      if (lpOut === 0n || lpOut < request.minLpOut) {
        return this.refundAdd(entry, handler);
      }

      this.reserveA += request.tokenAAmt;
      this.reserveB += request.tokenBAmt;
      this.lpSupply += lpOut;
      this.bank.mint(this.lpToken, request.owner, lpOut);

      const callback = await handler.afterAddLiquidityExecution(key, lpOut);
      return { key, kind: "add", status: "executed", lpOut, tokenAOut: 0n, tokenBOut: 0n, callback };
    }

    const { request } = entry;
    const handler = this.handlerFor(request.owner);
    const tokenAOut = shave(mulDiv(this.reserveA, request.lpAmt, this.lpSupply), haircut);
    const tokenBOut = shave(mulDiv(this.reserveB, request.lpAmt, this.lpSupply), haircut);

    if (tokenAOut < request.minTokenAOut || tokenBOut < request.minTokenBOut) {
      return this.refundRemove(entry, handler);
    }

    this.bank.burn(this.lpToken, this.address, request.lpAmt);
    this.lpSupply -= request.lpAmt;
    this.reserveA -= tokenAOut;
    this.reserveB -= tokenBOut;
    await this.bank.transfer(this.tokenA, this.address, request.owner, tokenAOut);
    await this.bank.transfer(this.tokenB, this.address, request.owner, tokenBOut);

    const callback = await handler.afterRemoveLiquidityExecution(key, tokenAOut, tokenBOut);
    return { key, kind: "remove", status: "executed", lpOut: 0n, tokenAOut, tokenBOut, callback };
  }

  /**
   * Cancel a pending request, returning the escrow to its owner.
   */
  async cancel(key: RequestKey): Promise<Settlement> {
    const entry = this.take(key);
    const handler = this.handlerFor(entry.request.owner);
    return entry.kind === "add"
      ? this.refundAdd(entry, handler)
      : this.refundRemove(entry, handler);
  }

  // ─── Simulation controls ────────────────────────────────────────────

  registerHandler(owner: Address, handler: LiquidityCallbackHandler): void {
    this.handlers.set(owner, handler);
  }

  /**
   * Seed reserves and LP supply. LP is minted to `holder`.
   */
  seed(reserveA: bigint, reserveB: bigint, lpSupply: bigint, holder: Address): void {
    this.bank.mint(this.tokenA, this.address, reserveA);
    this.bank.mint(this.tokenB, this.address, reserveB);
    this.bank.mint(this.lpToken, holder, lpSupply);
    this.reserveA += reserveA;
    this.reserveB += reserveB;
    this.lpSupply += lpSupply;
  }

  pendingRequests(): readonly PendingLiquidityRequest[] {
    return [...this.pending.values()];
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private nextKey(): RequestKey {
    this.nonce += 1;
    return `${this.address}:${this.nonce}`;
  }

  private take(key: RequestKey): PendingLiquidityRequest {
    const entry = this.pending.get(key);
    if (entry === undefined) {
      throw new SimError("UNKNOWN_REQUEST", `No pending request ${key}`);
    }
    this.pending.delete(key);
    return entry;
  }

  private handlerFor(owner: Address): LiquidityCallbackHandler {
    const handler = this.handlers.get(owner);
    if (handler === undefined) {
      throw new SimError("NO_CALLBACK_HANDLER", `No callback handler registered for ${owner}`);
    }
    return handler;
  }

  private async refundAdd(
    entry: Extract<PendingLiquidityRequest, { kind: "add" }>,
    handler: LiquidityCallbackHandler,
  ): Promise<Settlement> {
    const { request } = entry;
    await this.bank.transfer(this.tokenA, this.address, request.owner, request.tokenAAmt);
    await this.bank.transfer(this.tokenB, this.address, request.owner, request.tokenBAmt);
    const callback = await handler.afterAddLiquidityCancellation(entry.key);
    return { key: entry.key, kind: "add", status: "cancelled", lpOut: 0n, tokenAOut: 0n, tokenBOut: 0n, callback };
  }

  private async refundRemove(
    entry: Extract<PendingLiquidityRequest, { kind: "remove" }>,
    handler: LiquidityCallbackHandler,
  ): Promise<Settlement> {
    await this.bank.transfer(this.lpToken, this.address, entry.request.owner, entry.request.lpAmt);
    const callback = await handler.afterRemoveLiquidityCancellation(entry.key);
    return { key: entry.key, kind: "remove", status: "cancelled", lpOut: 0n, tokenAOut: 0n, tokenBOut: 0n, callback };
  }

  private async valueOf(amountA: bigint, amountB: bigint): Promise<bigint> {
    const priceA = await this.oracle.consultIn18Decimals(this.tokenA);
    const priceB = await this.oracle.consultIn18Decimals(this.tokenB);
    return (
      mulDiv(amountA, priceA, pow10(this.decimalsA)) +
      mulDiv(amountB, priceB, pow10(this.decimalsB))
    );
  }
}

function shave(amount: bigint, haircutBps: bigint): bigint {
  return mulDiv(amount, BPS_DENOMINATOR - haircutBps, BPS_DENOMINATOR);
}
