/**
 * TradeManager — swap and lending primitives shared by both variants.
 *
 * Every primitive is a no-op for a zero amount; flows call them
 * unconditionally and rely on that.
 */

import { applySlippage, inflateBySlippage } from "@levyield/math";
import type { Address, Clock, LendingPool, SwapGateway, TokenRef } from "@levyield/types";
import type { OracleAdapter } from "./oracle-adapter.js";

export interface TradeManagerDeps {
  readonly address: Address;
  readonly swap: SwapGateway;
  readonly oracle: OracleAdapter;
  readonly clock: Clock;
  readonly deadlineSeconds: () => number;
}

export class TradeManager {
  constructor(private readonly deps: TradeManagerDeps) {}

  // ─── Bounds ─────────────────────────────────────────────────────────

  /**
   * Oracle-equivalent output of `amountIn`, reduced by `slippage` bps.
   */
  async calcMinAmountOut(
    tokenIn: TokenRef,
    tokenOut: TokenRef,
    amountIn: bigint,
    slippage: bigint,
  ): Promise<bigint> {
    return applySlippage(await this.deps.oracle.convert(tokenIn, tokenOut, amountIn), slippage);
  }

  /**
   * Oracle-equivalent input for `amountOut`, inflated by `slippage` bps.
   */
  async calcAmountInMaximum(
    tokenIn: TokenRef,
    tokenOut: TokenRef,
    amountOut: bigint,
    slippage: bigint,
  ): Promise<bigint> {
    const value = await this.deps.oracle.valueOf(tokenOut, amountOut);
    const amountIn = await this.deps.oracle.amountOf(tokenIn, value);
    return inflateBySlippage(amountIn, slippage);
  }

  // ─── Swaps ──────────────────────────────────────────────────────────

  async swapExactIn(
    tokenIn: TokenRef,
    tokenOut: TokenRef,
    amountIn: bigint,
    slippage: bigint,
  ): Promise<bigint> {
    if (amountIn === 0n) return 0n;
    return this.deps.swap.swapExactIn({
      payer: this.deps.address,
      tokenIn: tokenIn.address,
      tokenOut: tokenOut.address,
      amountIn,
      minAmountOut: await this.calcMinAmountOut(tokenIn, tokenOut, amountIn, slippage),
      deadline: this.deadline(),
    });
  }

  /** @returns amount of `tokenIn` spent */
  async swapExactOut(
    tokenIn: TokenRef,
    tokenOut: TokenRef,
    amountOut: bigint,
    slippage: bigint,
  ): Promise<bigint> {
    if (amountOut === 0n) return 0n;
    return this.deps.swap.swapExactOut({
      payer: this.deps.address,
      tokenIn: tokenIn.address,
      tokenOut: tokenOut.address,
      amountOut,
      maxAmountIn: await this.calcAmountInMaximum(tokenIn, tokenOut, amountOut, slippage),
      deadline: this.deadline(),
    });
  }

  // ─── Lending ────────────────────────────────────────────────────────

  async borrow(pool: LendingPool, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    await pool.borrow(this.deps.address, amount);
  }

  async repay(pool: LendingPool, amount: bigint): Promise<void> {
    if (amount === 0n) return;
    await pool.repay(this.deps.address, amount);
  }

  private deadline(): number {
    return this.deps.clock.now() + this.deps.deadlineSeconds();
  }
}
