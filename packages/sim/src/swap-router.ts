/**
 * OracleSwapRouter — Swaps priced by the oracle instead of a curve.
 *
 * Output is the oracle value of the input, converted into the output
 * token, less `feeBps`. The router trades from its own inventory, which
 * must be seeded through the bank; an empty inventory fails the swap
 * with INSUFFICIENT_BALANCE.
 *
 *   amountOut = valueOf(tokenIn, amountIn) → tokenOut units × (1 − fee)
 *   amountIn  = ⌈ amountOut / (1 − fee) ⌉ → tokenIn units, rounded up
 */

import { BPS_DENOMINATOR, mulDiv, pow10 } from "@levyield/math";
import type {
  Address,
  Clock,
  PriceOracle,
  SwapExactInParams,
  SwapExactOutParams,
  SwapGateway,
  TokenRef,
} from "@levyield/types";
import { SimError } from "./errors.js";
import type { InMemoryTokenBank } from "./token-bank.js";

export class OracleSwapRouter implements SwapGateway {
  private readonly decimals = new Map<Address, number>();

  constructor(
    private readonly bank: InMemoryTokenBank,
    private readonly oracle: PriceOracle,
    private readonly clock: Clock,
    readonly address: Address,
    tokens: readonly TokenRef[],
    public feeBps = 0n,
  ) {
    for (const token of tokens) {
      this.decimals.set(token.address, token.decimals);
    }
  }

  async swapExactIn(params: SwapExactInParams): Promise<bigint> {
    this.assertSwappable(params.tokenIn, params.tokenOut, params.deadline);

    const gross = await this.convert(params.tokenIn, params.tokenOut, params.amountIn, "down");
    const amountOut = mulDiv(gross, BPS_DENOMINATOR - this.feeBps, BPS_DENOMINATOR);
    if (amountOut < params.minAmountOut) {
      throw new SimError(
        "SLIPPAGE_EXCEEDED",
        `Swap returns ${amountOut} ${params.tokenOut}, minimum ${params.minAmountOut}`,
      );
    }

    await this.settle(params.payer, params.tokenIn, params.amountIn, params.tokenOut, amountOut);
    return amountOut;
  }

  async swapExactOut(params: SwapExactOutParams): Promise<bigint> {
    this.assertSwappable(params.tokenIn, params.tokenOut, params.deadline);

    const gross = mulDiv(params.amountOut, BPS_DENOMINATOR, BPS_DENOMINATOR - this.feeBps, "up");
    const amountIn = await this.convert(params.tokenOut, params.tokenIn, gross, "up");
    if (amountIn > params.maxAmountIn) {
      throw new SimError(
        "SLIPPAGE_EXCEEDED",
        `Swap needs ${amountIn} ${params.tokenIn}, maximum ${params.maxAmountIn}`,
      );
    }

    await this.settle(params.payer, params.tokenIn, amountIn, params.tokenOut, params.amountOut);
    return amountIn;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private assertSwappable(tokenIn: Address, tokenOut: Address, deadline: number): void {
    if (tokenIn === tokenOut) {
      throw new SimError("SAME_TOKEN", `Cannot swap ${tokenIn} for itself`);
    }
    if (deadline < this.clock.now()) {
      throw new SimError("DEADLINE_EXPIRED", `Deadline ${deadline} passed at ${this.clock.now()}`);
    }
  }

  private async convert(
    from: Address,
    to: Address,
    amount: bigint,
    rounding: "down" | "up",
  ): Promise<bigint> {
    const priceFrom = await this.oracle.consultIn18Decimals(from);
    const priceTo = await this.oracle.consultIn18Decimals(to);
    const value = mulDiv(amount, priceFrom, pow10(this.decimalsOf(from)), rounding);
    return mulDiv(value, pow10(this.decimalsOf(to)), priceTo, rounding);
  }

  private decimalsOf(token: Address): number {
    const decimals = this.decimals.get(token);
    if (decimals === undefined) {
      throw new SimError("UNKNOWN_TOKEN", `Router does not list ${token}`);
    }
    return decimals;
  }

  private async settle(
    payer: Address,
    tokenIn: Address,
    amountIn: bigint,
    tokenOut: Address,
    amountOut: bigint,
  ): Promise<void> {
    const inventory = this.bank.balanceSync(tokenOut, this.address);
    if (inventory < amountOut) {
      throw new SimError(
        "INSUFFICIENT_BALANCE",
        `Router holds ${inventory} ${tokenOut}, swap needs ${amountOut}`,
      );
    }
    await this.bank.transfer(tokenIn, payer, this.address, amountIn);
    await this.bank.transfer(tokenOut, this.address, payer, amountOut);
  }
}
