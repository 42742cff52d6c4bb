/**
 * OracleAdapter — token amounts ⇄ USD values.
 *
 *   value  = amount × price18 / 10^decimals
 *   amount = value × 10^decimals / price18
 *
 * Both round down. Feed failures propagate from the oracle unchanged.
 */

import { mulDiv, pow10 } from "@levyield/math";
import type { PriceOracle, TokenRef } from "@levyield/types";

export class OracleAdapter {
  constructor(private readonly oracle: PriceOracle) {}

  price(token: TokenRef): Promise<bigint> {
    return this.oracle.consultIn18Decimals(token.address);
  }

  async valueOf(token: TokenRef, amount: bigint): Promise<bigint> {
    if (amount === 0n) return 0n;
    return mulDiv(amount, await this.price(token), pow10(token.decimals));
  }

  async amountOf(token: TokenRef, value: bigint): Promise<bigint> {
    if (value === 0n) return 0n;
    return mulDiv(value, pow10(token.decimals), await this.price(token));
  }

  /** Amount of `to` worth `amount` of `from`. */
  async convert(from: TokenRef, to: TokenRef, amount: bigint): Promise<bigint> {
    return this.amountOf(to, await this.valueOf(from, amount));
  }
}
