/**
 * Chain Types
 *
 * Addressing primitives shared by the vault core and its collaborators.
 *
 * Rules:
 * - Addresses are opaque strings (no checksum semantics here)
 * - Token amounts are bigint in the token's native decimals
 * - The native asset is addressed by NATIVE_TOKEN
 */

/**
 * Account or contract address (e.g., "0xVault", "keeper-1").
 */
export type Address = string;

/**
 * Correlation key issued by an external venue for a pending request.
 */
export type RequestKey = string;

/**
 * Pseudo-address of the chain's native asset (ETH on mainnet).
 */
export const NATIVE_TOKEN: Address = "native";

/**
 * Reference to a fungible token.
 */
export interface TokenRef {
  /** Token contract address */
  readonly address: Address;

  /** Token symbol (e.g., "USDC", "WETH") */
  readonly symbol: string;

  /** Decimal places of raw amounts */
  readonly decimals: number;
}

/**
 * Source of the current time in unix seconds.
 *
 * Injected everywhere time matters (fee accrual, swap deadlines, feed
 * staleness) so tests can drive it explicitly.
 */
export interface Clock {
  now(): number;
}
