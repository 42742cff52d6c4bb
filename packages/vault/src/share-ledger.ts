/**
 * ShareLedger — the vault's own share token.
 *
 * Shares are minted on deposit, burned on withdraw and moved into the
 * vault's escrow address while an asynchronous withdraw is in flight.
 */

import type { Address } from "@levyield/types";
import { VaultError } from "./errors.js";

export class ShareLedger {
  private readonly balances = new Map<Address, bigint>();
  private supply = 0n;

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  burn(from: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.debit(from, amount);
    this.supply -= amount;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.debit(from, amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  /** Every non-zero holder, for inspection. */
  holders(): ReadonlyMap<Address, bigint> {
    return new Map([...this.balances].filter(([, balance]) => balance > 0n));
  }

  private debit(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new VaultError(
        "INSUFFICIENT_SHARES_BALANCE",
        `${holder} holds ${balance} shares, needs ${amount}`,
      );
    }
    this.balances.set(holder, balance - amount);
  }
}
