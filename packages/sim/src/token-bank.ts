/**
 * InMemoryTokenBank — Custody ledger for every token in a simulated market.
 *
 * Balances are kept per (token, holder). The native asset is an ordinary
 * entry under NATIVE_TOKEN; wrapping moves value between it and the
 * configured wrapped-native token one-for-one.
 *
 * Rules:
 * - Amounts are raw token units and never negative
 * - A transfer that would overdraw throws INSUFFICIENT_BALANCE
 * - Zero-amount transfers are no-ops
 * - Native sends to a rejecting recipient throw NATIVE_TRANSFER_REJECTED
 */

import { NATIVE_TOKEN } from "@levyield/types";
import type { Address, TokenBank } from "@levyield/types";
import { SimError } from "./errors.js";

export class InMemoryTokenBank implements TokenBank {
  private readonly balances = new Map<Address, Map<Address, bigint>>();
  private readonly supplies = new Map<Address, bigint>();
  private readonly nativeRejecters = new Set<Address>();

  constructor(readonly wrappedNative: Address) {}

  // ─── TokenBank ──────────────────────────────────────────────────────

  async balanceOf(token: Address, holder: Address): Promise<bigint> {
    return this.balanceSync(token, holder);
  }

  async transfer(token: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    this.move(token, from, to, amount);
  }

  async wrapNative(holder: Address, amount: bigint): Promise<void> {
    this.burn(NATIVE_TOKEN, holder, amount);
    this.mint(this.wrappedNative, holder, amount);
  }

  async unwrapNative(holder: Address, amount: bigint): Promise<void> {
    this.burn(this.wrappedNative, holder, amount);
    this.mint(NATIVE_TOKEN, holder, amount);
  }

  async sendNative(from: Address, to: Address, amount: bigint): Promise<void> {
    if (this.nativeRejecters.has(to)) {
      throw new SimError("NATIVE_TRANSFER_REJECTED", `${to} rejects native transfers`);
    }
    this.move(NATIVE_TOKEN, from, to, amount);
  }

  // ─── Simulation controls ────────────────────────────────────────────

  /** Create `amount` of `token` out of thin air. */
  mint(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this.credit(token, to, amount);
    this.supplies.set(token, this.totalSupply(token) + amount);
  }

  /** Destroy `amount` of `token` held by `from`. */
  burn(token: Address, from: Address, amount: bigint): void {
    assertAmount(amount);
    this.debit(token, from, amount);
    this.supplies.set(token, this.totalSupply(token) - amount);
  }

  totalSupply(token: Address): bigint {
    return this.supplies.get(token) ?? 0n;
  }

  balanceSync(token: Address, holder: Address): bigint {
    return this.balances.get(token)?.get(holder) ?? 0n;
  }

  /** Make `recipient` revert every native send (a contract without a receive hook). */
  rejectNativeTransfers(recipient: Address, reject = true): void {
    if (reject) {
      this.nativeRejecters.add(recipient);
    } else {
      this.nativeRejecters.delete(recipient);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private move(token: Address, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    if (amount === 0n) return;
    this.debit(token, from, amount);
    this.credit(token, to, amount);
  }

  private credit(token: Address, holder: Address, amount: bigint): void {
    const ledger = this.balances.get(token) ?? new Map<Address, bigint>();
    ledger.set(holder, (ledger.get(holder) ?? 0n) + amount);
    this.balances.set(token, ledger);
  }

  private debit(token: Address, holder: Address, amount: bigint): void {
    const balance = this.balanceSync(token, holder);
    if (balance < amount) {
      throw new SimError(
        "INSUFFICIENT_BALANCE",
        `${holder} holds ${balance} of ${token}, needs ${amount}`,
      );
    }
    this.balances.get(token)?.set(holder, balance - amount);
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new SimError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
  }
}
