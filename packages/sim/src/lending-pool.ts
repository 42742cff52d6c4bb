/**
 * SimLendingPool — Single-asset lending pool backed by the token bank.
 *
 * Liquidity sits in the bank under the pool's own address. Borrowing
 * moves it to the borrower and records debt; repaying moves it back.
 * Interest is not modelled as a rate; `accrueInterest` adds debt
 * directly so tests can exercise `maxRepay` drift.
 */

import type { Address, LendingPool } from "@levyield/types";
import { SimError } from "./errors.js";
import type { InMemoryTokenBank } from "./token-bank.js";

export class SimLendingPool implements LendingPool {
  private readonly debts = new Map<Address, bigint>();

  constructor(
    private readonly bank: InMemoryTokenBank,
    readonly asset: Address,
    readonly address: Address,
  ) {}

  // ─── LendingPool ────────────────────────────────────────────────────

  async borrow(borrower: Address, amount: bigint): Promise<void> {
    assertPositive(amount);
    const available = this.bank.balanceSync(this.asset, this.address);
    if (amount > available) {
      throw new SimError(
        "INSUFFICIENT_LIQUIDITY",
        `Pool ${this.address} has ${available} ${this.asset}, ${borrower} asked for ${amount}`,
      );
    }
    await this.bank.transfer(this.asset, this.address, borrower, amount);
    this.debts.set(borrower, this.debtOf(borrower) + amount);
  }

  async repay(borrower: Address, amount: bigint): Promise<void> {
    assertPositive(amount);
    const debt = this.debtOf(borrower);
    if (amount > debt) {
      throw new SimError(
        "REPAY_EXCEEDS_DEBT",
        `${borrower} owes ${debt} ${this.asset}, tried to repay ${amount}`,
      );
    }
    await this.bank.transfer(this.asset, borrower, this.address, amount);
    this.debts.set(borrower, debt - amount);
  }

  async maxRepay(borrower: Address): Promise<bigint> {
    return this.debtOf(borrower);
  }

  async totalAvailableAsset(): Promise<bigint> {
    return this.bank.balanceSync(this.asset, this.address);
  }

  // ─── Simulation controls ────────────────────────────────────────────

  /** Seed lendable liquidity. */
  supply(amount: bigint): void {
    this.bank.mint(this.asset, this.address, amount);
  }

  accrueInterest(borrower: Address, amount: bigint): void {
    this.debts.set(borrower, this.debtOf(borrower) + amount);
  }

  debtOf(borrower: Address): bigint {
    return this.debts.get(borrower) ?? 0n;
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new SimError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
  }
}
