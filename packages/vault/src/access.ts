/**
 * AccessControl — owner and keeper roles.
 *
 * The owner may do everything a keeper may.
 */

import type { Address } from "@levyield/types";
import { VaultError } from "./errors.js";

export class AccessControl {
  private readonly keepers: Set<Address>;

  constructor(
    private readonly _owner: Address,
    keepers: readonly Address[],
  ) {
    this.keepers = new Set(keepers);
  }

  get owner(): Address {
    return this._owner;
  }

  isKeeper(account: Address): boolean {
    return account === this._owner || this.keepers.has(account);
  }

  keeperList(): readonly Address[] {
    return [...this.keepers];
  }

  assertOwner(caller: Address, operation: string): void {
    if (caller !== this._owner) {
      throw new VaultError("UNAUTHORIZED", `${operation} is restricted to the owner`, { caller });
    }
  }

  assertKeeper(caller: Address, operation: string): void {
    if (!this.isKeeper(caller)) {
      throw new VaultError("UNAUTHORIZED", `${operation} is restricted to keepers`, { caller });
    }
  }

  setKeeper(keeper: Address, approved: boolean): void {
    if (approved) {
      this.keepers.add(keeper);
    } else {
      this.keepers.delete(keeper);
    }
  }
}
