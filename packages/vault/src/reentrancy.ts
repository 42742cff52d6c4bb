/**
 * ReentrancyGuard — one mutating call per vault at a time.
 *
 * The lock is try-acquire: a call that finds it held fails immediately
 * with REENTRANT_CALL instead of queueing, so a second operation can
 * never observe (or overwrite) another's in-flight operation cache.
 */

import { VaultError } from "./errors.js";

export class ReentrancyGuard {
  private held: string | null = null;

  get locked(): boolean {
    return this.held !== null;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.held !== null) {
      throw new VaultError(
        "REENTRANT_CALL",
        `Cannot start ${operation} while ${this.held} is executing`,
      );
    }
    this.held = operation;
    try {
      return await fn();
    } finally {
      this.held = null;
    }
  }
}
