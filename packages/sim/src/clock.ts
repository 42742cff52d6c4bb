/**
 * ManualClock — a Clock that only moves when told to.
 */

import type { Clock } from "@levyield/types";

export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 1_767_225_600) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): number {
    this._now += seconds;
    return this._now;
  }

  set(timestamp: number): void {
    this._now = timestamp;
  }
}
