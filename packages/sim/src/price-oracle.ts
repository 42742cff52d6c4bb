/**
 * StaticPriceOracle — Settable USD price feeds.
 *
 * Each feed stores a raw answer, its decimals and the time it was last
 * updated. Reads fail the way a live aggregator would:
 * - NO_PRICE_FEED: token has no feed
 * - BROKEN_FEED: answer is zero or negative
 * - STALE_FEED: answer older than `maxAgeSeconds`
 */

import { pow10 } from "@levyield/math";
import type { Address, Clock, OracleQuote, PriceOracle } from "@levyield/types";
import { SimError } from "./errors.js";

interface Feed {
  readonly price: bigint;
  readonly decimals: number;
  readonly updatedAt: number;
}

export interface StaticPriceOracleOptions {
  /** Age after which a feed is stale. Default: 1 day */
  readonly maxAgeSeconds?: number;
}

export class StaticPriceOracle implements PriceOracle {
  private readonly feeds = new Map<Address, Feed>();
  private readonly maxAgeSeconds: number;

  constructor(
    private readonly clock: Clock,
    options: StaticPriceOracleOptions = {},
  ) {
    this.maxAgeSeconds = options.maxAgeSeconds ?? 86_400;
  }

  /**
   * Publish a price. `price` is the raw answer with `decimals` places
   * (8 by default, as USD aggregators report).
   */
  setPrice(token: Address, price: bigint, decimals = 8, updatedAt?: number): void {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
      throw new SimError("BROKEN_FEED", `Feed decimals must be in [0, 18], got ${decimals}`);
    }
    this.feeds.set(token, { price, decimals, updatedAt: updatedAt ?? this.clock.now() });
  }

  removeFeed(token: Address): void {
    this.feeds.delete(token);
  }

  async consult(token: Address): Promise<OracleQuote> {
    const feed = this.feeds.get(token);
    if (feed === undefined) {
      throw new SimError("NO_PRICE_FEED", `No price feed for ${token}`);
    }
    if (feed.price <= 0n) {
      throw new SimError("BROKEN_FEED", `Feed for ${token} answered ${feed.price}`);
    }
    if (this.clock.now() - feed.updatedAt > this.maxAgeSeconds) {
      throw new SimError(
        "STALE_FEED",
        `Feed for ${token} last updated at ${feed.updatedAt}, now ${this.clock.now()}`,
      );
    }
    return { price: feed.price, decimals: feed.decimals };
  }

  async consultIn18Decimals(token: Address): Promise<bigint> {
    const quote = await this.consult(token);
    return quote.price * pow10(18 - quote.decimals);
  }
}
