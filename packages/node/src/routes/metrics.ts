/**
 * Metrics route.
 *
 * GET /metrics — Prometheus text exposition of every vault's accounting.
 *
 * USD values and ratios are 1e18 fixed point in the vault; they are
 * rendered as decimals here. Status is a one-hot gauge per status.
 */

import { Hono } from "hono";
import { formatUnits } from "@levyield/math";
import { VAULT_STATUSES } from "@levyield/types";
import type { VaultMetrics } from "@levyield/types";
import type { BaseVault } from "@levyield/vault";
import type { AppEnv } from "../types/api-contract.js";
import type { Devnet } from "../services/devnet.js";

type Gauge = readonly [name: string, help: string, read: (m: VaultMetrics) => bigint];

const GAUGES: readonly Gauge[] = [
  ["levyield_vault_asset_usd", "Value of the position", (m) => m.assetValue],
  ["levyield_vault_debt_usd", "Value of the debt", (m) => m.debtValue],
  ["levyield_vault_equity_usd", "Asset value minus debt value, floored at zero", (m) => m.equityValue],
  ["levyield_vault_debt_ratio", "Debt value over asset value", (m) => m.debtRatio],
  ["levyield_vault_leverage", "Asset value over equity value", (m) => m.leverage],
  ["levyield_vault_delta", "Net exposure to the volatile token", (m) => m.delta],
  ["levyield_vault_share_value_usd", "Equity per share", (m) => m.svTokenValue],
  ["levyield_vault_shares", "Total share supply", (m) => m.totalSupply],
  ["levyield_vault_pending_fee_shares", "Fee shares accrued but not minted", (m) => m.pendingFee],
  ["levyield_vault_capacity_usd", "Remaining deposit capacity", (m) => m.additionalCapacity],
];

export async function renderVaultMetrics(vaults: readonly BaseVault[]): Promise<string> {
  const snapshots = await Promise.all(
    vaults.map(async (v) => ({ id: v.id, metrics: await v.metrics() })),
  );
  const lines: string[] = [];

  for (const [name, help, read] of GAUGES) {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} gauge`);
    for (const { id, metrics } of snapshots) {
      lines.push(`${name}{vault="${id}"} ${formatUnits(read(metrics), 18)}`);
    }
  }

  lines.push("# HELP levyield_vault_status Current lifecycle status (1 = active)");
  lines.push("# TYPE levyield_vault_status gauge");
  for (const { id, metrics } of snapshots) {
    for (const status of VAULT_STATUSES) {
      lines.push(`levyield_vault_status{vault="${id}",status="${status}"} ${metrics.status === status ? 1 : 0}`);
    }
  }

  return lines.join("\n") + "\n";
}

export function createMetricsRoute(devnet: Devnet): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", async (c) => {
    const body = await renderVaultMetrics(devnet.vaults());
    return c.text(body, 200, {
      "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
    });
  });

  return routes;
}
