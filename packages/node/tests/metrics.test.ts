/**
 * Tests for the Prometheus metrics route.
 */

import { describe, it, expect } from "vitest";
import { ALICE, E18, createTestApp, fund, jsonRequest } from "./setup.js";

describe("GET /metrics", () => {
  it("serves the text exposition format", async () => {
    const { app } = createTestApp();
    const res = await app.request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");

    const text = await res.text();
    expect(text).toContain("# TYPE levyield_vault_equity_usd gauge\n");
    expect(text.endsWith("\n")).toBe(true);
  });

  it("renders vault values as decimals", async () => {
    const { app } = createTestApp();
    await fund(app, ALICE, "weth", E18);
    await app.request(
      jsonRequest("/api/v1/vaults/lrt-rseth/deposit", "POST", {
        caller: ALICE,
        token: "weth",
        amount: E18.toString(),
        slippage: "100",
      }),
    );

    const lines = (await (await app.request("/metrics")).text()).split("\n");

    expect(lines).toContain('levyield_vault_equity_usd{vault="lrt-rseth"} 2000');
    expect(lines).toContain('levyield_vault_equity_usd{vault="lp-weth-usdc"} 0');
    expect(lines).toContain('levyield_vault_shares{vault="lrt-rseth"} 2000');
    expect(lines).toContain('levyield_vault_share_value_usd{vault="lrt-rseth"} 1');
  });

  it("renders status as a one-hot gauge", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/vaults/lrt-rseth/emergency/pause", "POST", { caller: "keeper" }));

    const lines = (await (await app.request("/metrics")).text()).split("\n");

    expect(lines).toContain('levyield_vault_status{vault="lrt-rseth",status="Paused"} 1');
    expect(lines).toContain('levyield_vault_status{vault="lrt-rseth",status="Open"} 0');
    expect(lines).toContain('levyield_vault_status{vault="lp-weth-usdc",status="Open"} 1');
  });
});
