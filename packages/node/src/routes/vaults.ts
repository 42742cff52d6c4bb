/**
 * Vault routes.
 *
 * GET    /api/v1/vaults                          — List vaults with status
 * GET    /api/v1/vaults/:id                      — Configuration and metrics
 * GET    /api/v1/vaults/:id/shares/:holder       — Share balance
 * POST   /api/v1/vaults/:id/deposit              — Deposit (LP: 202 + request key)
 * POST   /api/v1/vaults/:id/withdraw             — Withdraw (LP: 202 + request key)
 * POST   /api/v1/vaults/:id/emergency-withdraw   — Pro-rata payout after close
 * POST   /api/v1/vaults/:id/rebalance/add        — Keeper
 * POST   /api/v1/vaults/:id/rebalance/remove     — Keeper
 * POST   /api/v1/vaults/:id/rebalance/close      — Owner
 * POST   /api/v1/vaults/:id/compound             — Keeper
 * POST   /api/v1/vaults/:id/compound-position    — Keeper
 * POST   /api/v1/vaults/:id/fee                  — Keeper, mints pending fee
 * POST   /api/v1/vaults/:id/failure/deposit      — Keeper, LP only
 * POST   /api/v1/vaults/:id/failure/withdraw     — Keeper, LP only
 * POST   /api/v1/vaults/:id/emergency/:action    — pause | repay | borrow | resume | close
 * POST   /api/v1/vaults/:id/status               — Owner, manual override
 * PUT    /api/v1/vaults/:id/parameters           — Owner
 * POST   /api/v1/vaults/:id/keepers              — Owner
 * POST   /api/v1/vaults/:id/treasury             — Owner
 *
 * Every body names its `caller`; the vault enforces the role.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { z } from "zod";
import type { Address } from "@levyield/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CallerOnlySchema,
  CompoundSchema,
  DepositSchema,
  EmergencyWithdrawSchema,
  RebalanceAddSchema,
  RebalanceRemoveSchema,
  StatusChangeSchema,
  UpdateKeeperSchema,
  UpdateTreasurySchema,
  WithdrawSchema,
} from "../types/dto.js";
import { VaultParametersSchema } from "../config.js";
import { parseBody } from "../middleware/validate.js";
import { ApiError } from "../types/error.js";
import { toJson } from "../types/json.js";
import type { Devnet, DevnetVault } from "../services/devnet.js";

const UpdateParametersSchema = z.object({
  caller: z.string().min(1),
  params: VaultParametersSchema,
});

// =============================================================================
// Helpers
// =============================================================================

function resolveVault(devnet: Devnet, id: string): DevnetVault {
  const target = devnet.vault(id);
  if (target === undefined) {
    throw new ApiError("NOT_FOUND", 404, `Vault '${id}' not found`);
  }
  return target;
}

function lpOnly(target: DevnetVault, operation: string): Extract<DevnetVault, { kind: "lp" }> {
  if (target.kind !== "lp") {
    throw new ApiError(
      "UNSUPPORTED_OPERATION",
      422,
      `${operation} only exists on vaults with asynchronous settlement`,
    );
  }
  return target;
}

function requireToken(token: Address | undefined): Address {
  if (token === undefined) {
    throw new ApiError("VALIDATION_ERROR", 400, "token is required", {
      issues: [{ path: "token", message: "Required" }],
    });
  }
  return token;
}

/** LP operations that wait on the venue answer 202; everything else 200. */
function reply(c: Context<AppEnv>, target: DevnetVault, data: unknown): Response {
  return c.json({ data: toJson(data) }, target.kind === "lp" ? 202 : 200);
}

// =============================================================================
// Routes
// =============================================================================

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const vaults = c.get("devnet").vaults().map((v) => ({
      id: v.id,
      address: v.address,
      status: v.status,
      totalSupply: v.totalSupply(),
    }));
    return c.json({ data: toJson(vaults) });
  });

  routes.get("/:id", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const { vault } = target;
    const metrics = await vault.metrics();

    return c.json({
      data: toJson({
        id: vault.id,
        kind: target.kind,
        address: vault.address,
        owner: vault.owner,
        keepers: vault.keepers(),
        treasury: vault.treasury,
        pauseRequested: vault.pauseRequested,
        pendingRequest: target.kind === "lp" ? target.vault.pendingRequest() : null,
        params: vault.params,
        metrics,
      }),
    });
  });

  routes.get("/:id/shares/:holder", (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const holder = c.req.param("holder");
    return c.json({ data: toJson({ holder, shares: vault.balanceOf(holder) }) });
  });

  // ─── User operations ────────────────────────────────────────────

  routes.post("/:id/deposit", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, DepositSchema);
    const params = { amount: body.amount, minSharesAmt: body.minSharesAmt, slippage: body.slippage };

    if (target.kind === "lp") {
      const result = body.native
        ? await target.vault.depositNative(body.caller, params)
        : await target.vault.deposit(body.caller, { ...params, token: requireToken(body.token) });
      return reply(c, target, result);
    }
    const result = body.native
      ? await target.vault.depositNative(body.caller, params)
      : await target.vault.deposit(body.caller, { ...params, token: requireToken(body.token) });
    return reply(c, target, result);
  });

  routes.post("/:id/withdraw", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, WithdrawSchema);
    const params = {
      shareAmt: body.shareAmt,
      minWithdrawAmt: body.minWithdrawAmt,
      slippage: body.slippage,
      unwrap: body.unwrap,
    };

    if (target.kind === "lp") {
      const result = await target.vault.withdraw(body.caller, { ...params, token: requireToken(body.token) });
      return reply(c, target, result);
    }
    return reply(c, target, await target.vault.withdraw(body.caller, params));
  });

  routes.post("/:id/emergency-withdraw", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, EmergencyWithdrawSchema);
    return c.json({ data: toJson(await vault.emergencyWithdraw(body.caller, body.shareAmt)) });
  });

  // ─── Keeper operations ──────────────────────────────────────────

  routes.post("/:id/rebalance/add", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, RebalanceAddSchema);

    if (target.kind === "lp") {
      const key = await target.vault.rebalanceAdd(body.caller, {
        rebalanceType: body.rebalanceType,
        borrowTokenAAmt: body.borrowTokenAAmt,
        borrowTokenBAmt: body.borrowTokenBAmt,
      });
      return reply(c, target, { key });
    }
    const result = await target.vault.rebalanceAdd(body.caller, {
      rebalanceType: body.rebalanceType,
      borrowAmt: body.borrowAmt,
    });
    return reply(c, target, result);
  });

  routes.post("/:id/rebalance/remove", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, RebalanceRemoveSchema);

    if (target.kind === "lp") {
      const key = await target.vault.rebalanceRemove(body.caller, {
        rebalanceType: body.rebalanceType,
        lpAmtToRemove: body.amount,
      });
      return reply(c, target, { key });
    }
    const result = await target.vault.rebalanceRemove(body.caller, {
      rebalanceType: body.rebalanceType,
      lrtAmtToRemove: body.amount,
    });
    return reply(c, target, result);
  });

  routes.post("/:id/compound", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, CompoundSchema);
    const params = { tokenIn: body.tokenIn, tokenOut: body.tokenOut, amountIn: body.amountIn };

    if (target.kind === "lp") {
      return reply(c, target, { key: await target.vault.compound(body.caller, params) });
    }
    return reply(c, target, { amountOut: await target.vault.compound(body.caller, params) });
  });

  routes.post("/:id/compound-position", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, CallerOnlySchema);
    return c.json({ data: toJson({ positionAmt: await vault.compoundPositionUnit(body.caller) }) });
  });

  routes.post("/:id/fee", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, CallerOnlySchema);
    return c.json({ data: toJson({ shares: await vault.mintFee(body.caller) }) });
  });

  routes.post("/:id/failure/:kind", async (c) => {
    const kind = c.req.param("kind");
    const target = lpOnly(resolveVault(c.get("devnet"), c.req.param("id")), `failure/${kind}`);
    const body = await parseBody(c, CallerOnlySchema);

    if (kind === "deposit") {
      return reply(c, target, { key: await target.vault.processDepositFailure(body.caller) });
    }
    if (kind === "withdraw") {
      return reply(c, target, { key: await target.vault.processWithdrawFailure(body.caller) });
    }
    throw new ApiError("NOT_FOUND", 404, `Unknown failure kind '${kind}'`);
  });

  // ─── Emergency ──────────────────────────────────────────────────

  routes.post("/:id/emergency/:action", async (c) => {
    const target = resolveVault(c.get("devnet"), c.req.param("id"));
    const action = c.req.param("action");
    const { caller } = await parseBody(c, CallerOnlySchema);

    switch (action) {
      case "pause":
        return c.json({ data: toJson({ status: await target.vault.emergencyPause(caller) }) });
      case "close":
        await target.vault.emergencyClose(caller);
        return c.json({ data: toJson({ status: target.vault.status }) });
      case "repay":
        return target.kind === "lp"
          ? reply(c, target, { key: await target.vault.emergencyRepay(caller) })
          : reply(c, target, { repaid: await target.vault.emergencyRepay(caller) });
      case "borrow":
        return c.json({ data: toJson({ borrowed: await target.vault.emergencyBorrow(caller) }) });
      case "resume":
        return target.kind === "lp"
          ? reply(c, target, { key: await target.vault.emergencyResume(caller) })
          : reply(c, target, { lrtBought: await target.vault.emergencyResume(caller) });
      default:
        throw new ApiError("NOT_FOUND", 404, `Unknown emergency action '${action}'`);
    }
  });

  // ─── Owner administration ───────────────────────────────────────

  routes.post("/:id/rebalance/close", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, CallerOnlySchema);
    await vault.rebalanceClose(body.caller);
    return c.json({ data: toJson({ status: vault.status }) });
  });

  routes.post("/:id/status", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, StatusChangeSchema);
    await vault.emergencyStatusChange(body.caller, body.status);
    return c.json({ data: toJson({ status: vault.status }) });
  });

  routes.put("/:id/parameters", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, UpdateParametersSchema);
    await vault.updateParameters(body.caller, body.params);
    return c.json({ data: toJson(vault.params) });
  });

  routes.post("/:id/keepers", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, UpdateKeeperSchema);
    await vault.updateKeeper(body.caller, body.keeper, body.approved);
    return c.json({ data: toJson({ keepers: vault.keepers() }) });
  });

  routes.post("/:id/treasury", async (c) => {
    const { vault } = resolveVault(c.get("devnet"), c.req.param("id"));
    const body = await parseBody(c, UpdateTreasurySchema);
    await vault.updateTreasury(body.caller, body.treasury);
    return c.json({ data: toJson({ treasury: vault.treasury }) });
  });

  return routes;
}
