/**
 * Market controls (devnet).
 *
 * GET  /api/v1/market/balances/:holder — Token and native balances
 * POST /api/v1/market/fund             — Mint tokens to a holder
 * POST /api/v1/market/prices           — Set an 8-decimal USD price
 * POST /api/v1/market/clock            — Advance time
 * POST /api/v1/market/interest         — Accrue interest on a borrower's debt
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { AdvanceClockSchema, AmountSchema, FundSchema, SetPriceSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

const AccrueInterestSchema = z.object({
  pool: z.enum(["weth", "usdc"]),
  borrower: z.string().min(1),
  amount: AmountSchema,
});

export function createMarketRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/balances/:holder", async (c) => {
    const devnet = c.get("devnet");
    const holder = c.req.param("holder");
    return c.json({ data: toJson({ holder, balances: await devnet.balances(holder) }) });
  });

  routes.post("/fund", async (c) => {
    const { market } = c.get("devnet");
    const body = await parseBody(c, FundSchema);
    market.fund(body.holder, body.token, body.amount);
    return c.json({
      data: toJson({ holder: body.holder, token: body.token, balance: await market.bank.balanceOf(body.token, body.holder) }),
    });
  });

  routes.post("/prices", async (c) => {
    const { market } = c.get("devnet");
    const body = await parseBody(c, SetPriceSchema);
    market.oracle.setPrice(body.token, body.price);
    return c.json({ data: toJson(await market.oracle.consult(body.token)) });
  });

  routes.post("/clock", async (c) => {
    const { market } = c.get("devnet");
    const body = await parseBody(c, AdvanceClockSchema);
    return c.json({ data: toJson({ now: market.clock.advance(body.seconds) }) });
  });

  routes.post("/interest", async (c) => {
    const { market } = c.get("devnet");
    const body = await parseBody(c, AccrueInterestSchema);
    const pool = body.pool === "weth" ? market.wethPool : market.usdcPool;
    pool.accrueInterest(body.borrower, body.amount);
    return c.json({ data: toJson({ borrower: body.borrower, debt: pool.debtOf(body.borrower) }) });
  });

  return routes;
}
