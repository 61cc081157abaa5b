/**
 * Network routes.
 *
 * GET  /api/v1/network                  — Chain id, clock, factory
 * GET  /api/v1/network/balances/:address — Native balance
 * POST /api/v1/network/fund             — Credit an account (dev)
 * POST /api/v1/network/time             — Set or advance the clock (dev)
 */

import { Hono } from "hono";
import { normalizeAddress } from "@quorumsafe/wallet";
import type { AppEnv } from "../types/api-contract.js";
import { FundSchema, SetTimeSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export interface NetworkRouteOptions {
  /** Mount the funding and clock routes. Default: false */
  readonly devRoutes?: boolean | undefined;
}

export function createNetworkRoutes(options: NetworkRouteOptions = {}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").networkInfo() });
  });

  routes.get("/balances/:address", (c) => {
    const address = normalizeAddress(c.req.param("address"), "Address");
    const balance = c.get("service").balanceOf(address);
    return c.json({ data: { address, balance: balance.toString() } });
  });

  if (options.devRoutes !== true) {
    return routes;
  }

  routes.post("/fund", async (c) => {
    const body = await parseJsonBody(c, FundSchema);
    const balance = c.get("service").fund(body.address, body.amount);
    return c.json({ data: { address: body.address, balance: balance.toString() } });
  });

  routes.post("/time", async (c) => {
    const body = await parseJsonBody(c, SetTimeSchema);
    const service = c.get("service");
    const timestamp =
      "timestamp" in body ? service.setTime(body.timestamp) : service.advanceTime(body.advance);
    return c.json({ data: { timestamp } });
  });

  return routes;
}
