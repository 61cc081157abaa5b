/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: every deployed wallet's event log verifies
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { WalletService } from "../services/wallet-service.js";

interface WalletIntegrity {
  readonly address: string;
  readonly events: number;
  readonly errors: number;
}

export function createHealthRoutes(service: WalletService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { walletCount } = service.networkInfo();
    const broken: WalletIntegrity[] = [];

    for (const address of walletCount > 0 ? service.listWallets(0, walletCount) : []) {
      const integrity = service.wallet(address).verifyEventLog();
      if (!integrity.valid) {
        broken.push({ address, events: integrity.length, errors: integrity.errors.length });
      }
    }

    const ready = broken.length === 0;
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        wallets: walletCount,
        broken,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
