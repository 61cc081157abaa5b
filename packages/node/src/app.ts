/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one
 * WalletService. main.ts serves it; tests call `app.request` directly.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { WalletService } from "./services/wallet-service.js";
import type { WalletServiceConfig } from "./services/wallet-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createNetworkRoutes } from "./routes/network.js";
import { createWalletRoutes } from "./routes/wallets.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: WalletServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Mount the funding and clock routes. Default: false */
  readonly devRoutes?: boolean;
  /** Sees every error that surfaces as a 500 */
  readonly onUnexpectedError?: (err: Error, c: Context<AppEnv>) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WalletService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new WalletService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/network", createNetworkRoutes({ devRoutes: options.devRoutes }));
  app.route("/api/v1/wallets", createWalletRoutes());

  return { app, service };
}
