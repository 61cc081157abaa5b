/**
 * Node configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { WalletServiceConfig } from "./services/wallet-service.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Network
  CHAIN_ID: z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER).default(31337),
  GENESIS_TIMESTAMP: z.coerce.number().int().min(0).optional(),
  DEV_ROUTES: z
    .string()
    .transform((v) => v === "true")
    .default("true"),

  // Wallet defaults
  MAX_SIGNERS: z.coerce.number().int().min(1).max(256).default(50),
  DOMAIN_NAME: z.string().min(1).default("QuorumSafe"),
  DOMAIN_VERSION: z.string().min(1).default("1"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function toServiceConfig(config: AppConfig): WalletServiceConfig {
  return {
    chainId: config.CHAIN_ID,
    genesisTimestamp: config.GENESIS_TIMESTAMP,
    walletDefaults: {
      maxSigners: config.MAX_SIGNERS,
      domainName: config.DOMAIN_NAME,
      domainVersion: config.DOMAIN_VERSION,
    },
  };
}
