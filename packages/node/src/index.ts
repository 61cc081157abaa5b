/**
 * @quorumsafe/node — HTTP API over a development network of multisig wallets.
 */

export { WalletService, NotFoundError } from "./services/wallet-service.js";
export type { WalletServiceConfig, NetworkInfo } from "./services/wallet-service.js";
export { loadConfig, toServiceConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
