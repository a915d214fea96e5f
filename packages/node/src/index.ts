/**
 * @coffer/node — HTTP service for the vault ledger.
 *
 * The runnable entry point is main.ts; this module is the library surface
 * used by tests and embedders.
 */

export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { openStore } from "./store.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
