/**
 * @coffer/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isSupportedCurrency } from "@coffer/ledger";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),

    // Ledger
    DEFAULT_CURRENCY: z
      .string()
      .default("EUR")
      .refine(isSupportedCurrency, { message: "Unsupported currency" }),
    VAULT_DELETE_POLICY: z.enum(["reject", "cascade"]).default("reject"),
    CONFLICT_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

    // Store
    STORE_DRIVER: z.enum(["memory", "jsonl"]).default("memory"),
    STORE_PATH: z.string().min(1).optional(),

    // Lifecycle
    SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
  })
  .superRefine((config, ctx) => {
    if (config.STORE_DRIVER === "jsonl" && config.STORE_PATH === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["STORE_PATH"],
        message: "STORE_PATH is required when STORE_DRIVER is jsonl",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly username: string;
}

/**
 * Parse the API_KEYS env var into key → username records.
 *
 * Format: "key1:alice,key2:bob"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, username] = parts;
    if (parts.length !== 2 || key === undefined || username === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:username`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (username === "") {
      throw new Error("Username cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS for user "${username}"`);
    }

    seen.add(key);
    keys.push({ key, username });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} listing every missing or invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
