/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:alice,k2:bob");
    expect(keys).toEqual([
      { key: "k1", username: "alice" },
      { key: "k2", username: "bob" },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:alice , k2:bob  ");
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or username", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("Username cannot be empty in API_KEYS");
  });

  it("throws on duplicate keys", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow('Duplicate API key in API_KEYS for user "bob"');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.DEFAULT_CURRENCY).toBe("EUR");
    expect(config.VAULT_DELETE_POLICY).toBe("reject");
    expect(config.CONFLICT_RETRIES).toBe(3);
    expect(config.STORE_DRIVER).toBe("memory");
    expect(config.STORE_PATH).toBeUndefined();
    expect(config.SHUTDOWN_TIMEOUT_MS).toBe(10000);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      DEFAULT_CURRENCY: "JPY",
      VAULT_DELETE_POLICY: "cascade",
      STORE_DRIVER: "jsonl",
      STORE_PATH: "/var/lib/ledger/log.jsonl",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.DEFAULT_CURRENCY).toBe("JPY");
    expect(config.VAULT_DELETE_POLICY).toBe("cascade");
    expect(config.STORE_PATH).toBe("/var/lib/ledger/log.jsonl");
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("rejects an unsupported default currency", () => {
    expect(() => loadConfig({ DEFAULT_CURRENCY: "XYZ" })).toThrow("Unsupported currency");
  });

  it("requires STORE_PATH for the jsonl driver", () => {
    expect(() => loadConfig({ STORE_DRIVER: "jsonl" })).toThrow(
      "STORE_PATH is required when STORE_DRIVER is jsonl",
    );
  });
});
