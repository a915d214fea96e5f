/**
 * Tests for store selection and startup reporting.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import type { Logger } from "pino";
import { InMemoryLedgerStore, JsonlLedgerStore } from "@coffer/store";
import { openStore } from "../src/store.js";

let testDir: string;
let lines: string[];
let logger: Logger;

beforeEach(() => {
  testDir = join(tmpdir(), `coffer-node-store-${String(Date.now())}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  lines = [];
  logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function messages(): string[] {
  return lines.map((line) => {
    const entry = JSON.parse(line) as { msg: string };
    return entry.msg;
  });
}

describe("openStore", () => {
  it("opens an in-memory store by default", () => {
    const store = openStore({ STORE_DRIVER: "memory", STORE_PATH: undefined }, logger);

    expect(store).toBeInstanceOf(InMemoryLedgerStore);
    expect(messages()).toEqual(["store opened"]);
  });

  it("opens a JSONL store at STORE_PATH", () => {
    const filePath = join(testDir, "ledger.jsonl");
    const store = openStore({ STORE_DRIVER: "jsonl", STORE_PATH: filePath }, logger);

    expect(store).toBeInstanceOf(JsonlLedgerStore);
    const entry = JSON.parse(lines[0] ?? "{}") as Record<string, unknown>;
    expect(entry).toMatchObject({ driver: "jsonl", filePath, entries: 0, msg: "store opened" });
  });

  it("warns about lines it could not read", () => {
    const filePath = join(testDir, "ledger.jsonl");
    writeFileSync(filePath, "{torn\n");

    openStore({ STORE_DRIVER: "jsonl", STORE_PATH: filePath }, logger);

    expect(messages()).toEqual(["store opened", "skipped unreadable log lines"]);
    const warning = JSON.parse(lines[1] ?? "{}") as Record<string, unknown>;
    expect(warning).toMatchObject({ level: 40, skippedLines: 1 });
  });
});
