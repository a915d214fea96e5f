/**
 * Store selection.
 *
 * STORE_DRIVER=memory keeps everything in process; STORE_DRIVER=jsonl
 * replays an append-only log at STORE_PATH on startup.
 */

import type { Logger } from "pino";
import { InMemoryLedgerStore, JsonlLedgerStore } from "@coffer/store";
import type { LedgerStore } from "@coffer/store";
import type { AppConfig } from "./config.js";

export function openStore(
  config: Pick<AppConfig, "STORE_DRIVER" | "STORE_PATH">,
  logger: Logger,
): LedgerStore {
  if (config.STORE_DRIVER === "memory" || config.STORE_PATH === undefined) {
    logger.info({ driver: "memory" }, "store opened");
    return new InMemoryLedgerStore();
  }

  const store = new JsonlLedgerStore({ filePath: config.STORE_PATH });
  const { entries, skippedLines } = store.loadReport;
  logger.info({ driver: "jsonl", filePath: store.filePath, entries }, "store opened");
  if (skippedLines > 0) {
    logger.warn({ filePath: store.filePath, skippedLines }, "skipped unreadable log lines");
  }
  return store;
}
