/**
 * @coffer/store — File-based JSONL LedgerStore implementation.
 *
 * Stores the commit log as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each commit is a single line written with one write + fsync
 * - In-memory state changes only after the write returns
 * - A partial trailing line (torn write) is skipped on load, and the
 *   next append starts on a fresh line so it cannot join the fragment
 *
 * Properties:
 * - Durable: vaults survive process restart
 * - Append-only: the file is never truncated or rewritten
 * - O(n) load on startup (sequential replay of all lines)
 *
 * File format:
 * Each line is a HashedLogEntry:
 * {"type":"commit","sequence":1,"vaultId":"...","version":1,"changes":[...],"committedAt":"...","previousHash":"genesis","hash":"..."}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { HashedLogEntry } from "./types.js";
import { StoreError } from "./types.js";
import type { InMemoryLedgerStoreOptions } from "./in-memory-store.js";
import { InMemoryLedgerStore } from "./in-memory-store.js";
import { isHashedLogEntry } from "./records.js";

/**
 * Options for creating a JsonlLedgerStore.
 */
export interface JsonlLedgerStoreOptions extends InMemoryLedgerStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * Result of loading the file, for diagnostics.
 */
export interface JsonlLoadReport {
  readonly entries: number;
  readonly skippedLines: number;
}

export class JsonlLedgerStore extends InMemoryLedgerStore {
  private readonly _filePath: string;
  private readonly _loadReport: JsonlLoadReport;
  /** The file ends in an unterminated fragment */
  private _tornTail = false;

  /**
   * Open a store. If the file exists its log is replayed; otherwise it
   * is created on the first commit. The parent directory is created if
   * missing.
   *
   * @throws StoreError CORRUPT if a readable entry does not follow its predecessor
   */
  constructor(options: JsonlLedgerStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadReport = this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  get loadReport(): JsonlLoadReport {
    return this._loadReport;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  protected override _persist(entry: HashedLogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    this._writeAndSync(this._tornTail ? "\n" + line : line);
    this._tornTail = false;
  }

  /**
   * Replay the log. Lines that do not parse as entries are skipped
   * (a torn final write); entries that parse but do not chain onto
   * the table's state are reported as CORRUPT.
   */
  private _loadFromFile(): JsonlLoadReport {
    if (!existsSync(this._filePath)) {
      return { entries: 0, skippedLines: 0 };
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._tornTail = content.length > 0 && !content.endsWith("\n");
    let entries = 0;
    let skippedLines = 0;

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        skippedLines++;
        continue;
      }
      if (!isHashedLogEntry(parsed)) {
        skippedLines++;
        continue;
      }

      this._restore(parsed);
      entries++;
    }

    return { entries, skippedLines };
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string): void {
    let fd: number;
    try {
      fd = openSync(this._filePath, "a");
    } catch (err) {
      throw new StoreError("IO_FAILURE", `Cannot open ${this._filePath}`, undefined, { cause: err });
    }
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      throw new StoreError("IO_FAILURE", `Cannot write ${this._filePath}`, undefined, { cause: err });
    } finally {
      closeSync(fd);
    }
  }
}
