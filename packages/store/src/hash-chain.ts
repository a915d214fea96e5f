/**
 * @coffer/store — Hash chain for tamper-evident commit logs.
 *
 * Each log entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous entry's hash, forming a chain:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Any modification to any entry breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  HashedLogEntry,
  IntegrityError,
  LogEntry,
  StoreIntegrityResult,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first entry in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Strip the chain fields so only the entry body is hashed.
 */
function entryBody(entry: LogEntry | HashedLogEntry): LogEntry {
  if (entry.type === "delete") {
    const { type, sequence, vaultId, version, committedAt } = entry;
    return { type, sequence, vaultId, version, committedAt };
  }
  const { type, sequence, vaultId, version, changes, committedAt } = entry;
  return { type, sequence, vaultId, version, changes, committedAt };
}

/**
 * Compute the SHA-256 hash of an entry given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEntryHash(entry: LogEntry, previousHash: string): string {
  const content = canonicalize(entryBody(entry));
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Attach chain fields to an entry.
 */
export function chainEntry(entry: LogEntry, previousHash: string): HashedLogEntry {
  return { ...entry, previousHash, hash: computeEntryHash(entry, previousHash) };
}

/**
 * Verify the hash chain of a sequence of entries in sequence order.
 */
export function verifyHashChain(entries: readonly HashedLogEntry[]): StoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedSequence = 0;

  for (const entry of entries) {
    if (entry.previousHash !== previousHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `previousHash mismatch at sequence ${String(entry.sequence)}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `Hash mismatch at sequence ${String(entry.sequence)}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    previousHash = entry.hash;
    if (errors.length === 0) {
      lastVerifiedSequence = entry.sequence;
    }
  }

  return { valid: errors.length === 0, lastVerifiedSequence, errors };
}
