import type { VaultRecord } from "@coffer/types";

/**
 * Whether `username` holds any membership in `vault`.
 */
export function isMemberOf(vault: VaultRecord, username: string): boolean {
  return (
    vault.members.some((m) => m.username === username) ||
    vault.flowMembers.some((g) => g.username === username)
  );
}
