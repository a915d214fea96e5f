/**
 * Membership management.
 *
 * Returns the updated vault record; the caller commits it. Removing a
 * member never touches transactions they recorded.
 */

import type {
  FlowMembershipRole,
  MembershipRole,
  VaultRecord,
  VaultState,
} from "@coffer/types";
import { LedgerError } from "@coffer/ledger";
import { requireFlow } from "./holders.js";
import { normalizeUsername } from "./names.js";

function assertNotOwner(vault: VaultRecord, username: string): void {
  if (vault.ownerId === username) {
    throw new LedgerError("INVALID_STATE", "The vault owner's membership cannot be changed", {
      entity: "member",
      id: username,
    });
  }
}

/**
 * Add a vault member, or change an existing member's role.
 */
export function addMember(
  vault: VaultRecord,
  input: { readonly username: string; readonly role: MembershipRole; readonly now: string },
): VaultRecord {
  const username = normalizeUsername(input.username);
  assertNotOwner(vault, username);
  if (input.role === "owner") {
    throw new LedgerError("INVALID_INPUT", "A vault has exactly one owner", {
      entity: "member",
      id: username,
      field: "role",
    });
  }

  const existing = vault.members.find((m) => m.username === username);
  const members =
    existing === undefined
      ? [...vault.members, { username, role: input.role, addedAt: input.now }]
      : vault.members.map((m) => (m.username === username ? { ...m, role: input.role } : m));

  return { ...vault, members };
}

export function removeMember(vault: VaultRecord, rawUsername: string): VaultRecord {
  const username = normalizeUsername(rawUsername);
  assertNotOwner(vault, username);
  if (!vault.members.some((m) => m.username === username)) {
    throw new LedgerError("NOT_FOUND", `${username} is not a member`, {
      entity: "member",
      id: username,
    });
  }
  return { ...vault, members: vault.members.filter((m) => m.username !== username) };
}

/**
 * Grant access to a single flow, or change the role of an existing grant.
 */
export function addFlowMember(
  state: VaultState,
  input: {
    readonly flowId: string;
    readonly username: string;
    readonly role: FlowMembershipRole;
    readonly now: string;
  },
): VaultRecord {
  const { vault } = state;
  const flow = requireFlow(state, input.flowId);
  const username = normalizeUsername(input.username);
  assertNotOwner(vault, username);

  const matches = (g: { flowId: string; username: string }): boolean =>
    g.flowId === flow.id && g.username === username;

  const flowMembers = vault.flowMembers.some(matches)
    ? vault.flowMembers.map((g) => (matches(g) ? { ...g, role: input.role } : g))
    : [...vault.flowMembers, { flowId: flow.id, username, role: input.role, addedAt: input.now }];

  return { ...vault, flowMembers };
}

export function removeFlowMember(
  state: VaultState,
  flowId: string,
  rawUsername: string,
): VaultRecord {
  const { vault } = state;
  requireFlow(state, flowId);
  const username = normalizeUsername(rawUsername);
  const before = vault.flowMembers.length;
  const flowMembers = vault.flowMembers.filter(
    (g) => !(g.flowId === flowId && g.username === username),
  );
  if (flowMembers.length === before) {
    throw new LedgerError("NOT_FOUND", `${username} has no grant on flow ${flowId}`, {
      entity: "member",
      id: username,
    });
  }
  return { ...vault, flowMembers };
}
