/**
 * Authorization gate.
 *
 * Every engine operation calls `authorize` (or `requireAccess`) first
 * with the capability it needs. The decision is derived from the
 * vault's membership lists only; nothing else grants access.
 */

import type { FlowMembershipRole, VaultRecord } from "@coffer/types";
import { LedgerError } from "@coffer/ledger";
import type { AccessDecision, AccessRequirement, Capability } from "./types.js";

/**
 * Resolve the caller's capability in a vault, if any.
 */
export function resolveCapability(
  vault: VaultRecord,
  username: string,
): Capability | undefined {
  const member = vault.members.find((m) => m.username === username);
  if (member !== undefined) {
    return {
      scope: "vault",
      username,
      role: member.role,
      canWrite: member.role === "owner" || member.role === "editor",
      canManage: member.role === "owner",
    };
  }

  const flows = new Map<string, FlowMembershipRole>();
  for (const grant of vault.flowMembers) {
    if (grant.username === username) flows.set(grant.flowId, grant.role);
  }
  if (flows.size === 0) return undefined;

  return { scope: "flow", username, flows };
}

function deny(reason: string): AccessDecision {
  return { granted: false, reason };
}

/**
 * Decide whether `username` meets `requirement` in `vault`.
 */
export function authorize(
  vault: VaultRecord,
  username: string,
  requirement: AccessRequirement,
): AccessDecision {
  const capability = resolveCapability(vault, username);
  if (capability === undefined) {
    return deny(`${username} is not a member of vault ${vault.id}`);
  }
  const granted: AccessDecision = { granted: true, capability };

  switch (requirement.action) {
    case "read-vault":
      return granted;

    case "write-vault":
      return capability.scope === "vault" && capability.canWrite
        ? granted
        : deny(`${username} cannot write to vault ${vault.id}`);

    case "manage-vault":
      return capability.scope === "vault" && capability.canManage
        ? granted
        : deny(`Only the owner can manage vault ${vault.id}`);

    case "read-flow":
      if (capability.scope === "vault" || capability.flows.has(requirement.flowId)) {
        return granted;
      }
      return deny(`${username} has no access to flow ${requirement.flowId}`);

    case "write-flows": {
      if (capability.scope === "vault") {
        return capability.canWrite
          ? granted
          : deny(`${username} cannot write to vault ${vault.id}`);
      }
      const missing = requirement.flowIds.find(
        (id) => capability.flows.get(id) !== "editor",
      );
      return missing === undefined
        ? granted
        : deny(`${username} cannot write to flow ${missing}`);
    }
  }
}

/**
 * Like `authorize`, but throws UNAUTHORIZED on denial.
 */
export function requireAccess(
  vault: VaultRecord,
  username: string,
  requirement: AccessRequirement,
): Capability {
  const decision = authorize(vault, username, requirement);
  if (!decision.granted) {
    throw new LedgerError("UNAUTHORIZED", decision.reason, {
      entity: "vault",
      id: vault.id,
    });
  }
  return decision.capability;
}

/**
 * Whether a capability may see a given flow.
 */
export function canSeeFlow(capability: Capability, flowId: string): boolean {
  return capability.scope === "vault" || capability.flows.has(flowId);
}
