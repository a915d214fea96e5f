/**
 * Tests for vault and flow membership changes.
 */

import { describe, it, expect } from "vitest";
import { LedgerError } from "@coffer/ledger";
import {
  addFlowMember,
  addMember,
  removeFlowMember,
  removeMember,
} from "../src/membership.js";
import { NOW, freshVault } from "./fixtures.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

describe("vault members", () => {
  it("adds a member", () => {
    const vault = addMember(freshVault().vault, { username: "bob", role: "editor", now: NOW });
    expect(vault.members.map((m) => [m.username, m.role])).toEqual([
      ["alice", "owner"],
      ["bob", "editor"],
    ]);
  });

  it("changes the role of an existing member", () => {
    const once = addMember(freshVault().vault, { username: "bob", role: "editor", now: NOW });
    const twice = addMember(once, { username: "bob", role: "viewer", now: "2026-03-01T00:00:00.000Z" });
    expect(twice.members).toEqual([
      { username: "alice", role: "owner", addedAt: NOW },
      { username: "bob", role: "viewer", addedAt: NOW },
    ]);
  });

  it("refuses a second owner", () => {
    expect(codeOf(() => addMember(freshVault().vault, { username: "bob", role: "owner", now: NOW }))).toBe(
      "INVALID_INPUT",
    );
  });

  it("refuses to change or remove the owner", () => {
    const vault = freshVault().vault;
    expect(codeOf(() => addMember(vault, { username: "alice", role: "viewer", now: NOW }))).toBe("INVALID_STATE");
    expect(codeOf(() => removeMember(vault, "alice"))).toBe("INVALID_STATE");
  });

  it("removes a member", () => {
    const vault = addMember(freshVault().vault, { username: "bob", role: "editor", now: NOW });
    expect(removeMember(vault, "bob").members.map((m) => m.username)).toEqual(["alice"]);
  });

  it("reports removing a non-member as NOT_FOUND", () => {
    expect(codeOf(() => removeMember(freshVault().vault, "bob"))).toBe("NOT_FOUND");
  });
});

describe("flow members", () => {
  it("grants and updates a flow-scoped role", () => {
    const state = freshVault();
    const granted = addFlowMember(state, { flowId: "id-3", username: "dave", role: "viewer", now: NOW });
    const updated = addFlowMember({ ...state, vault: granted }, {
      flowId: "id-3",
      username: "dave",
      role: "editor",
      now: NOW,
    });
    expect(updated.flowMembers).toEqual([{ flowId: "id-3", username: "dave", role: "editor", addedAt: NOW }]);
  });

  it("requires an existing flow", () => {
    expect(
      codeOf(() => addFlowMember(freshVault(), { flowId: "nope", username: "dave", role: "viewer", now: NOW })),
    ).toBe("NOT_FOUND");
  });

  it("removes a grant", () => {
    const state = freshVault();
    const vault = addFlowMember(state, { flowId: "id-3", username: "dave", role: "viewer", now: NOW });
    expect(removeFlowMember({ ...state, vault }, "id-3", "dave").flowMembers).toEqual([]);
  });

  it("reports a missing grant as NOT_FOUND", () => {
    expect(codeOf(() => removeFlowMember(freshVault(), "id-3", "dave"))).toBe("NOT_FOUND");
  });
});
