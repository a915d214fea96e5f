/**
 * Response shaping shared by the route modules.
 *
 * Request amounts arrive in minor or major units; both become Money
 * before they reach the engine. A vault view's capability holds a Map,
 * which has no JSON form, so it is flattened here.
 */

import type { Money, Period } from "@coffer/types";
import { parseMajor, toMoney } from "@coffer/ledger";
import type { VaultView } from "@coffer/engine";
import type { FlowCapInput } from "@coffer/vault";
import type { AmountDto, FlowCapDto, PeriodQuery } from "../types/dto.js";

// =============================================================================
// Request → Domain
// =============================================================================

/**
 * Convert a request amount to Money.
 *
 * Minor amounts pass through untouched; the engine validates them.
 */
export function toAmount(dto: AmountDto): Money {
  if ("minor" in dto) {
    return { minor: dto.minor, currency: dto.currency };
  }
  return toMoney(parseMajor(dto.major, dto.currency), dto.currency);
}

export function toFlowCap(dto: FlowCapDto): FlowCapInput {
  return { mode: dto.mode, limit: toAmount(dto.limit) };
}

export function toPeriod(query: PeriodQuery): Period {
  return { from: query.from, to: query.to };
}

// =============================================================================
// Domain → Response
// =============================================================================

export type CapabilityJson =
  | {
      readonly scope: "vault";
      readonly role: string;
      readonly canWrite: boolean;
      readonly canManage: boolean;
    }
  | {
      readonly scope: "flow";
      readonly flows: readonly { readonly flowId: string; readonly role: string }[];
    };

export function serializeVaultView(view: VaultView): Record<string, unknown> {
  const { capability, ...state } = view;
  const json: CapabilityJson =
    capability.scope === "vault"
      ? {
          scope: "vault",
          role: capability.role,
          canWrite: capability.canWrite,
          canManage: capability.canManage,
        }
      : {
          scope: "flow",
          flows: [...capability.flows].map(([flowId, role]) => ({ flowId, role })),
        };
  return { ...state, capability: json };
}
