/**
 * Per-vault category registry.
 *
 * Categories are matched case-insensitively with runs of whitespace
 * collapsed, by name or by alias. "Uncategorized" is reserved: it is
 * what a transaction without a category shows, and never a record.
 * Nothing here is deleted; categories are archived instead.
 */

import type { CategoryRecord } from "@coffer/types";
import { LedgerError } from "@coffer/ledger";
import type { CategorySelection } from "./types.js";
import { UNCATEGORIZED_CATEGORY_NAME } from "./types.js";
import { normalizeName } from "./names.js";

const RESERVED_KEY = categoryKey(UNCATEGORIZED_CATEGORY_NAME);

/**
 * Comparison key for names and aliases.
 */
export function categoryKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLocaleLowerCase();
}

function displayName(raw: string): string {
  return normalizeName(raw, "category").replace(/\s+/g, " ");
}

export function requireCategory(
  categories: readonly CategoryRecord[],
  categoryId: string,
): CategoryRecord {
  const category = categories.find((c) => c.id === categoryId);
  if (category === undefined) {
    throw new LedgerError("NOT_FOUND", `Category not found: ${categoryId}`, {
      entity: "category",
      id: categoryId,
    });
  }
  return category;
}

function assertNotReserved(name: string): void {
  if (categoryKey(name) === RESERVED_KEY) {
    throw new LedgerError("INVALID_INPUT", `"${UNCATEGORIZED_CATEGORY_NAME}" is reserved`, {
      entity: "category",
      field: "name",
    });
  }
}

/**
 * Fail with ALREADY_EXISTS if `name` is taken by a category name or
 * alias anywhere in the registry, archived categories included.
 */
function assertKeyAvailable(
  name: string,
  categories: readonly CategoryRecord[],
  exceptId?: string,
): void {
  const key = categoryKey(name);
  for (const category of categories) {
    if (category.id !== exceptId && categoryKey(category.name) === key) {
      throw new LedgerError("ALREADY_EXISTS", `A category named "${name}" already exists`, {
        entity: "category",
        id: category.id,
        field: "name",
      });
    }
    if (category.aliases.some((alias) => categoryKey(alias) === key)) {
      throw new LedgerError("ALREADY_EXISTS", `"${name}" is already an alias of "${category.name}"`, {
        entity: "category",
        id: category.id,
        field: "alias",
      });
    }
  }
}

// =============================================================================
// Similarity
// =============================================================================

/**
 * Edit distance between two strings, by code point.
 */
export function levenshtein(left: string, right: string): number {
  const a = [...left];
  const b = [...right];
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 0; i < a.length; i++) {
    const current = [i + 1];
    for (let j = 0; j < b.length; j++) {
      const substitution = (previous[j] ?? 0) + (a[i] === b[j] ? 0 : 1);
      const insertion = (current[j] ?? 0) + 1;
      const deletion = (previous[j + 1] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * The closest active category within typo distance of `key`: one edit
 * for keys of up to six characters, two beyond. Ties go to the shorter name.
 */
export function findSimilarCategory(
  categories: readonly CategoryRecord[],
  key: string,
): CategoryRecord | undefined {
  const threshold = [...key].length <= 6 ? 1 : 2;
  let best: { readonly distance: number; readonly category: CategoryRecord } | undefined;

  for (const category of categories) {
    if (category.archived) continue;
    const candidate = categoryKey(category.name);
    const distance = levenshtein(key, candidate);
    if (distance > threshold) continue;
    if (
      best === undefined ||
      distance < best.distance ||
      (distance === best.distance && candidate.length < categoryKey(best.category.name).length)
    ) {
      best = { distance, category };
    }
  }
  return best?.category;
}

function assertNotSimilar(name: string, categories: readonly CategoryRecord[]): void {
  const similar = findSimilarCategory(categories, categoryKey(name));
  if (similar !== undefined) {
    throw new LedgerError(
      "INVALID_INPUT",
      `Category "${name}" is too similar to "${similar.name}"; use "${similar.name}" instead`,
      { entity: "category", id: similar.id, field: "name" },
    );
  }
}

// =============================================================================
// Registry operations
// =============================================================================

export function createCategory(
  categories: readonly CategoryRecord[],
  input: {
    readonly id: string;
    readonly vaultId: string;
    readonly name: string;
    readonly now: string;
  },
): CategoryRecord {
  const name = displayName(input.name);
  assertNotReserved(name);
  assertKeyAvailable(name, categories);
  assertNotSimilar(name, categories);
  return {
    id: input.id,
    vaultId: input.vaultId,
    name,
    aliases: [],
    archived: false,
    createdAt: input.now,
  };
}

/**
 * Rename, archive or restore a category.
 */
export function updateCategory(
  categories: readonly CategoryRecord[],
  categoryId: string,
  input: { readonly name?: string | undefined; readonly archived?: boolean | undefined },
): CategoryRecord {
  let category = requireCategory(categories, categoryId);
  if (input.name !== undefined) {
    const name = displayName(input.name);
    assertNotReserved(name);
    assertKeyAvailable(name, categories, categoryId);
    category = { ...category, name };
  }
  if (input.archived !== undefined) {
    category = { ...category, archived: input.archived };
  }
  return category;
}

export function addCategoryAlias(
  categories: readonly CategoryRecord[],
  categoryId: string,
  rawAlias: string,
): CategoryRecord {
  const category = requireCategory(categories, categoryId);
  if (category.archived) {
    throw new LedgerError("INVALID_STATE", `Category ${categoryId} is archived`, {
      entity: "category",
      id: categoryId,
      field: "archived",
    });
  }
  const alias = displayName(rawAlias);
  assertNotReserved(alias);
  assertKeyAvailable(alias, categories);
  return { ...category, aliases: [...category.aliases, alias] };
}

export function removeCategoryAlias(
  categories: readonly CategoryRecord[],
  categoryId: string,
  alias: string,
): CategoryRecord {
  const category = requireCategory(categories, categoryId);
  const key = categoryKey(alias);
  const remaining = category.aliases.filter((a) => categoryKey(a) !== key);
  if (remaining.length === category.aliases.length) {
    throw new LedgerError("NOT_FOUND", `Category ${categoryId} has no alias "${alias}"`, {
      entity: "category",
      id: categoryId,
      field: "alias",
    });
  }
  return { ...category, aliases: remaining };
}

/**
 * Resolve the category text of a transaction.
 *
 * Blank text and "Uncategorized" select nothing. A name or alias of an
 * active category selects it. Unknown text registers a new category,
 * unless it is one typo away from an existing one. `generateId` is
 * called only when a category is registered.
 *
 * @throws LedgerError INVALID_STATE if the text names an archived category
 * @throws LedgerError INVALID_INPUT if the text is close to an existing name
 */
export function resolveCategory(
  categories: readonly CategoryRecord[],
  raw: string | undefined,
  input: { readonly generateId: () => string; readonly vaultId: string; readonly now: string },
): CategorySelection {
  if (raw === undefined || raw.trim().length === 0) return { kind: "none" };
  const name = displayName(raw);
  const key = categoryKey(name);
  if (key === RESERVED_KEY) return { kind: "none" };

  const match = categories.find(
    (c) => categoryKey(c.name) === key || c.aliases.some((alias) => categoryKey(alias) === key),
  );
  if (match !== undefined) {
    if (match.archived) {
      throw new LedgerError("INVALID_STATE", `Category "${match.name}" is archived`, {
        entity: "category",
        id: match.id,
        field: "archived",
      });
    }
    return { kind: "existing", category: match };
  }

  return {
    kind: "created",
    category: createCategory(categories, {
      id: input.generateId(),
      vaultId: input.vaultId,
      name,
      now: input.now,
    }),
  };
}
