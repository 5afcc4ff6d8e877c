/**
 * Hierarchy categorizer
 *
 * Splits the taxonomy into the branches the dispatchers probe first. A class
 * may sit under more than one category root when roots are nested, so the
 * order of the precedence list decides: the first category whose root is the
 * class itself or one of its ancestors wins.
 */

import { ancestorsOf } from "./descendant_collector.js";

export interface CategoryDefinition {
  id: string;
  root: string;
}

export const DEFAULT_CATEGORY_PRECEDENCE: readonly CategoryDefinition[] = [
  { id: "spatial", root: "Node3D" },
  { id: "planar", root: "Node2D" },
  { id: "interactive_surface", root: "Control" },
];

export const DEFAULT_CATCH_ALL_CATEGORY = "universal";

export function categoryFor(
  className: string,
  parentOf: ReadonlyMap<string, string>,
  precedence: readonly CategoryDefinition[],
  catchAll: string,
): string {
  const lineage = new Set([className, ...ancestorsOf(className, parentOf)]);
  for (const category of precedence) {
    if (lineage.has(category.root)) return category.id;
  }
  return catchAll;
}

export function categorize(
  classes: Iterable<string>,
  parentOf: ReadonlyMap<string, string>,
  precedence: readonly CategoryDefinition[] = DEFAULT_CATEGORY_PRECEDENCE,
  catchAll: string = DEFAULT_CATCH_ALL_CATEGORY,
): Map<string, string> {
  const result = new Map<string, string>();
  for (const name of Array.from(classes).sort()) {
    result.set(name, categoryFor(name, parentOf, precedence, catchAll));
  }
  return result;
}

/**
 * Categories that get their own dispatcher branch: the root must be tagged
 * and must not have been claimed by an earlier category.
 */
export function activeCategories(
  precedence: readonly CategoryDefinition[],
  categoryOf: ReadonlyMap<string, string>,
): CategoryDefinition[] {
  return precedence.filter(
    (category) => categoryOf.get(category.root) === category.id,
  );
}
