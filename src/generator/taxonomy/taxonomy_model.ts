/**
 * Taxonomy model shared by every emitter
 */

import { GeneratorError } from "../errors/generator_errors.js";
import type { ClassGraph } from "../schema/schema_loader.js";
import { createClassFilter, type ExclusionTables } from "./class_filter.js";
import {
  ancestorsOf,
  collectDescendants,
  restrictParentMap,
} from "./descendant_collector.js";
import {
  activeCategories,
  type CategoryDefinition,
  categorize,
} from "./hierarchy_categorizer.js";
import {
  createNameNormalizer,
  type NameNormalizer,
  type NameOverrides,
} from "./name_normalizer.js";
import {
  createVersionGateResolver,
  type VersionGateResolver,
  type VersionGateTable,
} from "./version_gates.js";

export interface TaxonomySettings {
  root: string;
  exclusions: ExclusionTables;
  categories: readonly CategoryDefinition[];
  catchAll: string;
  versionGates: VersionGateTable;
  nameOverrides: NameOverrides;
}

export interface TaxonomyModel {
  readonly root: string;
  /** Every descendant of the root, before filtering. */
  readonly descendantCount: number;
  /** Tagged classes, sorted, root excluded. */
  readonly members: readonly string[];
  /** Parent links inside the root's subtree; the root itself has none. */
  readonly parentOf: ReadonlyMap<string, string>;
  readonly categoryOf: ReadonlyMap<string, string>;
  /** Categories with a dispatcher branch, in precedence order. */
  readonly branches: readonly CategoryDefinition[];
  readonly catchAll: string;
  readonly gates: VersionGateResolver;
  readonly names: NameNormalizer;
}

export function buildTaxonomyModel(
  graph: ClassGraph,
  settings: TaxonomySettings,
): TaxonomyModel {
  if (!graph.classNames.has(settings.root)) {
    throw new GeneratorError(
      "SchemaMalformed",
      `Taxonomy root '${settings.root}' is not declared in the schema`,
      { suggestion: "Check 'taxonomyRoot' in the generator config." },
    );
  }

  const descendants = collectDescendants(settings.root, graph.childrenOf);
  const parentOf = restrictParentMap(graph.parentOf, descendants);
  parentOf.delete(settings.root);
  const filtered = createClassFilter(settings.exclusions).filter(descendants);
  filtered.delete(settings.root);
  const members = Array.from(filtered).sort();

  // A category whose root was filtered out would have no branch to probe,
  // so its classes are categorized as if it did not exist.
  const eligible = settings.categories.filter((category) =>
    filtered.has(category.root),
  );
  const categoryOf = categorize(
    members,
    parentOf,
    eligible,
    settings.catchAll,
  );

  return {
    root: settings.root,
    descendantCount: descendants.size,
    members: Object.freeze(members),
    parentOf,
    categoryOf,
    branches: Object.freeze(activeCategories(eligible, categoryOf)),
    catchAll: settings.catchAll,
    gates: createVersionGateResolver(settings.versionGates),
    names: createNameNormalizer(settings.nameOverrides),
  };
}

export function membersOf(model: TaxonomyModel, categoryId: string): string[] {
  return model.members.filter(
    (name) => model.categoryOf.get(name) === categoryId,
  );
}

export function isMember(model: TaxonomyModel, className: string): boolean {
  return model.categoryOf.has(className);
}

/**
 * Tagged ancestors of a class, outermost first.
 */
export function memberAncestors(
  model: TaxonomyModel,
  className: string,
): string[] {
  return ancestorsOf(className, model.parentOf)
    .filter((name) => isMember(model, name))
    .reverse();
}

export function depthOf(model: TaxonomyModel, className: string): number {
  return ancestorsOf(className, model.parentOf).length;
}

/**
 * Deepest classes first so an `is` test never shadows a subclass, then by
 * name.
 */
export function specificityOrder(
  model: TaxonomyModel,
  classNames: readonly string[],
): string[] {
  return [...classNames].sort((a, b) => {
    const byDepth = depthOf(model, b) - depthOf(model, a);
    if (byDepth !== 0) return byDepth;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

export function categoryCounts(model: TaxonomyModel): Map<string, number> {
  const counts = new Map<string, number>();
  for (const category of model.branches) counts.set(category.id, 0);
  counts.set(model.catchAll, 0);
  for (const name of model.members) {
    const id = model.categoryOf.get(name);
    if (id === undefined) continue;
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
}
