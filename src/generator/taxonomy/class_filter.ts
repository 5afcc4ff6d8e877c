/**
 * Exclusion of classes that cannot receive generated markers
 */

export interface ExclusionTables {
  /** Name prefixes of editor-only and tooling classes. */
  excludedPrefixes: readonly string[];
  /** Individual classes never tagged, such as the taxonomy root. */
  excludedNames: readonly string[];
  /** Classes the schema lists but the consumer bindings lack. */
  unavailable: readonly string[];
}

export type ExclusionReason = "prefix" | "name" | "unavailable";

export interface ClassFilter {
  explain(className: string): ExclusionReason | null;
  filter(classes: Iterable<string>): Set<string>;
}

export function createClassFilter(tables: ExclusionTables): ClassFilter {
  const prefixes = [...tables.excludedPrefixes];
  const names = new Set(tables.excludedNames);
  const unavailable = new Set(tables.unavailable);

  const explain = (className: string): ExclusionReason | null => {
    if (prefixes.some((prefix) => className.startsWith(prefix))) {
      return "prefix";
    }
    if (names.has(className)) return "name";
    if (unavailable.has(className)) return "unavailable";
    return null;
  };

  return {
    explain,
    filter(classes) {
      const kept = new Set<string>();
      for (const name of classes) {
        if (explain(name) === null) kept.add(name);
      }
      return kept;
    },
  };
}
