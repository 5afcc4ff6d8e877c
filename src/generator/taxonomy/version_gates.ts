/**
 * Minimum engine API version per class
 */

import { GeneratorError } from "../errors/generator_errors.js";

/** Gate tag -> classes that need it, e.g. `{ "4-4": ["LookAtModifier3D"] }`. */
export type VersionGateTable = Readonly<Record<string, readonly string[]>>;

export interface VersionGateResolver {
  gateFor(className: string): string | undefined;
  gatedClasses(): string[];
}

export function createVersionGateResolver(
  table: VersionGateTable,
): VersionGateResolver {
  const byClass = new Map<string, string>();
  for (const tag of Object.keys(table).sort()) {
    for (const className of table[tag] ?? []) {
      const existing = byClass.get(className);
      if (existing !== undefined && existing !== tag) {
        throw new GeneratorError(
          "ConfigInvalid",
          `Class '${className}' is gated by both '${existing}' and '${tag}'`,
          { suggestion: "Keep the class under a single gate tag." },
        );
      }
      byClass.set(className, tag);
    }
  }

  return {
    gateFor: (className) => byClass.get(className),
    gatedClasses: () => Array.from(byClass.keys()).sort(),
  };
}
