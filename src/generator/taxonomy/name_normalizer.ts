/**
 * Schema class name -> identifier exposed by the target bindings
 */

export type NameOverrides = Readonly<Record<string, string>>;

export interface NameNormalizer {
  bindingName(className: string): string;
  overriddenClasses(): string[];
}

export function createNameNormalizer(overrides: NameOverrides): NameNormalizer {
  const table = new Map(Object.entries(overrides));
  return {
    bindingName: (className) => table.get(className) ?? className,
    overriddenClasses: () => Array.from(table.keys()).sort(),
  };
}
