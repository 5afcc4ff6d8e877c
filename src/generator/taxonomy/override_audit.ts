/**
 * Reports override entries that no longer match a tagged class
 */

import { GeneratorError } from "../errors/generator_errors.js";
import { isMember, type TaxonomyModel } from "./taxonomy_model.js";

export function auditOverrides(model: TaxonomyModel): GeneratorError[] {
  const warnings: GeneratorError[] = [];

  for (const className of model.names.overriddenClasses()) {
    if (isMember(model, className)) continue;
    warnings.push(
      new GeneratorError(
        "UnknownClassInOverrideTable",
        `Name override for '${className}' matches no tagged class`,
        { suggestion: "Drop the entry from 'nameOverrides' if the class is gone." },
      ),
    );
  }

  for (const className of model.gates.gatedClasses()) {
    if (isMember(model, className)) continue;
    warnings.push(
      new GeneratorError(
        "UnknownClassInOverrideTable",
        `Version gate for '${className}' matches no tagged class`,
        { suggestion: "Drop the entry from 'versionGates' if the class is gone." },
      ),
    );
  }

  return warnings;
}
