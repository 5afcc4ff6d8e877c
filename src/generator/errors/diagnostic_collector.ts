/**
 * Non-fatal diagnostics gathered during a run
 */

import type { GeneratorError } from "./generator_errors.js";

export class DiagnosticCollector {
  private warnings: GeneratorError[] = [];

  add(warning: GeneratorError): void {
    this.warnings.push(warning);
  }

  addAll(warnings: Iterable<GeneratorError>): void {
    for (const warning of warnings) this.add(warning);
  }

  getWarnings(): GeneratorError[] {
    return [...this.warnings];
  }
}
