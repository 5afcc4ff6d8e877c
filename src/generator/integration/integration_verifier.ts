/**
 * Checks whether the consumer already calls the generated dispatcher
 */

import fs from "node:fs";
import { GeneratorError } from "../errors/generator_errors.js";

export type IntegrationStatus = "ok" | "needs-manual-wiring" | "consumer-missing";

export interface IntegrationResult {
  status: IntegrationStatus;
  consumerPath: string;
  entryPoint: string;
  warning?: GeneratorError;
}

/**
 * Read-only: the consumer file is never modified.
 */
export function verifyIntegration(
  consumerPath: string,
  entryPoint: string,
): IntegrationResult {
  if (!fs.existsSync(consumerPath)) {
    return {
      status: "consumer-missing",
      consumerPath,
      entryPoint,
      warning: new GeneratorError(
        "ConsumerFileMissing",
        "Consumer file not found; skipped the wiring check",
        { filePath: consumerPath },
      ),
    };
  }
  const source = fs.readFileSync(consumerPath, "utf8");
  return {
    status: source.includes(entryPoint) ? "ok" : "needs-manual-wiring",
    consumerPath,
    entryPoint,
  };
}

export function wiringInstructions(
  result: IntegrationResult,
  dispatcherPath: string,
): string[] {
  return [
    `1. Bring ${result.entryPoint} from ${dispatcherPath} into scope`,
    `2. Call ${result.entryPoint} wherever ${result.consumerPath} tags new nodes`,
    "3. This is a one-time step; later runs only regenerate the files",
  ];
}
