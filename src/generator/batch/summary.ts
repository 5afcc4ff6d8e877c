/**
 * Human-readable run summary
 */

import path from "node:path";
import {
  type IntegrationResult,
  wiringInstructions,
} from "../integration/integration_verifier.js";
import type { GenerationResult } from "./generation_pipeline.js";

function relative(projectRoot: string, filePath: string): string {
  return path.relative(projectRoot, filePath) || filePath;
}

function integrationLines(
  integration: IntegrationResult,
  dispatcherPath: string,
  projectRoot: string,
): string[] {
  const consumer = relative(projectRoot, integration.consumerPath);
  switch (integration.status) {
    case "ok":
      return [`Integration: ${consumer} already calls ${integration.entryPoint}`];
    case "consumer-missing":
      return [`Integration: skipped, ${consumer} not found`];
    case "needs-manual-wiring":
      return [
        `Integration: ${consumer} does not call ${integration.entryPoint} yet`,
        ...wiringInstructions(
          { ...integration, consumerPath: consumer },
          relative(projectRoot, dispatcherPath),
        ).map((line) => `  ${line}`),
      ];
  }
}

export function formatSummary(
  result: GenerationResult,
  projectRoot: string,
): string {
  const { counts } = result;
  const row = (label: string, value: string | number): string =>
    `  ${`${label}:`.padEnd(22)}${value}`;
  const lines = [
    "Generation complete.",
    row("Schema classes", counts.schemaClasses),
    row("Descendants of root", counts.descendants),
    row("Tagged classes", `${counts.members} (${counts.gated} version gated)`),
  ];
  for (const id of Object.keys(counts.byCategory)) {
    lines.push(`    ${id}: ${counts.byCategory[id]}`);
  }
  lines.push("Files written:");
  for (const output of result.outputs) {
    lines.push(`  ${output.kind}: ${relative(projectRoot, output.outputPath)}`);
  }
  if (result.warnings.length > 0) {
    lines.push(`Warnings: ${result.warnings.length}`);
  }
  const dispatcher =
    result.outputs.find((output) => output.kind === "dispatcher")?.outputPath ??
    "";
  lines.push(...integrationLines(result.integration, dispatcher, projectRoot));
  return lines.join("\n");
}
