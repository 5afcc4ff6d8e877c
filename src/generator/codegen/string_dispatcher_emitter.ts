/**
 * String-keyed dispatcher: tags a node from a type name resolved elsewhere
 */

import {
  memberAncestors,
  type TaxonomyModel,
} from "../taxonomy/taxonomy_model.js";
import {
  baseMarkerName,
  type EmitContext,
  gateAttribute,
  markerName,
} from "./emit_context.js";

export interface DispatchArm {
  typeName: string;
  gate?: string;
  /** Classes whose markers the arm inserts, outermost first. */
  tags: readonly string[];
}

export interface StringDispatchTable {
  /** Class whose marker every name receives, known or not. */
  base: string;
  arms: readonly DispatchArm[];
}

export function buildStringDispatchTable(
  model: TaxonomyModel,
): StringDispatchTable {
  const arms: DispatchArm[] = [{ typeName: model.root, tags: [] }];
  for (const className of model.members) {
    arms.push({
      typeName: className,
      gate: model.gates.gateFor(className),
      tags: [...memberAncestors(model, className), className],
    });
  }
  return { base: model.root, arms };
}

export function dispatchTableNames(table: StringDispatchTable): Set<string> {
  return new Set(table.arms.map((arm) => arm.typeName));
}

/**
 * Markers the generated match applies for `typeName`. Names without an arm
 * fall through to the base marker alone.
 */
export function resolveDispatchTags(
  table: StringDispatchTable,
  typeName: string,
): string[] {
  const arm = table.arms.find((candidate) => candidate.typeName === typeName);
  return [table.base, ...(arm?.tags ?? [])];
}

const INDENT = "    ";

function emitArm(context: EmitContext, arm: DispatchArm): string[] {
  const pad = INDENT.repeat(2);
  const lines: string[] = [];
  if (arm.gate !== undefined) lines.push(`${pad}${gateAttribute(context, arm.gate)}`);
  if (arm.tags.length === 0) {
    lines.push(`${pad}${JSON.stringify(arm.typeName)} => {}`);
    return lines;
  }
  lines.push(`${pad}${JSON.stringify(arm.typeName)} => {`);
  for (const className of arm.tags) {
    const gate = context.model.gates.gateFor(className);
    if (gate !== undefined && gate !== arm.gate) {
      lines.push(`${pad}${INDENT}${gateAttribute(context, gate)}`);
    }
    lines.push(
      `${pad}${INDENT}entity_commands.insert(${markerName(context, className)});`,
    );
  }
  lines.push(`${pad}}`);
  return lines;
}

export function emitStringDispatcher(context: EmitContext): string {
  const table = buildStringDispatchTable(context.model);
  const lines = [
    "/// Adds markers for a node whose type name was resolved ahead of time,",
    "/// skipping the runtime probes. Names without an arm, such as classes",
    "/// defined by the game itself, only get the base marker.",
    `pub fn ${context.entryPoints.fromType}(`,
    `${INDENT}entity_commands: &mut EntityCommands,`,
    `${INDENT}type_name: &str,`,
    ") {",
    `${INDENT}entity_commands.insert(${baseMarkerName(context)});`,
    "",
    `${INDENT}match type_name {`,
  ];
  for (const arm of table.arms) {
    lines.push(...emitArm(context, arm));
  }
  lines.push(`${INDENT}${INDENT}_ => {}`);
  lines.push(`${INDENT}}`);
  lines.push("}");
  return lines.join("\n");
}
