/**
 * Reflective dispatcher: tags a live node by probing its type at runtime
 *
 * Probing every known class per node is expensive, so the generated code
 * first probes the category roots and then only the members of the branch
 * that matched. The catch-all members are always probed.
 */

import {
  memberAncestors,
  membersOf,
  type TaxonomyModel,
} from "../taxonomy/taxonomy_model.js";
import {
  baseMarkerName,
  type EmitContext,
  gateAttribute,
  helperName,
  markerName,
} from "./emit_context.js";

const INDENT = "    ";

function probeExpression(context: EmitContext, className: string): string {
  const binding = context.model.names.bindingName(className);
  return `node.try_get::<${context.target.bindingsModule}::${binding}>().is_some()`;
}

function insertLines(
  context: EmitContext,
  classNames: readonly string[],
  indent: string,
): string[] {
  const lines: string[] = [];
  for (const className of classNames) {
    const gate = context.model.gates.gateFor(className);
    if (gate !== undefined) lines.push(`${indent}${gateAttribute(context, gate)}`);
    lines.push(
      `${indent}entity_commands.insert(${markerName(context, className)});`,
    );
  }
  return lines;
}

/**
 * Members probed by a category helper. A branch root was already matched by
 * the branch probe itself.
 */
function probedMembers(model: TaxonomyModel, categoryId: string): string[] {
  const branch = model.branches.find((category) => category.id === categoryId);
  return membersOf(model, categoryId).filter(
    (name) => name !== branch?.root,
  );
}

function helperSignature(
  context: EmitContext,
  name: string,
  usesNode: boolean,
): string[] {
  return [
    `fn ${name}(`,
    `${INDENT}entity_commands: &mut EntityCommands,`,
    `${INDENT}${usesNode ? "node" : "_node"}: &mut ${context.target.handleType},`,
    ") {",
  ];
}

function emitApplyHelper(context: EmitContext, categoryId: string): string[] {
  const members = probedMembers(context.model, categoryId);
  const lines = helperSignature(
    context,
    helperName("apply", categoryId),
    members.length > 0,
  );
  for (const className of members) {
    const gate = context.model.gates.gateFor(className);
    if (gate !== undefined) {
      lines.push(`${INDENT}${gateAttribute(context, gate)}`);
    }
    lines.push(`${INDENT}if ${probeExpression(context, className)} {`);
    lines.push(
      `${INDENT}${INDENT}entity_commands.insert(${markerName(context, className)});`,
    );
    lines.push(`${INDENT}}`);
  }
  lines.push("}");
  return lines;
}

function removeChain(context: EmitContext, classNames: string[]): string[] {
  const lines = [`${INDENT}entity_commands`];
  classNames.forEach((className, index) => {
    const terminator = index === classNames.length - 1 ? ";" : "";
    lines.push(
      `${INDENT}${INDENT}.remove::<${markerName(context, className)}>()${terminator}`,
    );
  });
  return lines;
}

function emitRemoveHelper(context: EmitContext, categoryId: string): string[] {
  const { model } = context;
  const ungated: string[] = [];
  const gated = new Map<string, string[]>();
  for (const className of membersOf(model, categoryId)) {
    const gate = model.gates.gateFor(className);
    if (gate === undefined) {
      ungated.push(className);
      continue;
    }
    const group = gated.get(gate) ?? [];
    group.push(className);
    gated.set(gate, group);
  }

  const name = helperName("remove", categoryId);
  if (ungated.length === 0 && gated.size === 0) {
    return [`fn ${name}(_entity_commands: &mut EntityCommands) {}`];
  }

  const lines = [`fn ${name}(entity_commands: &mut EntityCommands) {`];
  if (ungated.length > 0) lines.push(...removeChain(context, ungated));
  for (const gate of Array.from(gated.keys()).sort()) {
    lines.push(`${INDENT}${gateAttribute(context, gate)}`);
    lines.push(...removeChain(context, gated.get(gate) ?? []));
  }
  lines.push("}");
  return lines;
}

function emitApplyAll(context: EmitContext): string[] {
  const { model, target, entryPoints } = context;
  const lines = [
    `/// Adds every marker that applies to \`node\`, probing in full only the`,
    "/// branch of the hierarchy the node belongs to.",
    `pub fn ${entryPoints.apply}(`,
    `${INDENT}entity_commands: &mut EntityCommands,`,
    `${INDENT}node: &mut ${target.handleType},`,
    ") {",
    `${INDENT}entity_commands.insert(${baseMarkerName(context)});`,
    "",
  ];

  model.branches.forEach((category, index) => {
    const keyword = index === 0 ? `${INDENT}if` : `${INDENT}} else if`;
    lines.push(`${keyword} ${probeExpression(context, category.root)} {`);
    const branchTags = [...memberAncestors(model, category.root), category.root];
    lines.push(...insertLines(context, branchTags, `${INDENT}${INDENT}`));
    lines.push(
      `${INDENT}${INDENT}${helperName("apply", category.id)}(entity_commands, node);`,
    );
  });
  if (model.branches.length > 0) {
    lines.push(`${INDENT}}`);
    lines.push("");
  }

  lines.push(
    `${INDENT}${helperName("apply", model.catchAll)}(entity_commands, node);`,
  );
  lines.push("}");
  return lines;
}

function emitRemoveAll(context: EmitContext): string[] {
  const { model, entryPoints } = context;
  const lines = [
    `/// Removes every marker \`${entryPoints.apply}\` or \`${entryPoints.fromType}\``,
    "/// can add, without knowing which ones were applied.",
    `pub fn ${entryPoints.remove}(entity_commands: &mut EntityCommands) {`,
    `${INDENT}entity_commands.remove::<${baseMarkerName(context)}>();`,
  ];
  for (const categoryId of helperCategoryIds(model)) {
    lines.push(`${INDENT}${helperName("remove", categoryId)}(entity_commands);`);
  }
  lines.push("}");
  return lines;
}

export function helperCategoryIds(model: TaxonomyModel): string[] {
  return [...model.branches.map((category) => category.id), model.catchAll];
}

export function emitReflectiveDispatcher(context: EmitContext): string {
  const blocks: string[][] = [emitApplyAll(context), emitRemoveAll(context)];
  for (const categoryId of helperCategoryIds(context.model)) {
    blocks.push(emitApplyHelper(context, categoryId));
    blocks.push(emitRemoveHelper(context, categoryId));
  }
  return blocks.map((block) => block.join("\n")).join("\n\n");
}
