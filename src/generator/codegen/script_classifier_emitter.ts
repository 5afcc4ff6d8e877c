/**
 * Companion script classifier
 *
 * The engine's script side has cheap `is` tests, so it resolves the type
 * name itself and hands the string to the string-keyed dispatcher. The plan
 * is derived from the same categorization as the dispatchers; the emitter
 * only renders it.
 */

import {
  membersOf,
  specificityOrder,
  type TaxonomyModel,
} from "../taxonomy/taxonomy_model.js";
import { bannerLines, type EmitContext, joinLines } from "./emit_context.js";

export interface ClassifierBranch {
  root: string;
  /** Tested in order; the first match is returned. */
  probes: readonly string[];
}

export interface ClassifierPlan {
  branches: readonly ClassifierBranch[];
  /** Top-level tests after the branches. */
  direct: readonly string[];
  fallback: string;
}

export function buildClassifierPlan(model: TaxonomyModel): ClassifierPlan {
  const branches = model.branches.map((category) => ({
    root: category.root,
    probes: specificityOrder(
      model,
      membersOf(model, category.id).filter((name) => name !== category.root),
    ),
  }));
  return {
    branches,
    direct: specificityOrder(model, membersOf(model, model.catchAll)),
    fallback: model.root,
  };
}

export function classifierReturnNames(plan: ClassifierPlan): Set<string> {
  const names = new Set<string>();
  for (const branch of plan.branches) {
    for (const probe of branch.probes) names.add(probe);
    names.add(branch.root);
  }
  for (const name of plan.direct) names.add(name);
  names.add(plan.fallback);
  return names;
}

function quote(name: string): string {
  return JSON.stringify(name);
}

/**
 * `is` needs the class to exist in the running engine, so gated classes are
 * tested by name through ClassDB instead.
 */
function typeTest(context: EmitContext, className: string): string {
  if (context.model.gates.gateFor(className) === undefined) {
    return `node is ${className}`;
  }
  return `ClassDB.is_parent_class(node.get_class(), ${quote(className)})`;
}

function emitClassify(context: EmitContext, plan: ClassifierPlan): string[] {
  const root = context.model.root;
  const lines = [
    `# Returns the most specific known type name of \`node\`.`,
    `func ${context.entryPoints.classify}(node: ${root}) -> String:`,
  ];
  let first = true;
  const keyword = (): string => {
    const word = first ? "if" : "elif";
    first = false;
    return word;
  };

  for (const branch of plan.branches) {
    lines.push(`\t${keyword()} node is ${branch.root}:`);
    for (const probe of branch.probes) {
      lines.push(
        `\t\tif ${typeTest(context, probe)}: return ${quote(probe)}`,
      );
    }
    lines.push(`\t\treturn ${quote(branch.root)}`);
  }
  for (const name of plan.direct) {
    lines.push(
      `\t${keyword()} ${typeTest(context, name)}: return ${quote(name)}`,
    );
  }
  lines.push(`\treturn ${quote(plan.fallback)}`);
  return lines;
}

function emitSubtreeAnalysis(context: EmitContext): string[] {
  const { entryPoints } = context;
  const root = context.model.root;
  return [
    "# Classifies `root` and every node below it, in tree order. The two",
    "# arrays are parallel: entry i of each describes the same node.",
    `func ${entryPoints.analyzeSubtree}(root: ${root}) -> Dictionary:`,
    "\tvar instance_ids := PackedInt64Array()",
    "\tvar type_names := PackedStringArray()",
    `\tvar pending: Array[${root}] = [root]`,
    "\twhile not pending.is_empty():",
    `\t\tvar node: ${root} = pending.pop_back()`,
    "\t\tif not is_instance_valid(node):",
    "\t\t\tcontinue",
    "\t\tinstance_ids.append(node.get_instance_id())",
    `\t\ttype_names.append(${entryPoints.classify}(node))`,
    "\t\tvar children := node.get_children()",
    "\t\tfor i in range(children.size() - 1, -1, -1):",
    "\t\t\tpending.append(children[i])",
    "\treturn {",
    '\t\t"instance_ids": instance_ids,',
    '\t\t"type_names": type_names,',
    "\t}",
    "",
    `func ${entryPoints.analyzeInitialTree}() -> Dictionary:`,
    `\treturn ${entryPoints.analyzeSubtree}(get_tree().get_root())`,
  ];
}

export function emitScriptClassifier(context: EmitContext): string {
  const plan = buildClassifierPlan(context.model);
  const lines = [
    `extends ${context.model.root}`,
    `class_name ${context.target.scriptClassName}`,
    "",
    ...bannerLines(context, "#"),
    "",
    ...emitClassify(context, plan),
    "",
    ...emitSubtreeAnalysis(context),
  ];
  return joinLines(lines);
}
