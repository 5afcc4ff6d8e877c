/**
 * Settings and text helpers shared by the emitters
 */

import type { TaxonomyModel } from "../taxonomy/taxonomy_model.js";

export const GENERATED_BANNER =
  "This file is generated by node-marker-codegen. Do not edit by hand.";

export interface TargetSettings {
  markerSuffix: string;
  markerDerives: readonly string[];
  componentImport: string;
  commandsImport: string;
  /** `use` path that brings the handle type and the markers into scope. */
  handleImport: string;
  handleType: string;
  bindingsModule: string;
  gateFeaturePrefix: string;
  scriptClassName: string;
  regenerateCommand: string;
}

export interface EntryPointNames {
  apply: string;
  remove: string;
  fromType: string;
  classify: string;
  analyzeSubtree: string;
  analyzeInitialTree: string;
}

export const DEFAULT_TARGET_SETTINGS: TargetSettings = {
  markerSuffix: "Marker",
  markerDerives: ["Component", "Debug", "Clone", "Copy", "PartialEq", "Eq"],
  componentImport: "bevy::ecs::component::Component",
  commandsImport: "bevy::ecs::system::EntityCommands",
  handleImport: "crate::interop::{GodotNodeHandle, node_markers::*}",
  handleType: "GodotNodeHandle",
  bindingsModule: "godot::classes",
  gateFeaturePrefix: "api-",
  scriptClassName: "SceneTreeClassifier",
  regenerateCommand: "node-marker-codegen",
};

export const DEFAULT_ENTRY_POINTS: EntryPointNames = {
  apply: "apply_all_markers",
  remove: "remove_all_markers",
  fromType: "apply_markers_from_precomputed_type",
  classify: "classify_node",
  analyzeSubtree: "analyze_subtree",
  analyzeInitialTree: "analyze_initial_tree",
};

export interface EmitContext {
  readonly model: TaxonomyModel;
  readonly target: TargetSettings;
  readonly entryPoints: EntryPointNames;
}

export function markerName(context: EmitContext, className: string): string {
  return `${className}${context.target.markerSuffix}`;
}

export function baseMarkerName(context: EmitContext): string {
  return markerName(context, context.model.root);
}

export function gateAttribute(context: EmitContext, tag: string): string {
  return `#[cfg(feature = "${context.target.gateFeaturePrefix}${tag}")]`;
}

export function bannerLines(
  context: EmitContext,
  commentPrefix: string,
): string[] {
  return [
    `${commentPrefix} ${GENERATED_BANNER}`,
    `${commentPrefix} To regenerate: ${context.target.regenerateCommand}`,
  ];
}

export function helperName(action: string, categoryId: string): string {
  return `${action}_${categoryId}_markers`;
}

export function joinLines(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}
