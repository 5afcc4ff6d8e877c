/**
 * Renders the generated file set in memory
 */

import {
  bannerLines,
  type EmitContext,
  joinLines,
} from "./emit_context.js";
import { emitMarkerDeclarations } from "./marker_emitter.js";
import { emitReflectiveDispatcher } from "./reflective_dispatcher_emitter.js";
import { emitScriptClassifier } from "./script_classifier_emitter.js";
import { emitStringDispatcher } from "./string_dispatcher_emitter.js";

export type ArtifactKind = "markers" | "dispatcher" | "classifier";

export interface ArtifactPaths {
  markers: string;
  dispatcher: string;
  classifier: string;
}

export interface RenderedArtifact {
  kind: ArtifactKind;
  outputPath: string;
  content: string;
}

export function emitDispatcherModule(context: EmitContext): string {
  return joinLines([
    ...bannerLines(context, "//"),
    "",
    `use ${context.target.commandsImport};`,
    `use ${context.target.handleImport};`,
    "",
    emitReflectiveDispatcher(context),
    "",
    emitStringDispatcher(context),
  ]);
}

export function renderArtifacts(
  context: EmitContext,
  paths: ArtifactPaths,
): RenderedArtifact[] {
  return [
    {
      kind: "markers",
      outputPath: paths.markers,
      content: emitMarkerDeclarations(context),
    },
    {
      kind: "dispatcher",
      outputPath: paths.dispatcher,
      content: emitDispatcherModule(context),
    },
    {
      kind: "classifier",
      outputPath: paths.classifier,
      content: emitScriptClassifier(context),
    },
  ];
}
