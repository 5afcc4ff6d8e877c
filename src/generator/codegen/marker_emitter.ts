/**
 * Marker component declarations
 */

import {
  bannerLines,
  baseMarkerName,
  type EmitContext,
  gateAttribute,
  joinLines,
  markerName,
} from "./emit_context.js";

export function emitMarkerDeclarations(context: EmitContext): string {
  const { model, target } = context;
  const derive = `#[derive(${target.markerDerives.join(", ")})]`;
  const lines: string[] = [
    ...bannerLines(context, "//"),
    "",
    `use ${target.componentImport};`,
    "",
    `/// Present on every entity that mirrors a ${model.root}.`,
    derive,
    `pub struct ${baseMarkerName(context)};`,
  ];

  for (const className of model.members) {
    lines.push("");
    const gate = model.gates.gateFor(className);
    if (gate !== undefined) lines.push(gateAttribute(context, gate));
    lines.push(derive);
    lines.push(`pub struct ${markerName(context, className)};`);
  }

  return joinLines(lines);
}
