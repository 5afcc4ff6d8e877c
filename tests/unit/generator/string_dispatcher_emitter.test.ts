/**
 * Unit tests for the string-keyed dispatcher
 */

import { describe, expect, it } from "vitest";
import {
  buildStringDispatchTable,
  emitStringDispatcher,
  resolveDispatchTags,
} from "../../../src/generator/codegen/string_dispatcher_emitter.js";
import {
  itemLines,
  miniContext,
  miniModel,
} from "../../helpers/mini_taxonomy.js";

describe("buildStringDispatchTable", () => {
  const table = buildStringDispatchTable(miniModel());

  it("should have one arm for the root and one per tagged class", () => {
    expect(table.base).toBe("Node");
    expect(table.arms).toHaveLength(17);
    expect(table.arms[0]).toEqual({ typeName: "Node", tags: [] });
  });

  it("should tag a class with its tagged ancestors and itself", () => {
    expect(resolveDispatchTags(table, "Sprite2D")).toEqual([
      "Node",
      "CanvasItem",
      "Node2D",
      "Sprite2D",
    ]);
    expect(resolveDispatchTags(table, "Button")).toEqual([
      "Node",
      "CanvasItem",
      "Control",
      "BaseButton",
      "Button",
    ]);
    expect(resolveDispatchTags(table, "SoftBody3D")).toEqual([
      "Node",
      "Node3D",
      "VisualInstance3D",
      "GeometryInstance3D",
      "MeshInstance3D",
      "SoftBody3D",
    ]);
  });

  it("should give the root only the base marker", () => {
    expect(resolveDispatchTags(table, "Node")).toEqual(["Node"]);
  });

  it("should fall back to the base marker for unknown names", () => {
    expect(resolveDispatchTags(table, "PlayerController")).toEqual(["Node"]);
    expect(resolveDispatchTags(table, "EditorPlugin")).toEqual(["Node"]);
  });

  it("should carry the gate of a gated class", () => {
    const arm = table.arms.find((candidate) => candidate.typeName === "LookAtModifier3D");
    expect(arm?.gate).toBe("4-4");
  });
});

describe("emitStringDispatcher", () => {
  const output = emitStringDispatcher(miniContext());
  const fn = itemLines(output, "pub fn apply_markers_from_precomputed_type(");

  it("should insert the base marker before matching", () => {
    expect(fn.slice(0, 7)).toEqual([
      "pub fn apply_markers_from_precomputed_type(",
      "    entity_commands: &mut EntityCommands,",
      "    type_name: &str,",
      ") {",
      "    entity_commands.insert(NodeMarker);",
      "",
      "    match type_name {",
    ]);
  });

  it("should render the root arm empty and end with a wildcard", () => {
    expect(fn[7]).toBe('        "Node" => {}');
    expect(fn.slice(-3)).toEqual(["        _ => {}", "    }", "}"]);
  });

  it("should render arms in member order with every tag", () => {
    expect(fn.slice(8, 18)).toEqual([
      '        "BaseButton" => {',
      "            entity_commands.insert(CanvasItemMarker);",
      "            entity_commands.insert(ControlMarker);",
      "            entity_commands.insert(BaseButtonMarker);",
      "        }",
      '        "Button" => {',
      "            entity_commands.insert(CanvasItemMarker);",
      "            entity_commands.insert(ControlMarker);",
      "            entity_commands.insert(BaseButtonMarker);",
      "            entity_commands.insert(ButtonMarker);",
    ]);
  });

  it("should gate the arm of a gated class", () => {
    expect(output).toContain(
      [
        '        #[cfg(feature = "api-4-4")]',
        '        "LookAtModifier3D" => {',
        "            entity_commands.insert(Node3DMarker);",
        "            entity_commands.insert(LookAtModifier3DMarker);",
        "        }",
      ].join("\n"),
    );
  });

  it("should key arms by schema name", () => {
    expect(output).toContain('        "CPUParticles2D" => {');
    expect(output).not.toContain('"CpuParticles2D"');
  });
});
