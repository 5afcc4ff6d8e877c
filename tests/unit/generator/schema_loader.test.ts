/**
 * Unit tests for reflection dump parsing
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { GeneratorError } from "../../../src/generator/errors/generator_errors.js";
import {
  buildClassGraph,
  loadSchema,
  parseSchemaDocument,
} from "../../../src/generator/schema/schema_loader.js";
import { MINI_SCHEMA_PATH } from "../../helpers/mini_taxonomy.js";

function captureError(fn: () => unknown): GeneratorError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GeneratorError) return err;
    throw err;
  }
  throw new Error("expected a GeneratorError");
}

describe("parseSchemaDocument", () => {
  it("should keep names and parents and ignore extra keys", () => {
    const doc = parseSchemaDocument(
      JSON.stringify({
        header: { version_major: 4 },
        classes: [
          { name: "Object", api_type: "core" },
          { name: "Node", inherits: "Object", methods: [] },
        ],
      }),
    );
    expect(doc.classes).toHaveLength(2);
    expect(doc.classes[1]?.inherits).toBe("Object");
  });

  it("should reject invalid JSON", () => {
    const err = captureError(() => parseSchemaDocument("{ not json", "api.json"));
    expect(err.code).toBe("SchemaMalformed");
    expect(err.filePath).toBe("api.json");
    expect(err.message.startsWith("Schema is not valid JSON: ")).toBe(true);
  });

  it("should point at an entry without a name", () => {
    const err = captureError(() =>
      parseSchemaDocument(JSON.stringify({ classes: [{ inherits: "Node" }] })),
    );
    expect(err.code).toBe("SchemaMalformed");
    expect(err.message).toBe(
      "Schema entry rejected: /classes/0 must have required property 'name'",
    );
  });

  it("should reject a name that is not a string", () => {
    const err = captureError(() =>
      parseSchemaDocument(JSON.stringify({ classes: [{ name: 5 }] })),
    );
    expect(err.message).toBe(
      "Schema entry rejected: /classes/0/name must be string",
    );
  });

  it("should reject a document without a class list", () => {
    const err = captureError(() => parseSchemaDocument("[]"));
    expect(err.message).toBe("Schema entry rejected: / must be object");
  });
});

describe("buildClassGraph", () => {
  it("should index parents and sorted children", () => {
    const graph = buildClassGraph({
      classes: [
        { name: "Object" },
        { name: "Node", inherits: "Object" },
        { name: "Timer", inherits: "Node" },
        { name: "Camera3D", inherits: "Node" },
      ],
    });
    expect(graph.classNames.size).toBe(4);
    expect(graph.parentOf.get("Timer")).toBe("Node");
    expect(graph.parentOf.has("Object")).toBe(false);
    expect(graph.childrenOf.get("Node")).toEqual(["Camera3D", "Timer"]);
  });

  it("should let a repeated entry replace the earlier parent", () => {
    const graph = buildClassGraph({
      classes: [
        { name: "A", inherits: "P1" },
        { name: "A", inherits: "P2" },
      ],
    });
    expect(graph.parentOf.get("A")).toBe("P2");
    expect(graph.childrenOf.get("P1")).toBeUndefined();
    expect(graph.childrenOf.get("P2")).toEqual(["A"]);
  });
});

describe("loadSchema", () => {
  it("should load the fixture dump", () => {
    const graph = loadSchema(MINI_SCHEMA_PATH);
    expect(graph.classNames.size).toBe(22);
    expect(graph.childrenOf.get("Node3D")).toEqual([
      "CSGBox3D",
      "Camera3D",
      "LookAtModifier3D",
      "VisualInstance3D",
    ]);
  });

  it("should report a missing file as SchemaMissing", () => {
    const missing = path.join(os.tmpdir(), "marker-gen-absent", "api.json");
    const err = captureError(() => loadSchema(missing));
    expect(err.code).toBe("SchemaMissing");
    expect(err.filePath).toBe(missing);
  });

  it("should report unreadable content as SchemaMalformed", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "marker-gen-schema-"));
    const file = path.join(dir, "api.json");
    fs.writeFileSync(file, "{}");
    try {
      const err = captureError(() => loadSchema(file));
      expect(err.code).toBe("SchemaMalformed");
      expect(err.message).toBe(
        "Schema entry rejected: / must have required property 'classes'",
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
