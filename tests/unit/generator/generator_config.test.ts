/**
 * Unit tests for generator config loading
 */

import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENGINE_EXECUTABLES,
  loadGeneratorConfig,
  parseGeneratorConfig,
} from "../../../src/generator/config/generator_config.js";
import { GeneratorError } from "../../../src/generator/errors/generator_errors.js";
import { DEFAULT_CATEGORY_PRECEDENCE } from "../../../src/generator/taxonomy/hierarchy_categorizer.js";
import { FIXTURES_DIR, miniConfig } from "../../helpers/mini_taxonomy.js";

const CONFIG_PATH = "/project/generator.config.json";
const PATHS = {
  schema: "extension_api.json",
  markers: "out/markers.rs",
  dispatcher: "out/dispatch.rs",
  classifier: "out/classifier.gd",
  consumer: "src/plugin.rs",
};

function configError(raw: unknown): GeneratorError {
  try {
    parseGeneratorConfig(raw, CONFIG_PATH);
  } catch (err) {
    if (err instanceof GeneratorError) return err;
    throw err;
  }
  throw new Error("expected a GeneratorError");
}

describe("parseGeneratorConfig", () => {
  it("should resolve paths against the config directory", () => {
    const config = parseGeneratorConfig({ paths: PATHS }, CONFIG_PATH);
    expect(config.paths).toEqual({
      schema: path.resolve("/project/extension_api.json"),
      markers: path.resolve("/project/out/markers.rs"),
      dispatcher: path.resolve("/project/out/dispatch.rs"),
      classifier: path.resolve("/project/out/classifier.gd"),
      consumer: path.resolve("/project/src/plugin.rs"),
    });
  });

  it("should fill defaults for everything but paths", () => {
    const config = parseGeneratorConfig({ paths: PATHS }, CONFIG_PATH);
    expect(config.engineExecutables).toEqual(DEFAULT_ENGINE_EXECUTABLES);
    expect(config.taxonomy.root).toBe("Node");
    expect(config.taxonomy.categories).toEqual(DEFAULT_CATEGORY_PRECEDENCE);
    expect(config.taxonomy.catchAll).toBe("universal");
    expect(config.taxonomy.exclusions).toEqual({
      excludedPrefixes: [],
      excludedNames: [],
      unavailable: [],
    });
    expect(config.entryPoints.apply).toBe("apply_all_markers");
    expect(config.target.markerSuffix).toBe("Marker");
  });

  it("should merge partial target and entry point settings", () => {
    const config = parseGeneratorConfig(
      {
        paths: PATHS,
        target: { markerSuffix: "Tag" },
        entryPoints: { apply: "tag_node" },
      },
      CONFIG_PATH,
    );
    expect(config.target.markerSuffix).toBe("Tag");
    expect(config.target.handleType).toBe("GodotNodeHandle");
    expect(config.entryPoints.apply).toBe("tag_node");
    expect(config.entryPoints.remove).toBe("remove_all_markers");
  });

  it("should reject a config without paths", () => {
    const err = configError({});
    expect(err.code).toBe("ConfigInvalid");
    expect(err.filePath).toBe(CONFIG_PATH);
    expect(err.message).toBe(
      "Invalid generator config: / must have required property 'paths'",
    );
  });

  it("should reject unknown keys", () => {
    expect(configError({ paths: PATHS, outputDir: "gen" }).message).toBe(
      "Invalid generator config: / must NOT have additional properties",
    );
  });

  it("should reject a binding name that is not an identifier", () => {
    expect(
      configError({ paths: PATHS, nameOverrides: { HTTPRequest: "Http Request" } })
        .message,
    ).toBe(
      'Invalid generator config: /nameOverrides/HTTPRequest must match pattern "^[A-Za-z_][A-Za-z0-9_]*$"',
    );
  });

  it("should reject a category listed twice", () => {
    const err = configError({
      paths: PATHS,
      categories: [
        { id: "spatial", root: "Node3D" },
        { id: "spatial", root: "Node2D" },
      ],
    });
    expect(err.message).toBe("Category 'spatial' (root 'Node2D') is listed twice");
  });

  it("should reject a category reusing the catch-all id", () => {
    const err = configError({
      paths: PATHS,
      categories: [{ id: "universal", root: "Node3D" }],
    });
    expect(err.message).toBe("Category 'universal' reuses the catch-all id");
  });

  it("should reject a version gated category root", () => {
    const err = configError({
      paths: PATHS,
      versionGates: { "4-4": ["Node3D"] },
    });
    expect(err.message).toBe("Category root 'Node3D' cannot be version gated");
  });
});

describe("loadGeneratorConfig", () => {
  it("should load the fixture config", () => {
    const config = miniConfig();
    expect(config.paths.schema).toBe(
      path.join(FIXTURES_DIR, "schema", "mini_api.json"),
    );
    expect(config.taxonomy.exclusions.excludedPrefixes).toEqual(["Editor"]);
    expect(config.taxonomy.nameOverrides.HTTPRequest).toBe("HttpRequest");
    expect(config.taxonomy.versionGates["4-4"]).toEqual([
      "LookAtModifier3D",
      "SpringBoneSimulator3D",
    ]);
  });

  it("should report a missing config file", () => {
    expect(() =>
      loadGeneratorConfig(path.join(FIXTURES_DIR, "absent.config.json")),
    ).toThrow("Generator config not found");
  });
});
