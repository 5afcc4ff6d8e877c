/**
 * Generator configuration: file layout, static tables and target settings
 */

import fs from "node:fs";
import path from "node:path";
import { Ajv } from "ajv";
import type { ArtifactPaths } from "../codegen/artifacts.js";
import {
  DEFAULT_ENTRY_POINTS,
  DEFAULT_TARGET_SETTINGS,
  type EntryPointNames,
  type TargetSettings,
} from "../codegen/emit_context.js";
import { GeneratorError } from "../errors/generator_errors.js";
import {
  type CategoryDefinition,
  DEFAULT_CATCH_ALL_CATEGORY,
  DEFAULT_CATEGORY_PRECEDENCE,
} from "../taxonomy/hierarchy_categorizer.js";
import type { TaxonomySettings } from "../taxonomy/taxonomy_model.js";
import { generatorConfigSchema } from "./config_schema.js";

export const DEFAULT_CONFIG_FILE = "generator.config.json";
export const DEFAULT_TAXONOMY_ROOT = "Node";
export const DEFAULT_ENGINE_EXECUTABLES: readonly string[] = [
  "godot",
  "godot4",
  "/usr/local/bin/godot",
];

export interface GeneratorConfigFile {
  paths: ArtifactPaths & { schema: string; consumer: string };
  engineExecutables?: string[];
  taxonomyRoot?: string;
  categories?: CategoryDefinition[];
  catchAllCategory?: string;
  exclusions?: { prefixes?: string[]; names?: string[] };
  unavailable?: string[];
  nameOverrides?: Record<string, string>;
  versionGates?: Record<string, string[]>;
  entryPoints?: Partial<EntryPointNames>;
  target?: Partial<TargetSettings>;
}

export interface ResolvedPaths extends ArtifactPaths {
  schema: string;
  consumer: string;
}

export interface GeneratorConfig {
  configPath: string;
  paths: ResolvedPaths;
  engineExecutables: readonly string[];
  taxonomy: TaxonomySettings;
  target: TargetSettings;
  entryPoints: EntryPointNames;
}

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<GeneratorConfigFile>(
  generatorConfigSchema,
);

function configError(
  message: string,
  configPath: string,
  suggestion?: string,
): GeneratorError {
  return new GeneratorError("ConfigInvalid", message, {
    filePath: configPath,
    suggestion,
  });
}

function checkCategories(
  categories: readonly CategoryDefinition[],
  catchAll: string,
  gatedClasses: ReadonlySet<string>,
  configPath: string,
): void {
  const ids = new Set<string>();
  const roots = new Set<string>();
  for (const category of categories) {
    if (category.id === catchAll) {
      throw configError(
        `Category '${category.id}' reuses the catch-all id`,
        configPath,
      );
    }
    if (ids.has(category.id) || roots.has(category.root)) {
      throw configError(
        `Category '${category.id}' (root '${category.root}') is listed twice`,
        configPath,
      );
    }
    if (gatedClasses.has(category.root)) {
      throw configError(
        `Category root '${category.root}' cannot be version gated`,
        configPath,
        "Branch probes are not conditionally compiled; ungate the root or drop the category.",
      );
    }
    ids.add(category.id);
    roots.add(category.root);
  }
}

export function parseGeneratorConfig(
  raw: unknown,
  configPath: string,
): GeneratorConfig {
  if (!validateConfigFile(raw)) {
    const details = (validateConfigFile.errors ?? [])
      .map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
      .join("; ");
    throw configError(`Invalid generator config: ${details}`, configPath);
  }

  const baseDir = path.dirname(configPath);
  const resolve = (p: string): string => path.resolve(baseDir, p);
  const versionGates = raw.versionGates ?? {};
  const categories = raw.categories ?? [...DEFAULT_CATEGORY_PRECEDENCE];
  const catchAll = raw.catchAllCategory ?? DEFAULT_CATCH_ALL_CATEGORY;
  checkCategories(
    categories,
    catchAll,
    new Set(Object.values(versionGates).flat()),
    configPath,
  );

  return {
    configPath,
    paths: {
      schema: resolve(raw.paths.schema),
      markers: resolve(raw.paths.markers),
      dispatcher: resolve(raw.paths.dispatcher),
      classifier: resolve(raw.paths.classifier),
      consumer: resolve(raw.paths.consumer),
    },
    engineExecutables: raw.engineExecutables ?? DEFAULT_ENGINE_EXECUTABLES,
    taxonomy: {
      root: raw.taxonomyRoot ?? DEFAULT_TAXONOMY_ROOT,
      exclusions: {
        excludedPrefixes: raw.exclusions?.prefixes ?? [],
        excludedNames: raw.exclusions?.names ?? [],
        unavailable: raw.unavailable ?? [],
      },
      categories,
      catchAll,
      versionGates,
      nameOverrides: raw.nameOverrides ?? {},
    },
    target: { ...DEFAULT_TARGET_SETTINGS, ...raw.target },
    entryPoints: { ...DEFAULT_ENTRY_POINTS, ...raw.entryPoints },
  };
}

export function loadGeneratorConfig(configPath: string): GeneratorConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw configError(
      "Generator config not found",
      resolved,
      `Create ${DEFAULT_CONFIG_FILE} in the project root or pass --config <path>.`,
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw configError(
      `Generator config is not valid JSON: ${err instanceof Error ? err.message : err}`,
      resolved,
    );
  }
  return parseGeneratorConfig(raw, resolved);
}
