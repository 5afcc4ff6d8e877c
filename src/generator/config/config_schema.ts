/**
 * JSON Schema for generator.config.json
 */

const stringList = { type: "array", items: { type: "string", minLength: 1 } };
const identifier = { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" };
const categoryId = { type: "string", pattern: "^[a-z][a-z0-9_]*$" };

export const generatorConfigSchema = {
  type: "object",
  additionalProperties: false,
  required: ["paths"],
  properties: {
    $schema: { type: "string" },
    paths: {
      type: "object",
      additionalProperties: false,
      required: ["schema", "markers", "dispatcher", "classifier", "consumer"],
      properties: {
        schema: { type: "string", minLength: 1 },
        markers: { type: "string", minLength: 1 },
        dispatcher: { type: "string", minLength: 1 },
        classifier: { type: "string", minLength: 1 },
        consumer: { type: "string", minLength: 1 },
      },
    },
    engineExecutables: stringList,
    taxonomyRoot: identifier,
    categories: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["id", "root"],
        properties: { id: categoryId, root: identifier },
      },
    },
    catchAllCategory: categoryId,
    exclusions: {
      type: "object",
      additionalProperties: false,
      properties: { prefixes: stringList, names: stringList },
    },
    unavailable: stringList,
    nameOverrides: {
      type: "object",
      additionalProperties: identifier,
    },
    versionGates: {
      type: "object",
      propertyNames: { type: "string", pattern: "^[A-Za-z0-9_-]+$" },
      additionalProperties: stringList,
    },
    entryPoints: {
      type: "object",
      additionalProperties: false,
      properties: {
        apply: identifier,
        remove: identifier,
        fromType: identifier,
        classify: identifier,
        analyzeSubtree: identifier,
        analyzeInitialTree: identifier,
      },
    },
    target: {
      type: "object",
      additionalProperties: false,
      properties: {
        markerSuffix: { type: "string", pattern: "^[A-Za-z0-9_]*$" },
        markerDerives: stringList,
        componentImport: { type: "string", minLength: 1 },
        commandsImport: { type: "string", minLength: 1 },
        handleImport: { type: "string", minLength: 1 },
        handleType: identifier,
        bindingsModule: { type: "string", minLength: 1 },
        gateFeaturePrefix: { type: "string" },
        scriptClassName: identifier,
        regenerateCommand: { type: "string", minLength: 1 },
      },
    },
  },
} as const;
