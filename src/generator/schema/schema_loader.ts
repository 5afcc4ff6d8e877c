/**
 * Reflection dump loader: parses the class list and indexes inheritance
 */

import fs from "node:fs";
import { Ajv, type ErrorObject } from "ajv";
import { GeneratorError } from "../errors/generator_errors.js";

export interface SchemaClassEntry {
  name: string;
  inherits?: string;
}

export interface SchemaDocument {
  classes: SchemaClassEntry[];
}

/**
 * Inheritance indices keyed by class name. Children lists are sorted and
 * free of duplicates.
 */
export interface ClassGraph {
  readonly classNames: ReadonlySet<string>;
  readonly parentOf: ReadonlyMap<string, string>;
  readonly childrenOf: ReadonlyMap<string, readonly string[]>;
}

// Only the parts the generator reads are constrained; the engine dump
// carries many more keys per class.
const schemaDocumentSchema = {
  type: "object",
  required: ["classes"],
  properties: {
    classes: {
      type: "array",
      items: {
        type: "object",
        required: ["name"],
        properties: {
          name: { type: "string", minLength: 1 },
          inherits: { type: "string", minLength: 1 },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: false });
const validateSchemaDocument = ajv.compile<SchemaDocument>(
  schemaDocumentSchema,
);

function formatAjvError(error: ErrorObject | undefined): string {
  if (!error) return "document does not match the expected shape";
  const pointer = error.instancePath === "" ? "/" : error.instancePath;
  return `${pointer} ${error.message ?? "is invalid"}`;
}

export function parseSchemaDocument(
  source: string,
  filePath = "<inline>",
): SchemaDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (err) {
    throw new GeneratorError(
      "SchemaMalformed",
      `Schema is not valid JSON: ${err instanceof Error ? err.message : err}`,
      { filePath, cause: err },
    );
  }
  if (!validateSchemaDocument(raw)) {
    throw new GeneratorError(
      "SchemaMalformed",
      `Schema entry rejected: ${formatAjvError(validateSchemaDocument.errors?.[0])}`,
      {
        filePath,
        suggestion:
          "Every entry under 'classes' needs a string 'name'; regenerate the dump with --dump.",
      },
    );
  }
  return raw;
}

export function buildClassGraph(document: SchemaDocument): ClassGraph {
  const classNames = new Set<string>();
  const parentOf = new Map<string, string>();
  const children = new Map<string, Set<string>>();

  for (const entry of document.classes) {
    classNames.add(entry.name);
    if (entry.inherits === undefined) {
      parentOf.delete(entry.name);
    } else {
      parentOf.set(entry.name, entry.inherits);
    }
  }

  // Derived from the final parent map so a repeated entry cannot leave a
  // class listed under two parents.
  for (const [name, parent] of parentOf) {
    let siblings = children.get(parent);
    if (!siblings) {
      siblings = new Set();
      children.set(parent, siblings);
    }
    siblings.add(name);
  }

  const childrenOf = new Map<string, readonly string[]>();
  for (const [parent, names] of children) {
    childrenOf.set(parent, Array.from(names).sort());
  }

  return { classNames, parentOf, childrenOf };
}

export function loadSchema(filePath: string): ClassGraph {
  if (!fs.existsSync(filePath)) {
    throw new GeneratorError("SchemaMissing", "Reflection dump not found", {
      filePath,
      suggestion:
        "Run with --dump to export it from the engine, or place the file there manually.",
    });
  }
  const source = fs.readFileSync(filePath, "utf8");
  return buildClassGraph(parseSchemaDocument(source, filePath));
}
