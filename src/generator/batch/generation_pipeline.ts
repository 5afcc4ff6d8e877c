/**
 * Generation pipeline orchestrator
 */

import {
  type ArtifactKind,
  type RenderedArtifact,
  renderArtifacts,
} from "../codegen/artifacts.js";
import type { EmitContext } from "../codegen/emit_context.js";
import {
  type GeneratorConfig,
  loadGeneratorConfig,
} from "../config/generator_config.js";
import { DiagnosticCollector } from "../errors/diagnostic_collector.js";
import type { GeneratorError } from "../errors/generator_errors.js";
import {
  type IntegrationResult,
  verifyIntegration,
} from "../integration/integration_verifier.js";
import { type ClassGraph, loadSchema } from "../schema/schema_loader.js";
import { acquireSchema, type ProcessRunner } from "../schema/schema_source.js";
import { createClassFilter } from "../taxonomy/class_filter.js";
import { collectDescendants } from "../taxonomy/descendant_collector.js";
import { auditOverrides } from "../taxonomy/override_audit.js";
import {
  buildTaxonomyModel,
  categoryCounts,
  type TaxonomyModel,
} from "../taxonomy/taxonomy_model.js";
import { type FileSystemOps, writeArtifacts } from "./artifact_writer.js";

export interface GenerationOptions {
  configPath: string;
  /** Export a fresh reflection dump from the engine before generating. */
  dump?: boolean;
  verbose?: boolean;
  runner?: ProcessRunner;
  fileSystem?: FileSystemOps;
}

export interface GenerationCounts {
  schemaClasses: number;
  descendants: number;
  members: number;
  gated: number;
  byCategory: Record<string, number>;
}

export interface GenerationResult {
  counts: GenerationCounts;
  outputs: Array<{ kind: ArtifactKind; outputPath: string }>;
  warnings: GeneratorError[];
  integration: IntegrationResult;
  dumpedWith: string | null;
}

export interface PreparedGeneration {
  model: TaxonomyModel;
  artifacts: RenderedArtifact[];
  warnings: GeneratorError[];
}

/**
 * Pure part of the run: model and rendered files for an already loaded
 * schema. Nothing is written.
 */
export function prepareGeneration(
  graph: ClassGraph,
  config: GeneratorConfig,
): PreparedGeneration {
  const model = buildTaxonomyModel(graph, config.taxonomy);
  const context: EmitContext = {
    model,
    target: config.target,
    entryPoints: config.entryPoints,
  };
  return {
    model,
    artifacts: renderArtifacts(context, config.paths),
    warnings: auditOverrides(model),
  };
}

export class MarkerGenerator {
  generate(options: GenerationOptions): GenerationResult {
    const diagnostics = new DiagnosticCollector();
    const config = loadGeneratorConfig(options.configPath);

    const dumpedWith = acquireSchema({
      schemaPath: config.paths.schema,
      dump: options.dump === true,
      executables: config.engineExecutables,
      runner: options.runner,
      verbose: options.verbose,
    });
    const graph = loadSchema(config.paths.schema);

    const { model, artifacts, warnings } = prepareGeneration(graph, config);
    diagnostics.addAll(warnings);
    if (options.verbose) this.logExclusions(graph, config);

    writeArtifacts(artifacts, options.fileSystem);

    const integration = verifyIntegration(
      config.paths.consumer,
      config.entryPoints.apply,
    );
    if (integration.warning) diagnostics.add(integration.warning);

    return {
      counts: {
        schemaClasses: graph.classNames.size,
        descendants: model.descendantCount,
        members: model.members.length,
        gated: model.members.filter(
          (name) => model.gates.gateFor(name) !== undefined,
        ).length,
        byCategory: Object.fromEntries(categoryCounts(model)),
      },
      outputs: artifacts.map(({ kind, outputPath }) => ({ kind, outputPath })),
      warnings: diagnostics.getWarnings(),
      integration,
      dumpedWith,
    };
  }

  private logExclusions(graph: ClassGraph, config: GeneratorConfig): void {
    const filter = createClassFilter(config.taxonomy.exclusions);
    const descendants = collectDescendants(
      config.taxonomy.root,
      graph.childrenOf,
    );
    for (const name of Array.from(descendants).sort()) {
      const reason = filter.explain(name);
      if (reason) console.log(`Excluded ${name} (${reason})`);
    }
  }
}
