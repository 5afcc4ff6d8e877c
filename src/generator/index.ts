/**
 * Node marker generator: reflection dump -> marker, dispatcher and
 * classifier sources
 */

export { writeArtifacts } from "./batch/artifact_writer.js";
export {
  type GenerationOptions,
  type GenerationResult,
  MarkerGenerator,
  prepareGeneration,
} from "./batch/generation_pipeline.js";
export {
  type ArtifactKind,
  type RenderedArtifact,
  emitDispatcherModule,
  renderArtifacts,
} from "./codegen/artifacts.js";
export * from "./codegen/emit_context.js";
export { emitMarkerDeclarations } from "./codegen/marker_emitter.js";
export { emitReflectiveDispatcher } from "./codegen/reflective_dispatcher_emitter.js";
export {
  buildClassifierPlan,
  type ClassifierPlan,
  classifierReturnNames,
  emitScriptClassifier,
} from "./codegen/script_classifier_emitter.js";
export {
  buildStringDispatchTable,
  dispatchTableNames,
  emitStringDispatcher,
  resolveDispatchTags,
  type StringDispatchTable,
} from "./codegen/string_dispatcher_emitter.js";
export {
  DEFAULT_CONFIG_FILE,
  type GeneratorConfig,
  loadGeneratorConfig,
  parseGeneratorConfig,
} from "./config/generator_config.js";
export { DiagnosticCollector } from "./errors/diagnostic_collector.js";
export * from "./errors/generator_errors.js";
export {
  type IntegrationResult,
  verifyIntegration,
} from "./integration/integration_verifier.js";
export {
  buildClassGraph,
  type ClassGraph,
  loadSchema,
  parseSchemaDocument,
} from "./schema/schema_loader.js";
export { acquireSchema, type ProcessRunner } from "./schema/schema_source.js";
export { createClassFilter } from "./taxonomy/class_filter.js";
export { collectDescendants } from "./taxonomy/descendant_collector.js";
export {
  type CategoryDefinition,
  categorize,
  DEFAULT_CATCH_ALL_CATEGORY,
  DEFAULT_CATEGORY_PRECEDENCE,
} from "./taxonomy/hierarchy_categorizer.js";
export { createNameNormalizer } from "./taxonomy/name_normalizer.js";
export {
  buildTaxonomyModel,
  type TaxonomyModel,
} from "./taxonomy/taxonomy_model.js";
export { createVersionGateResolver } from "./taxonomy/version_gates.js";
