/**
 * runsift - natural language queries over evaluation runs
 */

export { FieldCatalog } from './services/catalog.js';
export { TranslationPipeline } from './services/pipeline.js';
export type { PipelineOptions } from './services/pipeline.js';
export { LLMService } from './services/llm.js';
export type { GenerationService, LLMConfig } from './services/llm.js';
export { QueryExecutor, flattenRow } from './services/executor.js';
export { WeaveCallStore } from './services/store.js';
export type { CallStore, CallQueryRequest } from './services/store.js';
export { QueryService } from './services/query.js';
export { EvaluationHarness, loadEvalDataset } from './services/evaluation.js';
export * as grammar from './services/grammar.js';
export { createRuntime } from './runtime.js';
export { buildServer, startServer } from './server.js';
export { loadConfig } from './config.js';
export type * from './types/filter.js';
export type {
  EvalMode,
  EvalRecord,
  EvalReport,
  ExecutionOutcome,
  FieldCatalogEntry,
  QueryRequest,
  QueryResponse,
  SortClause,
  SortSpecification,
  Translation,
} from './types/models.js';
export {
  CatalogLoadError,
  SynthesisError,
  GenerationError,
  ExecutionError,
  EvaluationDatasetError,
  ConfigError,
} from './types/errors.js';
