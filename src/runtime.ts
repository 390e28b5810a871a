/**
 * Wires catalog, generation service, pipeline, executor and query service
 * from configuration.
 */

import type { Config } from './config.js';
import { FieldCatalog } from './services/catalog.js';
import { LLMService, type GenerationService } from './services/llm.js';
import { TranslationPipeline } from './services/pipeline.js';
import { QueryExecutor } from './services/executor.js';
import { WeaveCallStore, type CallStore } from './services/store.js';
import { QueryService } from './services/query.js';
import { ConfigError } from './types/errors.js';

export interface Runtime {
  catalog: FieldCatalog;
  pipeline: TranslationPipeline;
  executor: QueryExecutor;
  queryService: QueryService;
}

export interface RuntimeOverrides {
  generator?: GenerationService;
  store?: CallStore;
}

/**
 * Store that fails every query; used when no project is configured so that
 * translation still works and execution reports an explicit error.
 */
class UnconfiguredCallStore implements CallStore {
  async queryCalls(): Promise<never> {
    throw new ConfigError('WEAVE_PROJECT is required to execute queries');
  }
}

export function createStore(config: Config): CallStore {
  if (!config.WEAVE_PROJECT) {
    return new UnconfiguredCallStore();
  }
  return new WeaveCallStore({
    baseUrl: config.WEAVE_TRACE_URL,
    project: config.WEAVE_PROJECT,
    apiKey: config.WANDB_API_KEY,
    opNames: config.WEAVE_OP_NAME ? [config.WEAVE_OP_NAME] : undefined,
  });
}

/**
 * Load the catalog (fatal on failure) and build the services around it.
 *
 * @throws CatalogLoadError if the catalog cannot be loaded
 */
export async function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const catalog = await FieldCatalog.load(config.FIELD_CATALOG_PATH);
  const generator = overrides.generator ?? new LLMService(config.LLM_CONFIG);
  const pipeline = new TranslationPipeline(catalog, generator);
  const executor = new QueryExecutor(overrides.store ?? createStore(config), {
    limit: config.RESULT_LIMIT,
  });
  const queryService = new QueryService(pipeline, executor);

  return { catalog, pipeline, executor, queryService };
}
