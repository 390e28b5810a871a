/**
 * Request/response orchestration shared by the HTTP routes and the CLI.
 *
 * Each call carries its own request and returns its own response; nothing
 * about an in-flight query is kept on the service.
 */

import type { TranslationPipeline } from './pipeline.js';
import type { QueryExecutor } from './executor.js';
import type { QueryRequest, QueryResponse, Translation } from '../types/models.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export class QueryService {
  private readonly log: Logger;

  constructor(
    private readonly pipeline: TranslationPipeline,
    private readonly executor: QueryExecutor,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'query' });
  }

  /**
   * Translate without executing.
   *
   * @throws SynthesisError | GenerationError from the pipeline
   */
  async explain(request: QueryRequest): Promise<Translation> {
    this.log.info(`Explaining query: ${request.query}`);
    return this.pipeline.translate(request.query);
  }

  /**
   * Translate and execute.
   *
   * Translation failures propagate. Store failures come back with status
   * "error", no rows and the error message.
   */
  async run(request: QueryRequest): Promise<QueryResponse> {
    const startTime = Date.now();
    this.log.info(`Running query: ${request.query}`);

    const translation = await this.pipeline.translate(request.query);
    const outcome = await this.executor.execute(translation.filter, translation.sort);

    const response: QueryResponse = {
      ...translation,
      status: outcome.status,
      rows: outcome.rows,
      row_count: outcome.rows.length,
      execution_time_ms: Date.now() - startTime,
    };
    if (outcome.status === 'error') {
      response.error = outcome.error.message;
    }
    return response;
  }
}
