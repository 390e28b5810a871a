/**
 * Query execution adapter: sends a synthesized filter and sort to the trace
 * store and reports the outcome without throwing.
 */

import type { CallStore } from './store.js';
import { ExecutionError } from '../types/errors.js';
import type { FilterExpression } from '../types/filter.js';
import type { ExecutionOutcome, SortSpecification } from '../types/models.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/utils.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Upper bound on rows fetched for one query. No pagination beyond it.
 */
export const MAX_RESULT_ROWS = 10000;

export interface QueryExecutorOptions {
  limit?: number;
  logger?: Logger;
}

export class QueryExecutor {
  private readonly limit: number;
  private readonly log: Logger;

  constructor(private readonly store: CallStore, options: QueryExecutorOptions = {}) {
    this.limit = Math.min(options.limit ?? MAX_RESULT_ROWS, MAX_RESULT_ROWS);
    this.log = (options.logger ?? rootLogger).child({ component: 'executor' });
  }

  /**
   * Run one filter + sort against the store, in a single attempt.
   *
   * Never throws for store failures: they come back as status "error" with
   * no rows, which callers must check before reading rows.
   */
  async execute(filter: FilterExpression, sort: SortSpecification): Promise<ExecutionOutcome> {
    try {
      const rows = await this.store.queryCalls({ filter, sort, limit: this.limit });
      this.log.info(`Store returned ${rows.length} rows`);
      return { status: 'ok', rows };
    } catch (error) {
      const executionError =
        error instanceof ExecutionError
          ? error
          : new ExecutionError(`Trace store query failed: ${error}`);
      this.log.error({ err: executionError }, 'Query execution failed');
      return { status: 'error', rows: [], error: executionError };
    }
  }
}

/**
 * Flatten a nested call into dotted columns for tabular display, e.g.
 * { output: { model_latency: { mean: 1.2 } } } → { "output.model_latency.mean": 1.2 }.
 * Arrays are kept as values.
 */
export function flattenRow(row: JsonObject, prefix = ''): Record<string, JsonValue> {
  const flat: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(row)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isJsonObject(value) && Object.keys(value).length > 0) {
      Object.assign(flat, flattenRow(value, path));
    } else {
      flat[path] = value;
    }
  }
  return flat;
}
