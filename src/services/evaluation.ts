/**
 * Evaluation harness: re-runs field selection + filter synthesis over a
 * labelled dataset and scores exact structural matches.
 *
 * Scoring is exact: two filters that mean the same thing but are shaped
 * differently (operand order, $not wrapping, a missing $convert) score 0.
 */

import { readFile } from 'fs/promises';
import { filtersEqual } from './grammar.js';
import { EvaluationDatasetError } from '../types/errors.js';
import type { FilterExpression } from '../types/filter.js';
import {
  EvalDatasetSchema,
  type EvalItemResult,
  type EvalMode,
  type EvalRecord,
  type EvalReport,
} from '../types/models.js';
import { deepFreeze } from '../types/utils.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * The part of the pipeline the harness scores (steps A and B).
 */
export interface FilterTranslator {
  translateFilter(query: string): Promise<FilterExpression>;
}

export interface EvaluationOptions {
  /** @default 'gold' */
  mode?: EvalMode;
  /** Items evaluated at once; a positive integer. @default 4 */
  concurrency?: number;
}

/**
 * Load a dataset of { id, user_query, gt_filter } records. The result is
 * frozen so scoring runs cannot mutate the fixtures.
 *
 * @throws EvaluationDatasetError if the file is unreadable or malformed
 */
export async function loadEvalDataset(path: string): Promise<readonly EvalRecord[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new EvaluationDatasetError(`Cannot read evaluation dataset ${path}: ${error}`);
  }
  return parseEvalDataset(raw);
}

export function parseEvalDataset(raw: unknown): readonly EvalRecord[] {
  const parsed = EvalDatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EvaluationDatasetError(
      `Invalid evaluation dataset at ${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
  }

  const ids = new Set<string>();
  for (const record of parsed.data) {
    if (ids.has(record.id)) {
      throw new EvaluationDatasetError(`Duplicate evaluation record id: ${record.id}`);
    }
    ids.add(record.id);
  }

  return deepFreeze(parsed.data);
}

/**
 * Run fn over items with at most `limit` in flight, keeping result order.
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

export class EvaluationHarness {
  private readonly log: Logger;

  constructor(
    private readonly translator: FilterTranslator,
    private readonly dataset: readonly EvalRecord[],
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'evaluation' });
  }

  async run(options: EvaluationOptions = {}): Promise<EvalReport> {
    const mode = options.mode ?? 'gold';
    const concurrency = options.concurrency ?? 4;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    const startTime = Date.now();

    this.log.info(`Evaluating ${this.dataset.length} queries (mode: ${mode})`);
    const items = await mapWithConcurrency(this.dataset, concurrency, (record) =>
      this.evaluateRecord(record, mode)
    );

    const passed = items.filter((item) => item.score === 1).length;
    const report: EvalReport = {
      mode,
      items,
      total: items.length,
      passed,
      accuracy: items.length > 0 ? passed / items.length : 0,
      duration_ms: Date.now() - startTime,
    };

    this.log.info(`Evaluation finished: ${passed}/${items.length} exact matches`);
    return report;
  }

  private async evaluateRecord(record: EvalRecord, mode: EvalMode): Promise<EvalItemResult> {
    const result: EvalItemResult = {
      id: record.id,
      user_query: record.user_query,
      expected: mode === 'gold' ? record.gt_filter : null,
      actual: null,
      score: 0,
    };

    try {
      result.actual = await this.translator.translateFilter(record.user_query);
      if (mode === 'resynthesis') {
        result.expected = await this.translator.translateFilter(record.user_query);
      }
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      this.log.warn({ id: record.id, err: error }, 'Evaluation item failed');
      return result;
    }

    if (result.expected && result.actual && filtersEqual(result.expected, result.actual)) {
      result.score = 1;
    }
    return result;
  }
}
