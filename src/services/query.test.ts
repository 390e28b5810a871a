import { describe, it, expect } from 'vitest';
import { QueryService } from './query.js';
import { QueryExecutor } from './executor.js';
import { TranslationPipeline } from './pipeline.js';
import type { CallQueryRequest, CallStore } from './store.js';
import { FakeGenerator, testCatalog } from '../testing/fake-generator.js';
import { ExecutionError, SynthesisError } from '../types/errors.js';
import type { JsonObject } from '../types/utils.js';

const ACCURACY = 'output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy';
const QUERY = 'best models with accuracy greater than 90%';

const accuracyFilter = {
  $expr: { $gt: [{ $convert: { input: { $getField: ACCURACY }, to: 'double' } }, { $literal: 0.9 }] },
};

const generator = new FakeGenerator({
  [QUERY]: {
    columns: { columns: ['attributes.model_name', ACCURACY] },
    query: { query: accuracyFilter },
    sort: { sort_by: [{ field: ACCURACY, direction: 'desc' }] },
  },
  'unparseable question': { columns: 'not json' },
});

class StaticStore implements CallStore {
  readonly requests: CallQueryRequest[] = [];

  constructor(private readonly rows: JsonObject[] | Error) {}

  async queryCalls(request: CallQueryRequest): Promise<JsonObject[]> {
    this.requests.push(request);
    if (this.rows instanceof Error) {
      throw this.rows;
    }
    return this.rows;
  }
}

function serviceWith(store: CallStore): QueryService {
  return new QueryService(new TranslationPipeline(testCatalog(), generator), new QueryExecutor(store));
}

describe('QueryService', () => {
  it('translates without touching the store on explain', async () => {
    const store = new StaticStore([]);
    const translation = await serviceWith(store).explain({ query: QUERY });

    expect(translation).toEqual({
      query: QUERY,
      fields: ['attributes.model_name', ACCURACY],
      filter: accuracyFilter,
      sort: [{ field: ACCURACY, direction: 'desc' }],
    });
    expect(store.requests).toEqual([]);
  });

  it('executes the translation and returns the rows', async () => {
    const rows = [
      { id: 'call-1', attributes: { model_name: 'tuned-a' } },
      { id: 'call-2', attributes: { model_name: 'tuned-b' } },
    ];
    const store = new StaticStore(rows);

    const response = await serviceWith(store).run({ query: QUERY });

    expect(response).toMatchObject({
      query: QUERY,
      status: 'ok',
      rows,
      row_count: 2,
    });
    expect(response.error).toBeUndefined();
    expect(response.execution_time_ms).toBeGreaterThanOrEqual(0);
    expect(store.requests[0]).toMatchObject({
      filter: accuracyFilter,
      sort: [{ field: ACCURACY, direction: 'desc' }],
    });
  });

  it('reports store failures as status error with the message', async () => {
    const store = new StaticStore(new ExecutionError('Trace server responded 401: unauthorized', 401));

    const response = await serviceWith(store).run({ query: QUERY });

    expect(response.status).toBe('error');
    expect(response.rows).toEqual([]);
    expect(response.row_count).toBe(0);
    expect(response.error).toBe('Trace server responded 401: unauthorized');
  });

  it('propagates synthesis failures', async () => {
    const store = new StaticStore([]);
    await expect(serviceWith(store).run({ query: 'unparseable question' })).rejects.toBeInstanceOf(SynthesisError);
    expect(store.requests).toEqual([]);
  });
});
