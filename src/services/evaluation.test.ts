import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { EvaluationHarness, loadEvalDataset, parseEvalDataset, type FilterTranslator } from './evaluation.js';
import { TranslationPipeline } from './pipeline.js';
import { FakeGenerator, testCatalog, type CannedResponses } from '../testing/fake-generator.js';
import { EvaluationDatasetError } from '../types/errors.js';
import type { FilterExpression } from '../types/filter.js';
import type { EvalRecord } from '../types/models.js';
import { filter, gt, gte, literal, lt, numericField } from './grammar.js';

const datasetPath = fileURLToPath(new URL('../../data/eval-dataset.json', import.meta.url));

const LATENCY = 'output.model_latency.mean';
const ACCURACY = 'output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy';
const F1 = 'output.HalluScorerEvaluator.scorer_evaluation_metrics.F1';

const LATENCY_QUERY = 'models which has latency less than 100ms';
const ACCURACY_QUERY = 'models which has accuracy greater than 90%';
const F1_QUERY = 'models which has F1 score greater than 0.95';

const responses: CannedResponses = {
  [LATENCY_QUERY]: {
    columns: { columns: [LATENCY] },
    query: { query: filter(lt(numericField(LATENCY), literal(100))) },
  },
  [ACCURACY_QUERY]: {
    columns: { columns: ['attributes.model_name', ACCURACY] },
    query: { query: filter(gt(numericField(ACCURACY), literal(0.9))) },
  },
  [F1_QUERY]: {
    columns: { columns: ['attributes.model_name', F1] },
    // >= where the label says >
    query: { query: filter(gte(numericField(F1), literal(0.95))) },
  },
};

function pipeline(extra: CannedResponses = {}): TranslationPipeline {
  return new TranslationPipeline(testCatalog(), new FakeGenerator({ ...responses, ...extra }));
}

/**
 * Answers each query after a delay and counts how often it was asked.
 */
class ScriptedTranslator implements FilterTranslator {
  readonly calls = new Map<string, number>();

  constructor(
    private readonly answer: (query: string, call: number) => FilterExpression,
    private readonly delayMs: (query: string) => number = () => 0
  ) {}

  async translateFilter(query: string): Promise<FilterExpression> {
    const call = (this.calls.get(query) ?? 0) + 1;
    this.calls.set(query, call);
    await new Promise((resolve) => setTimeout(resolve, this.delayMs(query)));
    return this.answer(query, call);
  }
}

describe('loadEvalDataset', () => {
  it('loads the shipped dataset frozen', async () => {
    const dataset = await loadEvalDataset(datasetPath);

    expect(dataset.map((record) => record.user_query)).toEqual([LATENCY_QUERY, ACCURACY_QUERY, F1_QUERY]);
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset[1].gt_filter.$expr)).toBe(true);
  });

  it('labels less-than with the $not/$gte shape', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    expect(dataset[0].gt_filter).toEqual(filter(lt(numericField(LATENCY), literal(100))));
  });

  it('fails with EvaluationDatasetError for a missing file', async () => {
    await expect(loadEvalDataset('/nonexistent/eval-dataset.json')).rejects.toBeInstanceOf(EvaluationDatasetError);
  });

  it('rejects records whose label is outside the grammar', () => {
    const raw = [{ id: '0', user_query: 'q', gt_filter: { $expr: { $lt: [{ $getField: LATENCY }, { $literal: 1 }] } } }];
    expect(() => parseEvalDataset(raw)).toThrow(EvaluationDatasetError);
  });

  it('rejects duplicate ids', () => {
    const record = { id: '0', user_query: 'q', gt_filter: filter(gt(numericField(F1), literal(0.5))) };
    expect(() => parseEvalDataset([record, record])).toThrow('Duplicate evaluation record id: 0');
  });
});

describe('EvaluationHarness', () => {
  it('scores exact matches against the gold labels', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    const report = await new EvaluationHarness(pipeline(), dataset).run();

    expect(report.mode).toBe('gold');
    expect(report.items.map((item) => [item.id, item.score])).toEqual([
      ['0', 1],
      ['1', 1],
      ['2', 0],
    ]);
    expect(report.total).toBe(3);
    expect(report.passed).toBe(2);
    expect(report.accuracy).toBeCloseTo(2 / 3);
    expect(report.items[2].expected).toEqual(dataset[2].gt_filter);
    expect(report.items[2].actual).toEqual(filter(gte(numericField(F1), literal(0.95))));
    expect(report.items[2].error).toBeUndefined();
  });

  it('records a failing item with score 0 and keeps going', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    const broken = pipeline({ [ACCURACY_QUERY]: { columns: { columns: [ACCURACY] }, query: 'no idea' } });

    const report = await new EvaluationHarness(broken, dataset).run();

    expect(report.items[1]).toMatchObject({ id: '1', score: 0, actual: null });
    expect(report.items[1].error).toMatch(/^\[query\] Response is not valid JSON/);
    expect(report.items[0].score).toBe(1);
    expect(report.passed).toBe(1);
  });

  it('compares two independent runs in resynthesis mode', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    const report = await new EvaluationHarness(pipeline(), dataset).run({ mode: 'resynthesis' });

    expect(report.mode).toBe('resynthesis');
    expect(report.passed).toBe(3);
    expect(report.items[2].expected).toEqual(report.items[2].actual);
  });

  it('scores 0 in resynthesis mode when the two runs disagree', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    const translator = new ScriptedTranslator((_query, call) =>
      filter(gt(numericField(ACCURACY), literal(call === 1 ? 0.9 : 0.95)))
    );

    const report = await new EvaluationHarness(translator, dataset).run({ mode: 'resynthesis' });

    expect(report.passed).toBe(0);
    expect(translator.calls.get(LATENCY_QUERY)).toBe(2);
  });

  it('keeps dataset order whatever order items finish in', async () => {
    const dataset: EvalRecord[] = ['a', 'b', 'c', 'd'].map((id, index) => ({
      id,
      user_query: `query ${id}`,
      gt_filter: filter(gt(numericField(F1), literal(index))),
    }));
    const translator = new ScriptedTranslator(
      (query) => filter(gt(numericField(F1), literal(['a', 'b', 'c', 'd'].indexOf(query.slice(-1))))),
      (query) => (query.endsWith('a') ? 30 : 0)
    );

    const report = await new EvaluationHarness(translator, parseEvalDataset(dataset)).run({ concurrency: 2 });

    expect(report.items.map((item) => item.id)).toEqual(['a', 'b', 'c', 'd']);
    expect(report.passed).toBe(4);
  });

  it('rejects a concurrency that is not a positive integer', async () => {
    const dataset = await loadEvalDataset(datasetPath);
    const harness = new EvaluationHarness(pipeline(), dataset);

    await expect(harness.run({ concurrency: Number.NaN })).rejects.toThrow(
      new RangeError('concurrency must be a positive integer, got NaN')
    );
    await expect(harness.run({ concurrency: 0 })).rejects.toBeInstanceOf(RangeError);
    await expect(harness.run({ concurrency: 1.5 })).rejects.toBeInstanceOf(RangeError);
  });

  it('reports zero accuracy for an empty dataset', async () => {
    const report = await new EvaluationHarness(pipeline(), []).run();
    expect(report).toMatchObject({ total: 0, passed: 0, accuracy: 0, items: [] });
  });
});
