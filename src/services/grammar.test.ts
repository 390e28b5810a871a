import { describe, it, expect } from 'vitest';
import {
  and,
  collectFieldRefs,
  collectOperators,
  contains,
  describeIssue,
  eq,
  filter,
  filtersEqual,
  getField,
  gt,
  gte,
  inspectFilter,
  literal,
  lt,
  lte,
  neq,
  numericField,
  operatorOf,
  or,
  structurallyEqual,
} from './grammar.js';
import { FilterExpressionSchema } from '../types/filter.js';

const LATENCY = 'output.model_latency.mean';
const ACCURACY = 'output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy';

describe('builders', () => {
  it('builds the accuracy filter in the store format', () => {
    expect(filter(gt(numericField(ACCURACY), literal(0.9)))).toEqual({
      $expr: {
        $gt: [
          { $convert: { input: { $getField: ACCURACY }, to: 'double' } },
          { $literal: 0.9 },
        ],
      },
    });
  });

  it('writes derived comparisons as $not around the opposite operator', () => {
    const field = numericField(LATENCY);
    expect(lt(field, literal(100))).toEqual({ $not: [{ $gte: [field, { $literal: 100 }] }] });
    expect(lte(field, literal(100))).toEqual({ $not: [{ $gt: [field, { $literal: 100 }] }] });
    expect(neq(field, literal(100))).toEqual({ $not: [{ $eq: [field, { $literal: 100 }] }] });
  });

  it('wraps the substring of $contains in a literal', () => {
    expect(contains(getField('attributes.model_name'), 'gpt')).toEqual({
      $contains: { input: { $getField: 'attributes.model_name' }, substr: { $literal: 'gpt' } },
    });
  });

  it('rejects $and and $or with fewer than two operands', () => {
    const one = eq(getField('attributes.model_name'), literal('a'));
    expect(() => and(one)).toThrow(RangeError);
    expect(() => or()).toThrow(RangeError);
  });

  it('produces expressions the schema accepts', () => {
    const expression = filter(
      or(
        and(gt(numericField(ACCURACY), literal(0.9)), lt(numericField(LATENCY), literal(100))),
        contains(getField('attributes.model_name'), 'gpt')
      )
    );
    expect(FilterExpressionSchema.safeParse(expression).success).toBe(true);
  });
});

describe('FilterExpressionSchema', () => {
  it('rejects operators outside the grammar', () => {
    const withLt = {
      $expr: { $lt: [{ $convert: { input: { $getField: LATENCY }, to: 'double' } }, { $literal: 100 }] },
    };
    expect(FilterExpressionSchema.safeParse(withLt).success).toBe(false);
  });

  it('rejects $convert targets other than double', () => {
    const toInt = {
      $expr: { $gt: [{ $convert: { input: { $getField: LATENCY }, to: 'int' } }, { $literal: 100 }] },
    };
    expect(FilterExpressionSchema.safeParse(toInt).success).toBe(false);
  });

  it('rejects a $not with more than one operand', () => {
    const a = { $eq: [{ $getField: 'attributes.model_name' }, { $literal: 'a' }] };
    expect(FilterExpressionSchema.safeParse({ $expr: { $not: [a, a] } }).success).toBe(false);
  });

  it('rejects extra keys next to an operator', () => {
    const extra = { $expr: { $eq: [{ $getField: 'a' }, { $literal: 1 }], $gt: [{ $getField: 'a' }, { $literal: 1 }] } };
    expect(FilterExpressionSchema.safeParse(extra).success).toBe(false);
  });
});

describe('inspection', () => {
  const expression = filter(
    and(
      gt(numericField(ACCURACY), literal(0.9)),
      lt(numericField(LATENCY), literal(100)),
      contains(getField('attributes.model_name'), 'gpt')
    )
  );

  it('collects field references in first-seen order', () => {
    expect(collectFieldRefs(expression)).toEqual([ACCURACY, LATENCY, 'attributes.model_name']);
  });

  it('collects operators in first-seen order', () => {
    expect(collectOperators(expression)).toEqual(['$and', '$gt', '$not', '$gte', '$contains']);
  });

  it('names the root operator', () => {
    expect(operatorOf(expression.$expr)).toBe('$and');
    expect(operatorOf(lte(getField('a'), literal(1)))).toBe('$not');
  });

  it('reports unknown fields', () => {
    const issues = inspectFilter(expression, (name) => name !== LATENCY);
    expect(issues).toEqual([{ kind: 'unknown-field', field: LATENCY }]);
    expect(describeIssue(issues[0])).toBe(`field "${LATENCY}" is not in the catalog`);
  });

  it('reports numeric comparisons without $convert', () => {
    const raw = filter(gt(getField(LATENCY), literal(100)));
    const issues = inspectFilter(raw, () => true);
    expect(issues).toEqual([{ kind: 'unconverted-numeric', field: LATENCY, operator: '$gt' }]);
    expect(describeIssue(issues[0])).toBe(`$gt compares "${LATENCY}" to a number without $convert`);
  });

  it('allows string equality without $convert', () => {
    const byName = filter(eq(getField('attributes.model_name'), literal('gpt-4o')));
    expect(inspectFilter(byName, () => true)).toEqual([]);
  });
});

describe('structural equality', () => {
  it('ignores object key order', () => {
    const a = { $convert: { input: { $getField: LATENCY }, to: 'double' } };
    const b = { $convert: { to: 'double', input: { $getField: LATENCY } } };
    expect(structurallyEqual(a, b)).toBe(true);
  });

  it('treats operand order as significant', () => {
    const forward = filter(gt(numericField(ACCURACY), literal(0.9)));
    const swapped = filter(gt(literal(0.9), numericField(ACCURACY)));
    expect(filtersEqual(forward, swapped)).toBe(false);
  });

  it('does not normalize logically equivalent shapes', () => {
    const wrapped = filter(lt(numericField(LATENCY), literal(100)));
    const flipped = filter(gt(literal(100), numericField(LATENCY)));
    expect(filtersEqual(wrapped, flipped)).toBe(false);
  });

  it('does not match a filter that skips $convert', () => {
    const converted = filter(gt(numericField(LATENCY), literal(100)));
    const raw = filter(gt(getField(LATENCY), literal(100)));
    expect(filtersEqual(converted, raw)).toBe(false);
  });

  it('distinguishes numeric literals from their string form', () => {
    expect(structurallyEqual({ $literal: 100 }, { $literal: '100' })).toBe(false);
  });

  it('compares arrays by length and position', () => {
    expect(structurallyEqual([1, 2], [1, 2])).toBe(true);
    expect(structurallyEqual([1, 2], [2, 1])).toBe(false);
    expect(structurallyEqual([1], [1, 2])).toBe(false);
    expect(structurallyEqual([], {})).toBe(false);
  });
});
