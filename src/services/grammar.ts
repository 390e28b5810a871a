/**
 * Builders, inspection and exact comparison for filter expressions.
 */

import type {
  ComparisonOperation,
  ConvertOperand,
  FilterExpression,
  GetFieldOperand,
  LiteralOperand,
  Operand,
  Operation,
  OperatorName,
} from '../types/filter.js';

// ============================================================================
// BUILDERS
// ============================================================================

export function literal(value: string | number | boolean): LiteralOperand {
  return { $literal: value };
}

export function getField(path: string): GetFieldOperand {
  return { $getField: path };
}

export function toDouble(input: Operand): ConvertOperand {
  return { $convert: { input, to: 'double' } };
}

/**
 * Shorthand for a field coerced to a number, the left side of every numeric
 * comparison.
 */
export function numericField(path: string): ConvertOperand {
  return toDouble(getField(path));
}

export function eq(left: Operand, right: Operand): Operation {
  return { $eq: [left, right] };
}

export function gt(left: Operand, right: Operand): Operation {
  return { $gt: [left, right] };
}

export function gte(left: Operand, right: Operand): Operation {
  return { $gte: [left, right] };
}

export function not(inner: Operation): Operation {
  return { $not: [inner] };
}

/** left < right, written as NOT (left >= right). */
export function lt(left: Operand, right: Operand): Operation {
  return not(gte(left, right));
}

/** left <= right, written as NOT (left > right). */
export function lte(left: Operand, right: Operand): Operation {
  return not(gt(left, right));
}

/** left != right, written as NOT (left == right). */
export function neq(left: Operand, right: Operand): Operation {
  return not(eq(left, right));
}

export function and(...operands: Operation[]): Operation {
  if (operands.length < 2) {
    throw new RangeError('$and needs at least two operands');
  }
  return { $and: operands };
}

export function or(...operands: Operation[]): Operation {
  if (operands.length < 2) {
    throw new RangeError('$or needs at least two operands');
  }
  return { $or: operands };
}

export function contains(input: Operand, substr: string): Operation {
  return { $contains: { input, substr: literal(substr) } };
}

export function filter(operation: Operation): FilterExpression {
  return { $expr: operation };
}

// ============================================================================
// INSPECTION
// ============================================================================

/**
 * Name of the operator at the root of an operation.
 */
export function operatorOf(operation: Operation): OperatorName {
  if ('$eq' in operation) return '$eq';
  if ('$gt' in operation) return '$gt';
  if ('$gte' in operation) return '$gte';
  if ('$contains' in operation) return '$contains';
  if ('$not' in operation) return '$not';
  if ('$and' in operation) return '$and';
  return '$or';
}

function isComparison(operation: Operation): operation is ComparisonOperation {
  return '$eq' in operation || '$gt' in operation || '$gte' in operation;
}

function comparisonOperands(operation: ComparisonOperation): [Operand, Operand] {
  if ('$eq' in operation) return operation.$eq;
  if ('$gt' in operation) return operation.$gt;
  return operation.$gte;
}

function isOperation(operand: Operand): operand is Operation {
  return !('$literal' in operand) && !('$getField' in operand) && !('$convert' in operand);
}

function childrenOf(operand: Operand): Operand[] {
  if ('$literal' in operand || '$getField' in operand) return [];
  if ('$convert' in operand) return [operand.$convert.input];
  if (isComparison(operand)) return comparisonOperands(operand);
  if ('$contains' in operand) return [operand.$contains.input, operand.$contains.substr];
  if ('$not' in operand) return operand.$not;
  if ('$and' in operand) return operand.$and;
  return operand.$or;
}

function walk(operand: Operand, visit: (node: Operand) => void): void {
  visit(operand);
  for (const child of childrenOf(operand)) {
    walk(child, visit);
  }
}

/**
 * Every field path referenced by a filter, in first-seen order.
 */
export function collectFieldRefs(expression: FilterExpression): string[] {
  const seen = new Set<string>();
  walk(expression.$expr, (node) => {
    if ('$getField' in node) {
      seen.add(node.$getField);
    }
  });
  return [...seen];
}

/**
 * Every operator used by a filter, in first-seen order.
 */
export function collectOperators(expression: FilterExpression): OperatorName[] {
  const seen = new Set<OperatorName>();
  walk(expression.$expr, (node) => {
    if (isOperation(node)) {
      seen.add(operatorOf(node));
    }
  });
  return [...seen];
}

export type FilterIssue =
  | { kind: 'unknown-field'; field: string }
  | { kind: 'unconverted-numeric'; field: string; operator: OperatorName };

/**
 * Conformance problems in a synthesized filter: field paths outside the
 * catalog, and numeric comparisons against a field that skips $convert.
 */
export function inspectFilter(
  expression: FilterExpression,
  isKnownField: (name: string) => boolean
): FilterIssue[] {
  const issues: FilterIssue[] = [];

  for (const field of collectFieldRefs(expression)) {
    if (!isKnownField(field)) {
      issues.push({ kind: 'unknown-field', field });
    }
  }

  walk(expression.$expr, (node) => {
    if (!isOperation(node)) return;
    if (!isComparison(node)) return;

    const [left, right] = comparisonOperands(node);
    const hasNumericLiteral = [left, right].some(
      (side) => '$literal' in side && typeof side.$literal === 'number'
    );
    if (!hasNumericLiteral) {
      return;
    }
    for (const side of [left, right]) {
      if ('$getField' in side) {
        issues.push({ kind: 'unconverted-numeric', field: side.$getField, operator: operatorOf(node) });
      }
    }
  });

  return issues;
}

export function describeIssue(issue: FilterIssue): string {
  switch (issue.kind) {
    case 'unknown-field':
      return `field "${issue.field}" is not in the catalog`;
    case 'unconverted-numeric':
      return `${issue.operator} compares "${issue.field}" to a number without $convert`;
  }
}

// ============================================================================
// EXACT COMPARISON
// ============================================================================

/**
 * Exact structural equality of two JSON-shaped values.
 *
 * Array order is significant and nothing is normalized: two logically
 * equivalent filters with different shapes are not equal. Object key order
 * is ignored because JSON objects carry none.
 */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    for (let i = 0; i < a.length; i++) {
      if (!structurallyEqual(a[i], b[i])) {
        return false;
      }
    }
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  const aEntries = Object.entries(a);
  const bKeys = Object.keys(b);
  if (aEntries.length !== bKeys.length) {
    return false;
  }
  const bRecord: Record<string, unknown> = Object.fromEntries(Object.entries(b));
  return aEntries.every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(bRecord, key) && structurallyEqual(value, bRecord[key])
  );
}

export function filtersEqual(expected: FilterExpression, actual: FilterExpression): boolean {
  return structurallyEqual(expected, actual);
}
