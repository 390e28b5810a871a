/**
 * Filter expression grammar accepted by the trace store.
 *
 * Only seven operators exist: $eq, $gt, $gte, $and, $or, $not, $contains.
 * "Less than", "less or equal" and "not equal" have no node of their own and
 * are written as $not around $gte, $gt and $eq respectively.
 */

import { z } from 'zod';

// ============================================================================
// OPERANDS
// ============================================================================

export interface LiteralOperand {
  $literal: string | number | boolean;
}

/**
 * Dotted path into a call row, e.g. "output.model_latency.mean".
 */
export interface GetFieldOperand {
  $getField: string;
}

/**
 * Numeric coercion of a raw field value. Required before numeric comparison.
 */
export interface ConvertOperand {
  $convert: {
    input: Operand;
    to: 'double';
  };
}

// ============================================================================
// OPERATIONS
// ============================================================================

export interface EqOperation {
  $eq: [Operand, Operand];
}

export interface GtOperation {
  $gt: [Operand, Operand];
}

export interface GteOperation {
  $gte: [Operand, Operand];
}

export interface ContainsOperation {
  $contains: {
    input: Operand;
    substr: LiteralOperand;
  };
}

export interface NotOperation {
  $not: [Operation];
}

export interface AndOperation {
  $and: Operation[];
}

export interface OrOperation {
  $or: Operation[];
}

export type ComparisonOperation = EqOperation | GtOperation | GteOperation;

export type Operation =
  | EqOperation
  | GtOperation
  | GteOperation
  | ContainsOperation
  | NotOperation
  | AndOperation
  | OrOperation;

export type Operand = LiteralOperand | GetFieldOperand | ConvertOperand | Operation;

/**
 * Top-level filter sent to the store.
 */
export interface FilterExpression {
  $expr: Operation;
}

export const ALLOWED_OPERATORS = [
  '$eq',
  '$gt',
  '$gte',
  '$and',
  '$or',
  '$not',
  '$contains',
] as const;

export type OperatorName = (typeof ALLOWED_OPERATORS)[number];

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

export const LiteralOperandSchema: z.ZodType<LiteralOperand> = z
  .object({ $literal: z.union([z.string(), z.number(), z.boolean()]) })
  .strict();

const GetFieldOperandSchema: z.ZodType<GetFieldOperand> = z
  .object({ $getField: z.string().min(1) })
  .strict();

export const OperationSchema: z.ZodType<Operation> = z.lazy(() =>
  z.union([
    z.object({ $eq: z.tuple([OperandSchema, OperandSchema]) }).strict(),
    z.object({ $gt: z.tuple([OperandSchema, OperandSchema]) }).strict(),
    z.object({ $gte: z.tuple([OperandSchema, OperandSchema]) }).strict(),
    z
      .object({
        $contains: z
          .object({ input: OperandSchema, substr: LiteralOperandSchema })
          .strict(),
      })
      .strict(),
    z.object({ $not: z.tuple([OperationSchema]) }).strict(),
    z.object({ $and: z.array(OperationSchema).min(2) }).strict(),
    z.object({ $or: z.array(OperationSchema).min(2) }).strict(),
  ])
);

export const OperandSchema: z.ZodType<Operand> = z.lazy(() =>
  z.union([
    LiteralOperandSchema,
    GetFieldOperandSchema,
    z
      .object({
        $convert: z.object({ input: OperandSchema, to: z.literal('double') }).strict(),
      })
      .strict(),
    OperationSchema,
  ])
);

export const FilterExpressionSchema: z.ZodType<FilterExpression> = z
  .object({ $expr: OperationSchema })
  .strict();
