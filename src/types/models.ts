/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import { FilterExpressionSchema } from './filter.js';
import type { FilterExpression } from './filter.js';
import type { ExecutionError } from './errors.js';
import type { JsonObject, SortDirection } from './utils.js';

// ============================================================================
// FIELD CATALOG
// ============================================================================

export interface FieldCatalogEntry {
	readonly name: string;
	readonly description: string;
}

/**
 * Raw catalog file: field name → description.
 */
export const FieldCatalogFileSchema = z.record(z.string());

// ============================================================================
// SORTING
// ============================================================================

export interface SortClause {
	field: string;
	direction: SortDirection;
}

export type SortSpecification = SortClause[];

export const SortClauseSchema = z.object({
	field: z.string().min(1),
	direction: z.enum(['asc', 'desc']),
});

// ============================================================================
// GENERATION SERVICE RESPONSES
// ============================================================================

/**
 * Step A response. Entries are checked one by one against the catalog, so
 * only the list itself is required here.
 */
export const ColumnSelectionResponseSchema = z.object({
	columns: z.array(z.unknown()),
});

/**
 * Step B response.
 */
export const FilterResponseSchema = z.object({
	query: FilterExpressionSchema,
});

/**
 * Step C response. A null sort_by means no ordering was asked for.
 */
export const SortResponseSchema = z.object({
	sort_by: z.array(SortClauseSchema).nullable(),
});

// ============================================================================
// TRANSLATION & EXECUTION
// ============================================================================

/**
 * Output of the translation pipeline for a single query.
 */
export interface Translation {
	query: string;
	fields: string[];
	filter: FilterExpression;
	sort: SortSpecification;
}

/**
 * Discriminated union for store results. Callers must check status before
 * reading rows: an error never looks like "zero rows matched".
 */
export type ExecutionOutcome =
	| { readonly status: 'ok'; readonly rows: JsonObject[] }
	| { readonly status: 'error'; readonly rows: []; readonly error: ExecutionError };

/**
 * Request model for natural language queries.
 */
export const QueryRequestSchema = z.object({
	query: z
		.string()
		.trim()
		.min(1)
		.max(500)
		.describe('Transcribed natural language query'),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

/**
 * Response model for executed queries.
 */
export interface QueryResponse extends Translation {
	status: 'ok' | 'error';
	rows: JsonObject[];
	row_count: number;
	error?: string;
	execution_time_ms: number;
}

// ============================================================================
// EVALUATION
// ============================================================================

export const EvalRecordSchema = z.object({
	id: z.string().min(1),
	user_query: z.string().min(1),
	gt_filter: FilterExpressionSchema,
});

export type EvalRecord = z.infer<typeof EvalRecordSchema>;

export const EvalDatasetSchema = z.array(EvalRecordSchema);

/**
 * gold: compare against the dataset's frozen gt_filter.
 * resynthesis: compare against a second, independent pipeline run.
 */
export type EvalMode = 'gold' | 'resynthesis';

export interface EvalItemResult {
	id: string;
	user_query: string;
	expected: FilterExpression | null;
	actual: FilterExpression | null;
	score: 0 | 1;
	error?: string;
}

export interface EvalReport {
	mode: EvalMode;
	items: EvalItemResult[];
	total: number;
	passed: number;
	accuracy: number;
	duration_ms: number;
}
