/**
 * Natural language → filter/sort translation.
 *
 * Strictly linear: select fields, drop the ones the catalog does not know,
 * then synthesize the filter and the sort concurrently from the same field
 * set. Any failure aborts the translation; nothing is retried or repaired.
 */

import type { z } from 'zod';
import type { FieldCatalog } from './catalog.js';
import { parseJsonText, type GenerationService } from './llm.js';
import {
  COLUMN_SELECTION_PROMPT,
  QUERY_PROMPT,
  SORT_BY_PROMPT,
  formatColumns,
  renderPrompt,
} from './prompts.js';
import { describeIssue, inspectFilter } from './grammar.js';
import { SynthesisError, type SynthesisStep } from '../types/errors.js';
import {
  ColumnSelectionResponseSchema,
  FilterResponseSchema,
  SortResponseSchema,
  type SortSpecification,
  type Translation,
} from '../types/models.js';
import type { FilterExpression } from '../types/filter.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface PipelineOptions {
  /**
   * Reject filters that reference unknown fields or compare an unconverted
   * field with a number.
   * @default true
   */
  enforceConformance?: boolean;
  logger?: Logger;
}

export class TranslationPipeline {
  private readonly enforceConformance: boolean;
  private readonly log: Logger;

  constructor(
    private readonly catalog: FieldCatalog,
    private readonly generator: GenerationService,
    options: PipelineOptions = {}
  ) {
    this.enforceConformance = options.enforceConformance ?? true;
    this.log = (options.logger ?? rootLogger).child({ component: 'pipeline' });
  }

  /**
   * Step A. Ask for the relevant fields, then keep only names the catalog
   * knows, in the order returned and without duplicates.
   *
   * Unknown names and non-string entries are dropped with a warning rather
   * than failing. An empty result is allowed; the later steps still run on it.
   *
   * @throws SynthesisError if the response has no "columns" list
   */
  async selectFields(query: string): Promise<string[]> {
    const { columns } = await this.ask('columns', COLUMN_SELECTION_PROMPT, query, '', ColumnSelectionResponseSchema);

    const selected: string[] = [];
    for (const name of columns) {
      if (typeof name !== 'string' || !this.catalog.has(name)) {
        this.log.warn({ field: name, query }, 'Dropping field not present in catalog');
        continue;
      }
      if (!selected.includes(name)) {
        selected.push(name);
      }
    }

    if (selected.length === 0) {
      this.log.warn({ query }, 'No catalog fields selected; synthesizing without field context');
    }
    this.log.info(`Selected fields: ${selected.join(', ') || '(none)'}`);
    return selected;
  }

  /**
   * Step B. Synthesize the filter expression.
   *
   * @throws SynthesisError if the response is not JSON, has no "query", uses
   *   an operator outside the grammar, or (when enforced) fails conformance
   */
  async synthesizeFilter(query: string, fields: readonly string[]): Promise<FilterExpression> {
    const response = await this.ask('query', QUERY_PROMPT, query, formatColumns(fields), FilterResponseSchema);
    const filter = response.query;

    if (this.enforceConformance) {
      const issues = inspectFilter(filter, (name) => this.catalog.has(name));
      if (issues.length > 0) {
        throw new SynthesisError('query', `Filter does not conform: ${issues.map(describeIssue).join('; ')}`);
      }
    }

    this.log.info(`Synthesized filter: ${JSON.stringify(filter)}`);
    return filter;
  }

  /**
   * Step C. Synthesize the sort specification. A query without ordering
   * intent yields an empty list.
   *
   * @throws SynthesisError if the response has no "sort_by" list or sorts on a
   *   field outside the catalog
   */
  async synthesizeSort(query: string, fields: readonly string[]): Promise<SortSpecification> {
    const response = await this.ask('sort', SORT_BY_PROMPT, query, formatColumns(fields), SortResponseSchema);
    const sort = response.sort_by ?? [];

    const unknown = sort.filter((clause) => !this.catalog.has(clause.field));
    if (unknown.length > 0) {
      throw new SynthesisError(
        'sort',
        `Sort references fields not in the catalog: ${unknown.map((clause) => clause.field).join(', ')}`
      );
    }

    this.log.info(`Synthesized sort: ${JSON.stringify(sort)}`);
    return sort;
  }

  /**
   * Steps A, B and C. B and C only depend on A's output, so they run
   * concurrently.
   */
  async translate(query: string): Promise<Translation> {
    const fields = await this.selectFields(query);
    const [filter, sort] = await Promise.all([
      this.synthesizeFilter(query, fields),
      this.synthesizeSort(query, fields),
    ]);
    return { query, fields, filter, sort };
  }

  /**
   * Steps A and B only, as scored by the evaluation harness.
   */
  async translateFilter(query: string): Promise<FilterExpression> {
    const fields = await this.selectFields(query);
    return this.synthesizeFilter(query, fields);
  }

  private async ask<T>(
    step: SynthesisStep,
    template: string,
    query: string,
    columns: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const prompt = renderPrompt(template, {
      fields_description: this.catalog.describe(),
      query,
      columns,
    });

    const text = await this.generator.generate(prompt);

    let json: unknown;
    try {
      json = parseJsonText(text);
    } catch (error) {
      throw new SynthesisError(step, `Response is not valid JSON: ${error}`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new SynthesisError(step, `Response does not match the expected shape: ${detail}`);
    }
    return parsed.data;
  }
}
