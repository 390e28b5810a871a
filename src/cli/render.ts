/**
 * Terminal rendering for query results and evaluation reports.
 */

import chalk from 'chalk';
import { flattenRow } from '../services/executor.js';
import type { JsonObject, JsonValue } from '../types/utils.js';
import type { EvalReport, QueryResponse, Translation } from '../types/models.js';
import * as logger from './logger.js';

export type TableRow = Record<string, string>;

function formatCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Flatten rows and keep only the run id plus the selected fields, in
 * selection order.
 */
export function projectRows(rows: readonly JsonObject[], fields: readonly string[]): TableRow[] {
  const columns = ['id', ...fields.filter((field) => field !== 'id')];
  return rows.map((row) => {
    const flat = flattenRow(row);
    const projected: TableRow = {};
    for (const column of columns) {
      projected[column] = formatCell(flat[column]);
    }
    return projected;
  });
}

export function renderTranslation(translation: Translation): void {
  logger.section('Translation');
  logger.row('Query', translation.query);
  logger.row('Fields', translation.fields.join(', ') || '(none)', translation.fields.length > 0);
  logger.row(
    'Sort',
    translation.sort.map((clause) => `${clause.field} ${clause.direction}`).join(', ') || '(none)'
  );
  logger.newline();
  logger.code(JSON.stringify(translation.filter, null, 2), 'filter');
}

/**
 * Print a query response. At most `maxRows` rows go to the table.
 */
export function renderQueryResponse(response: QueryResponse, maxRows: number = 20): void {
  renderTranslation(response);
  logger.section('Results');

  if (response.status === 'error') {
    logger.error('Query execution failed', response.error);
    return;
  }
  if (response.row_count === 0) {
    logger.warn('No runs matched');
    return;
  }

  console.table(projectRows(response.rows.slice(0, maxRows), response.fields));
  if (response.row_count > maxRows) {
    logger.info(`Showing ${maxRows} of ${response.row_count} rows`);
  }
  logger.info(chalk.gray(`${response.row_count} rows in ${response.execution_time_ms}ms`));
}

export function formatAccuracy(report: EvalReport): string {
  return `${report.passed}/${report.total} (${(report.accuracy * 100).toFixed(1)}%)`;
}

export function renderEvalReport(report: EvalReport): void {
  logger.section(`Evaluation (${report.mode})`);
  for (const item of report.items) {
    logger.row(item.id, item.error ?? (item.score === 1 ? 'match' : 'mismatch'), item.score === 1);
    if (item.score === 0) {
      console.log(chalk.gray(`    query:    ${item.user_query}`));
      console.log(chalk.gray(`    expected: ${JSON.stringify(item.expected)}`));
      console.log(chalk.gray(`    actual:   ${JSON.stringify(item.actual)}`));
    }
  }
  logger.newline();

  const summary = `Accuracy ${formatAccuracy(report)} in ${report.duration_ms}ms`;
  if (report.passed === report.total) {
    logger.successBox(summary, 'Evaluation');
  } else {
    logger.errorBox(summary, 'Evaluation');
  }
}
