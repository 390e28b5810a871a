/**
 * Client for the Weave trace server's call query endpoint.
 */

import { ExecutionError } from '../types/errors.js';
import type { FilterExpression } from '../types/filter.js';
import type { SortSpecification } from '../types/models.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/utils.js';

export interface CallQueryRequest {
  filter: FilterExpression;
  sort: SortSpecification;
  limit: number;
}

/**
 * Backing store boundary: runs a filter + sort and returns call rows.
 * Filter semantics ($convert, $contains, ...) belong to the store.
 */
export interface CallStore {
  queryCalls(request: CallQueryRequest): Promise<JsonObject[]>;
}

export interface WeaveCallStoreOptions {
  /** e.g. https://trace.wandb.ai */
  baseUrl: string;
  /** "entity/project" */
  project: string;
  apiKey?: string;
  /** Restricts results to calls of these ops, e.g. an Evaluation.evaluate ref. */
  opNames?: string[];
  fetchFn?: typeof fetch;
}

interface StreamQueryBody {
  project_id: string;
  filter: { op_names?: string[]; trace_roots_only: boolean };
  query: FilterExpression;
  sort_by?: SortSpecification;
  limit: number;
  offset: number;
}

export class WeaveCallStore implements CallStore {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: WeaveCallStoreOptions) {
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  /**
   * POST /calls/stream_query and collect the newline-delimited JSON body.
   *
   * @throws ExecutionError on a non-2xx response or an unreadable body
   */
  async queryCalls(request: CallQueryRequest): Promise<JsonObject[]> {
    const body: StreamQueryBody = {
      project_id: this.options.project,
      filter: {
        ...(this.options.opNames ? { op_names: this.options.opNames } : {}),
        trace_roots_only: false,
      },
      query: request.filter,
      limit: request.limit,
      offset: 0,
    };
    if (request.sort.length > 0) {
      body.sort_by = request.sort;
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/jsonl',
    };
    if (this.options.apiKey) {
      headers.Authorization = `Basic ${Buffer.from(`api:${this.options.apiKey}`).toString('base64')}`;
    }

    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/calls/stream_query`;
    const response = await this.fetchFn(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new ExecutionError(
        `Trace server responded ${response.status}: ${text.slice(0, 500)}`,
        response.status
      );
    }

    return parseCallLines(text);
  }
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Parse a JSONL body into call objects.
 *
 * @throws ExecutionError if a line is not a JSON object
 */
export function parseCallLines(text: string): JsonObject[] {
  const rows: JsonObject[] = [];
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') {
      continue;
    }
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new ExecutionError(`Unreadable call on line ${i + 1}: ${error}`);
    }
    if (!isJsonValue(value) || !isJsonObject(value)) {
      throw new ExecutionError(`Call on line ${i + 1} is not a JSON object`);
    }
    rows.push(value);
  }

  return rows;
}
