/**
 * Custom error classes for runsift.
 *
 * Every failure except a dropped field name surfaces as one of these, so
 * callers can tell a broken translation or store call apart from a query
 * that legitimately matched zero rows.
 */

/**
 * Thrown when the field catalog file is missing or malformed.
 * Fatal at startup: nothing can be translated without field context.
 */
export class CatalogLoadError extends Error {
  public readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${message} (${path})` : message);
    this.name = 'CatalogLoadError';
    this.path = path;
    Object.setPrototypeOf(this, CatalogLoadError.prototype);
  }
}

/**
 * Pipeline step that produced a synthesis failure.
 */
export type SynthesisStep = 'columns' | 'query' | 'sort';

/**
 * Thrown when the generation service returns output that does not parse or
 * does not match the shape a pipeline step expects. Never repaired locally.
 */
export class SynthesisError extends Error {
  public readonly step: SynthesisStep;

  constructor(step: SynthesisStep, message: string) {
    super(`[${step}] ${message}`);
    this.name = 'SynthesisError';
    this.step = step;
    Object.setPrototypeOf(this, SynthesisError.prototype);
  }
}

/**
 * Thrown when the generation service itself cannot be reached or keeps
 * failing after the configured retries.
 */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Failure talking to the backing trace store. Returned inside an execution
 * outcome rather than thrown.
 */
export class ExecutionError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ExecutionError';
    this.status = status;
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * Thrown when an evaluation dataset cannot be loaded.
 */
export class EvaluationDatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationDatasetError';
    Object.setPrototypeOf(this, EvaluationDatasetError.prototype);
  }
}

/**
 * Thrown when environment configuration is invalid.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
