/**
 * Field catalog: the fixed vocabulary of queryable call fields.
 */

import { readFile } from 'fs/promises';
import { CatalogLoadError } from '../types/errors.js';
import { FieldCatalogFileSchema, type FieldCatalogEntry } from '../types/models.js';
import { logger } from '../utils/logger.js';

/**
 * Immutable mapping of field path → description, in file order.
 *
 * @example
 * ```typescript
 * const catalog = await FieldCatalog.load('data/fields.json');
 * catalog.has('output.model_latency.mean'); // true
 * ```
 */
export class FieldCatalog {
  private readonly byName: ReadonlyMap<string, FieldCatalogEntry>;
  private readonly description: string;

  private constructor(entries: FieldCatalogEntry[]) {
    this.byName = new Map(entries.map((entry) => [entry.name, Object.freeze(entry)]));
    this.description = entries
      .map((entry) => `Field: ${entry.name}\nDescription: ${entry.description}\n\n`)
      .join('');
  }

  /**
   * Load the catalog from a JSON file.
   *
   * @throws CatalogLoadError if the file is missing, not JSON, or not a
   *   non-empty object of string descriptions
   */
  static async load(path: string): Promise<FieldCatalog> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new CatalogLoadError(`Cannot read field catalog: ${error}`, path);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CatalogLoadError(`Field catalog is not valid JSON: ${error}`, path);
    }

    const catalog = FieldCatalog.fromRecord(raw, path);
    logger.info(`Loaded field catalog with ${catalog.size} fields from ${path}`);
    return catalog;
  }

  /**
   * Build a catalog from an in-memory name → description object.
   */
  static fromRecord(raw: unknown, source?: string): FieldCatalog {
    const parsed = FieldCatalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogLoadError(
        'Field catalog must map field names to description strings',
        source
      );
    }

    const entries = Object.entries(parsed.data).map(([name, description]) => ({
      name,
      description,
    }));
    if (entries.length === 0) {
      throw new CatalogLoadError('Field catalog is empty', source);
    }
    if (entries.some((entry) => entry.name.trim() === '')) {
      throw new CatalogLoadError('Field catalog contains an empty field name', source);
    }

    return new FieldCatalog(entries);
  }

  get size(): number {
    return this.byName.size;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): FieldCatalogEntry | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  entries(): FieldCatalogEntry[] {
    return [...this.byName.values()];
  }

  /**
   * Prompt block listing every field. Embedded verbatim in all three prompts,
   * so the layout must not change.
   */
  describe(): string {
    return this.description;
  }
}
