#!/usr/bin/env node
/**
 * runsift CLI
 * Ask questions about evaluation runs from the terminal
 */

import { cac } from 'cac';
import { z } from 'zod';
import { getConfig, type Config } from './config.js';
import { createRuntime } from './runtime.js';
import { startServer } from './server.js';
import { FieldCatalog } from './services/catalog.js';
import { EvaluationHarness, loadEvalDataset } from './services/evaluation.js';
import { SynthesisError } from './types/errors.js';
import * as logger from './cli/logger.js';
import { formatAccuracy, renderEvalReport, renderQueryResponse, renderTranslation } from './cli/render.js';

const cli = cac('runsift');

cli.version('1.0.0');

cli.help();

const EvalOptionsSchema = z.object({
  mode: z.enum(['gold', 'resynthesis']).default('gold'),
  dataset: z.string().optional(),
  concurrency: z.coerce.number().int().positive().default(4),
  json: z.boolean().default(false),
});

const QueryOptionsSchema = z.object({
  json: z.boolean().default(false),
  rows: z.coerce.number().int().positive().default(20),
});

function loadCliConfig(): Config {
  try {
    return getConfig();
  } catch (error) {
    logger.error('Invalid configuration', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

function fail(action: string, error: unknown): never {
  if (error instanceof SynthesisError) {
    logger.error(`${action}: ${error.message}`, 'Try rephrasing the question with the metric and threshold spelled out');
  } else {
    logger.error(action, error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

/**
 * runsift query "<question>"
 * Translate and execute against the trace store
 */
cli
  .command('query <text>', 'Translate a question and run it against the trace store')
  .option('--json', 'Print the raw response as JSON')
  .option('--rows <n>', 'Rows to show in the table', { default: 20 })
  .example('runsift query "models which has latency less than 100ms"')
  .action(async (text: string, rawOptions: unknown) => {
    const options = QueryOptionsSchema.parse(rawOptions);
    const config = loadCliConfig();

    const spin = options.json ? null : logger.spinner('Translating and executing...');
    try {
      const runtime = await createRuntime(config);
      const response = await runtime.queryService.run({ query: text });
      spin?.stop();

      if (options.json) {
        console.log(JSON.stringify(response, null, 2));
      } else {
        renderQueryResponse(response, options.rows);
      }
      if (response.status === 'error') {
        process.exit(1);
      }
    } catch (error) {
      spin?.fail('Query failed');
      fail('Query failed', error);
    }
  });

/**
 * runsift explain "<question>"
 * Show fields, filter and sort without executing
 */
cli
  .command('explain <text>', 'Translate a question without executing it')
  .option('--json', 'Print the translation as JSON')
  .action(async (text: string, rawOptions: unknown) => {
    const options = QueryOptionsSchema.parse(rawOptions);
    const config = loadCliConfig();

    const spin = options.json ? null : logger.spinner('Translating...');
    try {
      const runtime = await createRuntime(config);
      const translation = await runtime.queryService.explain({ query: text });
      spin?.stop();

      if (options.json) {
        console.log(JSON.stringify(translation, null, 2));
      } else {
        renderTranslation(translation);
      }
    } catch (error) {
      spin?.fail('Translation failed');
      fail('Translation failed', error);
    }
  });

/**
 * runsift fields
 * List the field catalog
 */
cli
  .command('fields', 'List queryable fields')
  .action(async () => {
    const config = loadCliConfig();
    try {
      const catalog = await FieldCatalog.load(config.FIELD_CATALOG_PATH);
      logger.section(`Fields (${catalog.size})`);
      for (const entry of catalog.entries()) {
        logger.row(entry.name, entry.description);
      }
      logger.newline();
    } catch (error) {
      fail('Cannot load field catalog', error);
    }
  });

/**
 * runsift eval
 * Score filter synthesis against the labelled dataset
 */
cli
  .command('eval', 'Score filter synthesis against a labelled dataset')
  .option('--mode <mode>', 'gold | resynthesis', { default: 'gold' })
  .option('--dataset <path>', 'Evaluation dataset (defaults to EVAL_DATASET_PATH)')
  .option('--concurrency <n>', 'Items evaluated at once', { default: 4 })
  .option('--json', 'Print the report as JSON')
  .action(async (rawOptions: unknown) => {
    const parsed = EvalOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      logger.error('Invalid options', parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; '));
      process.exit(1);
    }
    const options = parsed.data;
    const config = loadCliConfig();

    try {
      const dataset = await loadEvalDataset(options.dataset ?? config.EVAL_DATASET_PATH);
      const runtime = await createRuntime(config);
      const harness = new EvaluationHarness(runtime.pipeline, dataset);

      const spin = options.json ? null : logger.spinner(`Evaluating ${dataset.length} queries...`);
      const report = await harness.run({ mode: options.mode, concurrency: options.concurrency });
      spin?.stop();

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        renderEvalReport(report);
      }

      if (report.passed < report.total) {
        if (!options.json) {
          logger.warn(`Exact-match accuracy ${formatAccuracy(report)}`);
        }
        process.exit(1);
      }
    } catch (error) {
      fail('Evaluation failed', error);
    }
  });

/**
 * runsift serve
 * Start the HTTP API
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port')
  .action(async (rawOptions: unknown) => {
    const { port } = z.object({ port: z.coerce.number().int().positive().optional() }).parse(rawOptions);
    logger.printBanner();
    await startServer(port);
  });

cli.parse();
