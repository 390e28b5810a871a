/**
 * Fastify server construction.
 */

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { getConfig, type Config } from './config.js';
import { logger, loggerConfig } from './utils/logger.js';
import { queryRoutes } from './routes/query.js';
import { utilityRoutes } from './routes/utility.js';
import { createRuntime, type Runtime } from './runtime.js';
import {
  CatalogLoadError,
  ConfigError,
  GenerationError,
  SynthesisError,
} from './types/errors.js';

export interface ServerOptions {
  /** Serve the OpenAPI document and UI under /docs. @default true */
  docs?: boolean;
}

/**
 * Create and configure the Fastify server around a runtime.
 */
export async function buildServer(
  runtime: Pick<Runtime, 'catalog' | 'queryService'>,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'runsift API',
          description: 'Translate natural language questions into trace store filters',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  await fastify.register(queryRoutes, { service: runtime.queryService });
  await fastify.register(utilityRoutes, { catalog: runtime.catalog });

  /**
   * Global error handler.
   */
  fastify.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error instanceof SynthesisError) {
      reply.status(422).send({
        error: 'SynthesisError',
        step: error.step,
        message: error.message,
        suggestion: 'Try rephrasing the question with the metric and threshold spelled out',
      });
    } else if (error instanceof GenerationError) {
      reply.status(502).send({
        error: 'GenerationError',
        message: 'Generation service unavailable',
        detail: error.message,
      });
    } else if (error instanceof ZodError) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.issues.map((issue) => issue.message).join('; '),
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof ConfigError || error instanceof CatalogLoadError) {
      reply.status(503).send({
        error: error.name,
        message: error.message,
      });
    } else {
      fastify.log.error({ err: error }, 'Unhandled error');
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  return fastify;
}

/**
 * Start the server. Catalog and configuration problems are fatal.
 */
export async function startServer(port?: number): Promise<void> {
  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    logger.fatal(`${error}`);
    process.exit(1);
  }

  logger.info('Starting runsift API server...');

  try {
    const runtime = await createRuntime(config);
    const fastify = await buildServer(runtime);

    const shutdown = (): void => {
      logger.info('Shutting down runsift API server...');
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const listenPort = port ?? config.PORT;
    await fastify.listen({ port: listenPort, host: '0.0.0.0' });
    logger.info(`Server running at http://localhost:${listenPort}`);
    logger.info(`API docs at http://localhost:${listenPort}/docs`);
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}
