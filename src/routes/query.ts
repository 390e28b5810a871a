/**
 * Query endpoints for natural language questions about evaluation runs.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { QueryService } from '../services/query.js';
import { QueryRequestSchema } from '../types/models.js';

export interface QueryRoutesOptions {
  service: QueryService;
}

const QueryBodySchema = {
  type: 'object',
  properties: {
    query: { type: 'string', minLength: 1, maxLength: 500 },
  },
  required: ['query'],
} as const;

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, { service }) => {
  // POST /query - translate and execute
  fastify.post(
    '/query',
    {
      schema: {
        description: 'Translate a natural language query and run it against the trace store',
        tags: ['Query'],
        body: QueryBodySchema,
      },
    },
    async (request, reply) => {
      const body = QueryRequestSchema.parse(request.body);
      const result = await service.run(body);
      // A store failure must not look like an empty successful result
      if (result.status === 'error') {
        reply.code(502);
      }
      return result;
    }
  );

  // POST /explain - translate only
  fastify.post(
    '/explain',
    {
      schema: {
        description: 'Translate a natural language query without executing it',
        tags: ['Query'],
        body: QueryBodySchema,
      },
    },
    async (request) => {
      const body = QueryRequestSchema.parse(request.body);
      return service.explain(body);
    }
  );
};
