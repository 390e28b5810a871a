/**
 * Utility endpoints (fields, health, root).
 */

import type { FastifyPluginAsync } from 'fastify';
import type { FieldCatalog } from '../services/catalog.js';

export interface UtilityRoutesOptions {
  catalog: FieldCatalog;
}

export const utilityRoutes: FastifyPluginAsync<UtilityRoutesOptions> = async (fastify, { catalog }) => {
  // GET /fields - queryable fields and their descriptions
  fastify.get('/fields', { schema: { tags: ['Fields'] } }, async () => {
    const fields = catalog.entries();
    return {
      fields,
      total: fields.length,
    };
  });

  // GET /health - Health check
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      catalog: {
        fields: catalog.size,
      },
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'runsift API',
      version: '1.0.0',
      description: 'Natural language queries over evaluation runs',
      docs: '/docs',
    };
  });
};
