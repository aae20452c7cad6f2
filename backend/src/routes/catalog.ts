import type { FastifyInstance } from 'fastify';
import type { IdParams } from '../types/index.js';
import { idParamsSchema, type RouteOptions } from './options.js';

export async function catalogRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  fastify.get<{ Querystring: { name?: string } }>(
    '/api/ingredients',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: { name: { type: 'string' } },
        },
      },
    },
    async (request) => {
      const ingredients = await services.catalog.listIngredients(request.query.name);
      return { success: true, ingredients };
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/api/ingredients/:id',
    { schema: { params: idParamsSchema } },
    async (request) => {
      const ingredient = await services.catalog.getIngredient(request.params.id);
      return { success: true, ingredient };
    }
  );

  fastify.get('/api/tags', async () => {
    const tags = await services.catalog.listTags();
    return { success: true, tags };
  });

  fastify.get<{ Params: IdParams }>(
    '/api/tags/:id',
    { schema: { params: idParamsSchema } },
    async (request) => {
      const tag = await services.catalog.getTag(request.params.id);
      return { success: true, tag };
    }
  );
}
