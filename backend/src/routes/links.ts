import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from './options.js';

export async function linkRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // Health check endpoint
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  fastify.get<{ Params: { code: string } }>('/s/:code', async (request, reply) => {
    const target = await services.shortLinks.resolve(request.params.code);
    return reply.redirect(302, target);
  });
}
