import type { FastifyInstance } from 'fastify';
import { currentUser } from '../middleware/auth.js';
import type { IdParams, PageQuery, ProfileInput, SubscriptionListQuery } from '../types/index.js';
import { idParamsSchema, pageQueryProperties, pageRequest, type RouteOptions } from './options.js';

const profileSchema = {
  type: 'object',
  required: ['username', 'firstName', 'lastName'],
  additionalProperties: false,
  properties: {
    username: { type: 'string', minLength: 1, maxLength: 150 },
    firstName: { type: 'string', minLength: 1, maxLength: 150 },
    lastName: { type: 'string', minLength: 1, maxLength: 150 },
    email: { type: 'string', minLength: 3, maxLength: 254 },
    avatarUrl: { type: 'string', maxLength: 2048 },
  },
} as const;

export async function userRoutes(fastify: FastifyInstance, { services, auth, config }: RouteOptions) {
  fastify.get<{ Querystring: PageQuery }>(
    '/api/users',
    {
      preHandler: auth.identifyUser,
      schema: { querystring: { type: 'object', properties: pageQueryProperties } },
    },
    async (request) => {
      const page = await services.users.listUsers(pageRequest(request.query, config));
      return {
        success: true,
        ...page,
        results: await services.views.userViews(page.results, request.user?.uid),
      };
    }
  );

  fastify.get('/api/users/me', { preHandler: auth.requireUser }, async (request) => {
    const user = await services.users.getUser(currentUser(request).uid);
    return { success: true, user: await services.views.userView(user, user.id) };
  });

  fastify.put<{ Body: ProfileInput }>(
    '/api/users/me',
    { preHandler: auth.requireUser, schema: { body: profileSchema } },
    async (request) => {
      const authUser = currentUser(request);
      const user = await services.users.saveProfile(authUser, request.body);
      request.log.info({ uid: user.id }, '[USERS] Profile saved');
      return { success: true, user: await services.views.userView(user, user.id) };
    }
  );

  fastify.get<{ Querystring: SubscriptionListQuery }>(
    '/api/users/subscriptions',
    {
      preHandler: auth.requireUser,
      schema: {
        querystring: {
          type: 'object',
          properties: { ...pageQueryProperties, recipesLimit: { type: 'integer', minimum: 1 } },
        },
      },
    },
    async (request) => {
      const { uid } = currentUser(request);
      const { page, limit } = pageRequest(request.query, config);
      const authorIds = await services.ledger.subscribedAuthorIds(uid);
      const start = (page - 1) * limit;
      const authors = await services.users.getUsers(authorIds.slice(start, start + limit));
      return {
        success: true,
        count: authorIds.length,
        page,
        pageSize: limit,
        results: await services.views.subscriptionViews(
          authors,
          uid,
          Math.min(request.query.recipesLimit ?? config.maxPageSize, config.maxPageSize)
        ),
      };
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/api/users/:id',
    { preHandler: auth.identifyUser, schema: { params: idParamsSchema } },
    async (request) => {
      const user = await services.users.getUser(request.params.id);
      return { success: true, user: await services.views.userView(user, request.user?.uid) };
    }
  );

  fastify.post<{ Params: IdParams }>(
    '/api/users/:id/subscribe',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      const author = await services.ledger.subscribe(uid, request.params.id);
      request.log.info({ follower: uid, author: author.id }, '[LEDGER] Subscribed');
      const [subscription] = await services.views.subscriptionViews([author], uid, config.maxPageSize);
      return reply.status(201).send({ success: true, subscription });
    }
  );

  fastify.delete<{ Params: IdParams }>(
    '/api/users/:id/subscribe',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      await services.ledger.unsubscribe(uid, request.params.id);
      request.log.info({ follower: uid, author: request.params.id }, '[LEDGER] Unsubscribed');
      return reply.status(204).send();
    }
  );
}
