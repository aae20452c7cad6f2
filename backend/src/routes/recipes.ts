import type { FastifyInstance } from 'fastify';
import { currentUser } from '../middleware/auth.js';
import {
  MAX_AMOUNT,
  MAX_COOKING_TIME,
  MAX_NAME_LENGTH,
  MAX_TAG_FILTER,
  MIN_AMOUNT,
  MIN_COOKING_TIME,
} from '../services/recipes.js';
import { recipeSummary } from '../services/views.js';
import type { IdParams, RecipeInput, RecipeListQuery } from '../types/index.js';
import { idParamsSchema, isFlagSet, pageQueryProperties, pageRequest, type RouteOptions } from './options.js';

const SHOPPING_LIST_FILENAME = 'shopping-list.txt';

const recipeBodySchema = {
  type: 'object',
  required: ['name', 'text', 'cookingTime', 'ingredients'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1, maxLength: MAX_NAME_LENGTH },
    text: { type: 'string', minLength: 1 },
    imageUrl: { type: 'string', maxLength: 2048 },
    cookingTime: { type: 'integer', minimum: MIN_COOKING_TIME, maximum: MAX_COOKING_TIME },
    tags: { type: 'array', items: { type: 'string', minLength: 1 } },
    ingredients: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['id', 'amount'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          amount: { type: 'integer', minimum: MIN_AMOUNT, maximum: MAX_AMOUNT },
        },
      },
    },
  },
} as const;

const listQuerySchema = {
  type: 'object',
  properties: {
    ...pageQueryProperties,
    author: { type: 'string', minLength: 1 },
    tags: { type: 'array', maxItems: MAX_TAG_FILTER, items: { type: 'string' } },
    isFavorited: { type: 'string', enum: ['0', '1', 'true', 'false'] },
    isInShoppingCart: { type: 'string', enum: ['0', '1', 'true', 'false'] },
  },
} as const;

export async function recipeRoutes(fastify: FastifyInstance, { services, auth, config }: RouteOptions) {
  fastify.get<{ Querystring: RecipeListQuery }>(
    '/api/recipes',
    { preHandler: auth.identifyUser, schema: { querystring: listQuerySchema } },
    async (request) => {
      const { query } = request;
      const viewerId = request.user?.uid;
      const page = await services.recipes.listRecipes(
        {
          authorId: query.author,
          tagSlugs: query.tags,
          // Viewer filters mean nothing to anonymous callers
          favoritesOf: viewerId && isFlagSet(query.isFavorited) ? viewerId : undefined,
          inCartOf: viewerId && isFlagSet(query.isInShoppingCart) ? viewerId : undefined,
        },
        pageRequest(query, config)
      );
      return {
        success: true,
        ...page,
        results: await services.views.recipeViews(page.results, viewerId),
      };
    }
  );

  fastify.post<{ Body: RecipeInput }>(
    '/api/recipes',
    { preHandler: auth.requireUser, schema: { body: recipeBodySchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      const recipe = await services.recipes.createRecipe(uid, request.body);
      request.log.info({ recipeId: recipe.id, authorId: uid }, '[RECIPES] Recipe created');
      return reply.status(201).send({ success: true, recipe: await services.views.recipeView(recipe, uid) });
    }
  );

  fastify.get('/api/recipes/shopping_cart', { preHandler: auth.requireUser }, async (request) => {
    const recipeIds = await services.shoppingList.getCart(currentUser(request).uid);
    return { success: true, recipeIds };
  });

  fastify.delete('/api/recipes/shopping_cart', { preHandler: auth.requireUser }, async (request, reply) => {
    const { uid } = currentUser(request);
    await services.shoppingList.clearCart(uid);
    request.log.info({ uid }, '[CART] Cart cleared');
    return reply.status(204).send();
  });

  fastify.get(
    '/api/recipes/download_shopping_cart',
    { preHandler: auth.requireUser },
    async (request, reply) => {
      const { uid } = currentUser(request);
      const exported = await services.shoppingList.exportCart(uid);
      request.log.info(
        { uid, recipes: exported.recipeCount, lines: exported.entries.length },
        '[CART] Shopping list exported'
      );
      return reply
        .header('Content-Type', 'text/plain; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="${SHOPPING_LIST_FILENAME}"`)
        .send(exported.text);
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/api/recipes/:id',
    { preHandler: auth.identifyUser, schema: { params: idParamsSchema } },
    async (request) => {
      const recipe = await services.recipes.getRecipe(request.params.id);
      return { success: true, recipe: await services.views.recipeView(recipe, request.user?.uid) };
    }
  );

  fastify.patch<{ Params: IdParams; Body: RecipeInput }>(
    '/api/recipes/:id',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema, body: recipeBodySchema } },
    async (request) => {
      const { uid } = currentUser(request);
      const recipe = await services.recipes.updateRecipe(uid, request.params.id, request.body);
      request.log.info({ recipeId: recipe.id }, '[RECIPES] Recipe updated');
      return { success: true, recipe: await services.views.recipeView(recipe, uid) };
    }
  );

  fastify.delete<{ Params: IdParams }>(
    '/api/recipes/:id',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      await services.recipes.deleteRecipe(currentUser(request).uid, request.params.id);
      request.log.info({ recipeId: request.params.id }, '[RECIPES] Recipe deleted');
      return reply.status(204).send();
    }
  );

  fastify.post<{ Params: IdParams }>(
    '/api/recipes/:id/favorite',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      const recipe = await services.ledger.addFavorite(uid, request.params.id);
      request.log.info({ uid, recipeId: recipe.id }, '[LEDGER] Favorite added');
      return reply.status(201).send({ success: true, recipe: recipeSummary(recipe) });
    }
  );

  fastify.delete<{ Params: IdParams }>(
    '/api/recipes/:id/favorite',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      await services.ledger.removeFavorite(uid, request.params.id);
      request.log.info({ uid, recipeId: request.params.id }, '[LEDGER] Favorite removed');
      return reply.status(204).send();
    }
  );

  fastify.post<{ Params: IdParams }>(
    '/api/recipes/:id/shopping_cart',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      const recipe = await services.shoppingList.addToCart(uid, request.params.id);
      request.log.info({ uid, recipeId: recipe.id }, '[CART] Recipe added');
      return reply.status(201).send({ success: true, recipe: recipeSummary(recipe) });
    }
  );

  fastify.delete<{ Params: IdParams }>(
    '/api/recipes/:id/shopping_cart',
    { preHandler: auth.requireUser, schema: { params: idParamsSchema } },
    async (request, reply) => {
      const { uid } = currentUser(request);
      await services.shoppingList.removeFromCart(uid, request.params.id);
      request.log.info({ uid, recipeId: request.params.id }, '[CART] Recipe removed');
      return reply.status(204).send();
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/api/recipes/:id/get-link',
    { schema: { params: idParamsSchema } },
    async (request) => {
      const shortLink = await services.shortLinks.getShareLink(request.params.id);
      return { success: true, shortLink };
    }
  );
}
