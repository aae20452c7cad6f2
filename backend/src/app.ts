import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { ApiErrorResponse } from '../../shared/types/index.js';
import type { AppConfig } from './config.js';
import { AppError } from './errors.js';
import { createAuthenticator } from './middleware/auth.js';
import { catalogRoutes } from './routes/catalog.js';
import { linkRoutes } from './routes/links.js';
import type { RouteOptions } from './routes/options.js';
import { recipeRoutes } from './routes/recipes.js';
import { userRoutes } from './routes/users.js';
import type { TokenVerifier } from './services/firebase.js';
import { createServices } from './services/index.js';
import type { Stores } from './services/stores.js';

export interface AppDependencies {
  config: AppConfig;
  stores: Stores;
  verifier: TokenVerifier;
  /** Defaults to the level from config; tests pass false. */
  logger?: boolean;
}

function errorBody(kind: ApiErrorResponse['kind'], error: string): ApiErrorResponse {
  return { success: false, kind, error };
}

export async function buildApp({ config, stores, verifier, logger = true }: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: logger ? { level: config.logLevel } : false,
  });

  // Register CORS
  await fastify.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (like mobile apps or curl)
      if (!origin) {
        callback(null, true);
        return;
      }

      if (config.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error(`Origin ${origin} not allowed by CORS`), false);
      }
    },
    credentials: true,
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      request.log.info({ kind: error.kind }, error.message);
      return reply.status(error.statusCode).send(errorBody(error.kind, error.message));
    }
    if (error.validation) {
      return reply.status(400).send(errorBody('ValidationError', error.message));
    }
    // Client errors raised by Fastify itself (malformed JSON, wrong content type, ...)
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorBody('ValidationError', error.message));
    }
    request.log.error(error);
    return reply.status(500).send(errorBody('InternalError', 'Internal server error'));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(errorBody('NotFoundError', `Route ${request.method} ${request.url} not found`));
  });

  const routeOptions: RouteOptions = {
    services: createServices(stores, config),
    auth: createAuthenticator(verifier),
    config,
  };

  // Register routes
  await fastify.register(linkRoutes, routeOptions);
  await fastify.register(catalogRoutes, routeOptions);
  await fastify.register(userRoutes, routeOptions);
  await fastify.register(recipeRoutes, routeOptions);

  return fastify;
}
