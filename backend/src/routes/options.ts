import type { FastifyPluginOptions } from 'fastify';
import type { AppConfig } from '../config.js';
import type { Authenticator } from '../middleware/auth.js';
import type { Services } from '../services/index.js';
import type { PageQuery, PageRequest } from '../types/index.js';

export interface RouteOptions extends FastifyPluginOptions {
  services: Services;
  auth: Authenticator;
  config: Pick<AppConfig, 'pageSize' | 'maxPageSize'>;
}

export const idParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string', minLength: 1 } },
} as const;

export const pageQueryProperties = {
  page: { type: 'integer', minimum: 1 },
  limit: { type: 'integer', minimum: 1 },
} as const;

export function pageRequest(query: PageQuery, config: RouteOptions['config']): PageRequest {
  return {
    page: query.page ?? 1,
    limit: Math.min(query.limit ?? config.pageSize, config.maxPageSize),
  };
}

/** Query-string flags: "1" and "true" switch a filter on. */
export function isFlagSet(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}
