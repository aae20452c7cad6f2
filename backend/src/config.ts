import { ConfigError } from './errors.js';

export interface FirebaseConfig {
  projectId?: string;
  clientEmail?: string;
  privateKey?: string;
  serviceAccountPath?: string;
}

export interface AppConfig {
  port: number;
  host: string;
  production: boolean;
  logLevel: string;
  allowedOrigins: string[];
  publicUrl: string;
  pageSize: number;
  maxPageSize: number;
  firebase: FirebaseConfig;
}

const DEFAULT_FRONTEND_URL = 'http://localhost:5173';

function parseInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Read settings from an environment map. Call `dotenv.config()` first when
 * settings should also come from a `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const production = env.NODE_ENV === 'production';
  const debug = parseFlag(env.DEBUG);
  const frontendUrl = env.FRONTEND_URL || DEFAULT_FRONTEND_URL;

  const allowedOrigins = [DEFAULT_FRONTEND_URL, frontendUrl, ...parseList(env.ALLOWED_ORIGINS)];

  const pageSize = parseInteger(env, 'PAGE_SIZE', 6);
  const maxPageSize = parseInteger(env, 'MAX_PAGE_SIZE', 100);
  if (pageSize > maxPageSize) {
    throw new ConfigError(`PAGE_SIZE (${pageSize}) cannot exceed MAX_PAGE_SIZE (${maxPageSize})`);
  }

  return {
    port: parseInteger(env, 'PORT', 3001),
    host: env.HOST || '0.0.0.0',
    production,
    logLevel: env.LOG_LEVEL || (debug || !production ? 'debug' : 'info'),
    allowedOrigins: [...new Set(allowedOrigins)],
    publicUrl: (env.PUBLIC_URL || frontendUrl).replace(/\/+$/, ''),
    pageSize,
    maxPageSize,
    firebase: {
      projectId: env.FIREBASE_PROJECT_ID,
      clientEmail: env.FIREBASE_CLIENT_EMAIL,
      privateKey: env.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, '\n'),
      serviceAccountPath: env.FIREBASE_SERVICE_ACCOUNT_PATH || env.GOOGLE_APPLICATION_CREDENTIALS,
    },
  };
}
