import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 3001,
      host: '0.0.0.0',
      production: false,
      logLevel: 'debug',
      allowedOrigins: ['http://localhost:5173'],
      publicUrl: 'http://localhost:5173',
      pageSize: 6,
      maxPageSize: 100,
    });
  });

  it('reads origins, public url and credentials', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      FRONTEND_URL: 'https://app.example.com',
      ALLOWED_ORIGINS: 'https://a.example.com, https://app.example.com,',
      PUBLIC_URL: 'https://share.example.com//',
      FIREBASE_PRIVATE_KEY: 'line1\\nline2',
      GOOGLE_APPLICATION_CREDENTIALS: './sa.json',
    });

    expect(config.logLevel).toBe('info');
    expect(config.allowedOrigins).toEqual([
      'http://localhost:5173',
      'https://app.example.com',
      'https://a.example.com',
    ]);
    expect(config.publicUrl).toBe('https://share.example.com');
    expect(config.firebase.privateKey).toBe('line1\nline2');
    expect(config.firebase.serviceAccountPath).toBe('./sa.json');
  });

  it('lets LOG_LEVEL and DEBUG override the level', () => {
    expect(loadConfig({ NODE_ENV: 'production', DEBUG: 'true' }).logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });

  it('rejects bad numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a positive integer, got "eighty"');
    expect(() => loadConfig({ PAGE_SIZE: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ PAGE_SIZE: '50', MAX_PAGE_SIZE: '20' })).toThrow(
      'PAGE_SIZE (50) cannot exceed MAX_PAGE_SIZE (20)'
    );
  });
});
