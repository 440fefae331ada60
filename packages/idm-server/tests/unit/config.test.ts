import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../../src/config.js';

const BASE = { DATABASE_URL: 'postgres://localhost/idm_test' };

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(BASE)).toEqual({
      databaseUrl: 'postgres://localhost/idm_test',
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      sessionTtlMs: 300_000,
      filterDepthLimit: 32,
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        ...BASE,
        PORT: '9000',
        HOST: '127.0.0.1',
        LOG_LEVEL: 'debug',
        SESSION_TTL_SECONDS: '60',
        FILTER_DEPTH_LIMIT: '8',
      }),
    ).toEqual({
      databaseUrl: 'postgres://localhost/idm_test',
      port: 9000,
      host: '127.0.0.1',
      logLevel: 'debug',
      sessionTtlMs: 60_000,
      filterDepthLimit: 8,
    });
  });

  it('requires DATABASE_URL', () => {
    const error = configError(() => loadConfig({}));
    expect(error.variable).toBe('DATABASE_URL');
    expect(error.name).toBe('ConfigError');
  });

  it('rejects integers it cannot parse', () => {
    const error = configError(() => loadConfig({ ...BASE, PORT: '80a' }));
    expect(error.variable).toBe('PORT');
    expect(error.message).toBe("PORT must be a non-negative integer, got '80a'");
  });

  it('rejects values below the minimum', () => {
    const error = configError(() => loadConfig({ ...BASE, FILTER_DEPTH_LIMIT: '0' }));
    expect(error.message).toBe('FILTER_DEPTH_LIMIT must be at least 1, got 0');
  });

  it('rejects unknown log levels', () => {
    expect(configError(() => loadConfig({ ...BASE, LOG_LEVEL: 'loud' })).variable).toBe('LOG_LEVEL');
  });
});
