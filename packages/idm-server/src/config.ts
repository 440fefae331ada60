import { DEFAULT_FILTER_DEPTH_LIMIT } from 'idm-proto';

export interface ServerConfig {
  databaseUrl: string;
  port: number;
  host: string;
  logLevel: string;
  sessionTtlMs: number;
  filterDepthLimit: number;
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `${name} must be a non-negative integer, got '${raw}'`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(name, `${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const databaseUrl = env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL', 'DATABASE_URL environment variable is required');
  }

  const logLevel = env['LOG_LEVEL'] || 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`);
  }

  return {
    databaseUrl,
    port: readInt(env, 'PORT', 8080, 1),
    host: env['HOST'] || '0.0.0.0',
    logLevel,
    sessionTtlMs: readInt(env, 'SESSION_TTL_SECONDS', 300, 1) * 1000,
    filterDepthLimit: readInt(env, 'FILTER_DEPTH_LIMIT', DEFAULT_FILTER_DEPTH_LIMIT, 1),
  };
}
