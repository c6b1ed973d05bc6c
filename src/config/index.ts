import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const intFromEnv = (def: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(def);

const ConfigSchema = z.object({
  PORT: intFromEnv(3000, 0, 65535),
  BACKEND_BASE_URL: z.string().trim().url().default('http://localhost:5000'),
  BACKEND_CONNECT_TIMEOUT_MS: intFromEnv(5000, 100, 120000),
  BACKEND_READ_TIMEOUT_MS: intFromEnv(10000, 100, 300000),
  DEFAULT_SYMBOL: z.string().trim().min(1).max(15).default('AAPL'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface BackendConfig {
  baseUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  backend: BackendConfig;
  defaultSymbol: string;
  logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL'];
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings count as unset so a blank line in .env falls back to the default
function blankToUndefined(env: NodeJS.ProcessEnv) {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const v = env[key];
    out[key] = v === undefined || v.trim() === '' ? undefined : v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    backend: {
      baseUrl: c.BACKEND_BASE_URL.replace(/\/+$/, ''),
      connectTimeoutMs: c.BACKEND_CONNECT_TIMEOUT_MS,
      readTimeoutMs: c.BACKEND_READ_TIMEOUT_MS,
    },
    defaultSymbol: c.DEFAULT_SYMBOL,
    logLevel: c.LOG_LEVEL,
  };
}
