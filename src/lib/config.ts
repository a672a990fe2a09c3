/**
 * DevGate — Configuration
 *
 * Reads the environment once at process start into a frozen
 * GatewayConfig. Adapters receive the struct through their constructor
 * and never touch process.env while serving a request.
 *
 * Secrets are optional here: an adapter that needs one fails the
 * request with a ConfigurationError when it is missing, so the other
 * sources keep working.
 */

import { z } from 'zod';
import { formatZodIssues } from './errors';

export const DEFAULT_CORS_ORIGINS = [
  'http://localhost:8001',
  'http://127.0.0.1:8001',
  'http://0.0.0.0:8001',
];

export const DEFAULT_GITLAB_URL = 'https://gitlab.com';

// Empty strings in a .env file mean "not set"
const optionalSecret = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
  UPSTREAM_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(10_000)
  ),
  CORS_ORIGINS: optionalSecret,
  GITHUB_TOKEN: optionalSecret,
  GITHUB_API_TOKEN: optionalSecret,
  GITLAB_URL: optionalSecret.pipe(z.string().url().optional()),
  GITLAB_TOKEN: optionalSecret,
  DEVTO_API_KEY: optionalSecret,
  KAGGLE_USERNAME: optionalSecret,
  KAGGLE_KEY: optionalSecret,
  CODEFORCES_HANDLE: optionalSecret,
  STACKOVERFLOW_USER_ID: optionalSecret.pipe(
    z.string().regex(/^\d+$/, 'must be a numeric user id').transform(Number).optional()
  ),
  STACKOVERFLOW_USERNAME: optionalSecret,
});

export interface GatewayConfig {
  port: number;
  upstreamTimeoutMs: number;
  corsOrigins: string[];
  github: {
    token?: string;
  };
  gitlab: {
    baseUrl: string;
    token?: string;
  };
  devto: {
    apiKey?: string;
  };
  kaggle: {
    username?: string;
    key?: string;
  };
  codeforces: {
    defaultHandle?: string;
  };
  stackoverflow: {
    defaultUserId?: number;
    defaultUsername?: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseOrigins(value: string | undefined): string[] {
  if (!value) return [...DEFAULT_CORS_ORIGINS];
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}

/**
 * Build the gateway configuration from an environment map.
 * Throws ConfigError on malformed values (bad port, non-numeric ids).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatZodIssues(parsed.error)}`);
  }

  const vars = parsed.data;

  const config: GatewayConfig = {
    port: vars.PORT,
    upstreamTimeoutMs: vars.UPSTREAM_TIMEOUT_MS,
    corsOrigins: parseOrigins(vars.CORS_ORIGINS),
    github: {
      token: vars.GITHUB_TOKEN ?? vars.GITHUB_API_TOKEN,
    },
    gitlab: {
      baseUrl: (vars.GITLAB_URL ?? DEFAULT_GITLAB_URL).replace(/\/+$/, ''),
      token: vars.GITLAB_TOKEN,
    },
    devto: {
      apiKey: vars.DEVTO_API_KEY,
    },
    kaggle: {
      username: vars.KAGGLE_USERNAME,
      key: vars.KAGGLE_KEY,
    },
    codeforces: {
      defaultHandle: vars.CODEFORCES_HANDLE,
    },
    stackoverflow: {
      defaultUserId: vars.STACKOVERFLOW_USER_ID,
      defaultUsername: vars.STACKOVERFLOW_USERNAME,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
