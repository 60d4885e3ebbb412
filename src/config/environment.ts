import { z } from 'zod';
import fs from 'fs';
import { DEFAULT_USER_AGENT } from './constants';

const booleanFlag = z
  .union([z.literal('true'), z.literal('false'), z.literal('1'), z.literal('0')])
  .transform(value => value === 'true' || value === '1');

const EnvironmentSchema = z.object({
  // HTTP fetch
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Extraction defaults
  INCLUDE_IMAGES: booleanFlag.default('true'),
  MAX_CHART_ENTRIES: z.coerce.number().int().positive().optional(),
  FALLBACK_TO_DEFAULT: booleanFlag.default('true'),

  // Crawl isolation
  CRAWL_MODE: z.enum(['process', 'inline']).default('process'),
  CRAWL_WORKER_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  CONCURRENCY: z.coerce.number().int().min(1).max(10).default(2),

  // Placeholder provider; only registered when a client id is present
  SPOTIFY_CLIENT_ID: z.string().min(1).optional(),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);

    if (env.RETRY_BACKOFF_MAX_MS < env.RETRY_BACKOFF_BASE_MS) {
      env.RETRY_BACKOFF_MAX_MS = env.RETRY_BACKOFF_BASE_MS;
    }

    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

// Pretty logs are pointless inside a container
export function isRunningInDocker(): boolean {
  if (process.env.DOCKER_CONTAINER) {
    return true;
  }
  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    return false;
  }
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
