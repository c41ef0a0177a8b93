import { z } from 'zod';
import { HarvesterErrors } from '../errors.js';

const envSchema = z.object({
  // Overpass API
  OVERPASS_BASE_URL: z.string().url().default('https://overpass-api.de/api'),
  OVERPASS_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  OVERPASS_MAX_RETRIES: z.coerce.number().int().min(1).default(2),
  OVERPASS_RATE_LIMIT_BACKOFF_MS: z.coerce.number().int().min(0).default(10_000),
  OVERPASS_NETWORK_BACKOFF_MS: z.coerce.number().int().min(0).default(3_000),
  OVERPASS_USER_AGENT: z.string().min(1).default('HouseGenerator-OSM/2.0'),

  // Pacing between queries issued by the generator
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1_100),

  // Houses log
  OUTPUT_DIR: z.string().min(1).default('osm_houses'),
  HOUSES_FILE: z.string().min(1).default('houses_osm.txt'),
  HOUSES_LOG_MODE: z.enum(['truncate', 'append']).default('truncate'),

  // Diagnostics
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LOG_FILE: z.string().default('logs/house_osm_generator.log'),
});

export type Env = z.infer<typeof envSchema>;

export interface HarvesterConfig {
  overpass: {
    baseURL: string;
    timeoutMs: number;
    maxRetries: number;
    rateLimitBackoffMs: number;
    networkBackoffMs: number;
    userAgent: string;
  };
  requestDelayMs: number;
  store: {
    outputDir: string;
    fileName: string;
    mode: 'truncate' | 'append';
  };
  logLevel: Env['LOG_LEVEL'];
  logFile: string | null;
}

/**
 * Validate the environment and map it onto the harvester's configuration.
 * Throws CONFIG_ERROR with zod's field errors when a variable is malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw HarvesterErrors.invalidConfig(parsed.error.flatten().fieldErrors);
  }

  const env = parsed.data;
  return {
    overpass: {
      baseURL: env.OVERPASS_BASE_URL,
      timeoutMs: env.OVERPASS_TIMEOUT_MS,
      maxRetries: env.OVERPASS_MAX_RETRIES,
      rateLimitBackoffMs: env.OVERPASS_RATE_LIMIT_BACKOFF_MS,
      networkBackoffMs: env.OVERPASS_NETWORK_BACKOFF_MS,
      userAgent: env.OVERPASS_USER_AGENT,
    },
    requestDelayMs: env.REQUEST_DELAY_MS,
    store: {
      outputDir: env.OUTPUT_DIR,
      fileName: env.HOUSES_FILE,
      mode: env.HOUSES_LOG_MODE,
    },
    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE === '' ? null : env.LOG_FILE,
  };
}
