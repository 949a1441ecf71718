import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const rawEnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SIM_SEED: z.string().trim().min(1).default('pocket-horde'),
  SIM_MAX_ACTIONS: z.coerce.number().int().min(1).max(10000).default(250),
  DATA_DIR: z.string().trim().min(1).optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  START_ROW: z.coerce.number().int().default(3),
  START_COL: z.coerce.number().int().default(3),
});

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  logLevel: string;
  seed: string;
  maxActions: number;
  dataDir: string;
  sessionTtlSeconds: number;
  start: { row: number; col: number };
}

export const parseConfigFromEnv = (env: NodeJS.ProcessEnv): AppConfig => {
  const raw = rawEnvSchema.parse(env);

  return {
    nodeEnv: raw.NODE_ENV,
    isProduction: raw.NODE_ENV === 'production',
    logLevel: raw.LOG_LEVEL,
    seed: raw.SIM_SEED,
    maxActions: raw.SIM_MAX_ACTIONS,
    dataDir: raw.DATA_DIR ?? DEFAULT_DATA_DIR,
    sessionTtlSeconds: raw.SESSION_TTL_SECONDS,
    start: { row: raw.START_ROW, col: raw.START_COL },
  };
};
