import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

// Every key falls back instead of failing: the logger reads these settings
// when any module is first imported.
const SettingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
  LOG_LEVEL: z
    .preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(LOG_LEVELS))
    .catch('info'),
  LOG_DIR: z.string().min(1).optional().catch(undefined),
  PORT: z.coerce.number().int().positive().catch(3000),
  TEMPLATES_DIR: z.string().min(1).catch(path.join(os.homedir(), '.query-assembler', 'templates')),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().catch(900000), // 15 minutes
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().catch(100),
});

export interface Settings {
  env: 'development' | 'production' | 'test';
  logLevel: string;
  logDir?: string;
  port: number;
  templatesDir: string;
  rateLimit: { windowMs: number; max: number };
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    ...(parsed.LOG_DIR ? { logDir: parsed.LOG_DIR } : {}),
    port: parsed.PORT,
    templatesDir: parsed.TEMPLATES_DIR,
    rateLimit: { windowMs: parsed.RATE_LIMIT_WINDOW_MS, max: parsed.RATE_LIMIT_REQUESTS },
  };
}

export const settings = loadSettings();
