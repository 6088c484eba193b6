import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';
import defaultRules from './classification-rules.json';
import { MODELS } from './groq';

export interface ClassificationRules {
  workApps: string[];
  privateApps: string[];
  browsers: string[];
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  databaseUrl: string;
  daemonApiKey: string;
  ai: {
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  classification: {
    rules: ClassificationRules;
    concurrency: number;
    defaultSampleDurationSeconds: number;
  };
  auth: {
    jwtSecret: string;
    accessTokenExpireMinutes: number;
  };
}

const appList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0)
  )
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DAEMON_API_KEY: z.string().min(1, 'DAEMON_API_KEY is required'),
  // Without a key every browser sample degrades to Private.
  GROQ_API_KEY: z.string().default(''),
  GROQ_MODEL: z.string().min(1).default(MODELS.FAST),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CLASSIFICATION_CONCURRENCY: z.coerce.number().int().positive().default(5),
  DEFAULT_SAMPLE_DURATION_SECONDS: z.coerce.number().int().positive().default(5),
  WORK_APPS: appList,
  PRIVATE_APPS: appList,
  BROWSER_APPS: appList,
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24),
});

function normalizeList(entries: string[]): string[] {
  return entries.map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0);
}

/**
 * Build the application config from environment variables.
 * Nothing outside this function reads process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    databaseUrl: values.DATABASE_URL,
    daemonApiKey: values.DAEMON_API_KEY,
    ai: {
      apiKey: values.GROQ_API_KEY,
      model: values.GROQ_MODEL,
      timeoutMs: values.AI_TIMEOUT_MS,
    },
    classification: {
      rules: {
        workApps: values.WORK_APPS ?? normalizeList(defaultRules.workApps),
        privateApps: values.PRIVATE_APPS ?? normalizeList(defaultRules.privateApps),
        browsers: values.BROWSER_APPS ?? normalizeList(defaultRules.browsers),
      },
      concurrency: values.CLASSIFICATION_CONCURRENCY,
      defaultSampleDurationSeconds: values.DEFAULT_SAMPLE_DURATION_SECONDS,
    },
    auth: {
      jwtSecret: values.JWT_SECRET,
      accessTokenExpireMinutes: values.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
  };
}

/** Load `.env` into process.env, then validate it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
