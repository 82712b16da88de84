/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),

  // NREGS dashboard API
  METRICS_API_BASE_URL: Type.String({ minLength: 1 }),
  METRICS_API_KEY: Type.Optional(Type.String()),
  METRICS_API_TIMEOUT_MS: Type.Optional(Type.Integer({ minimum: 1 })),
  METRICS_FETCH_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 15 }),

  // Report generation (LLM)
  OPENAI_API_KEY: Type.Optional(Type.String()),
  REPORT_MODEL: Type.String({ minLength: 1 }),
  REPORT_MAX_TOKENS: Type.Integer({ minimum: 1 }),
  REPORT_OUTPUT_DIR: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const DEFAULT_METRICS_API_BASE_URL = 'https://dashboard.nregsmp.org';

const parseOptionalInt = (raw: string | undefined): number | undefined =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const timeoutMs = parseOptionalInt(env['METRICS_API_TIMEOUT_MS']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseOptionalInt(env['PORT']) ?? 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    METRICS_API_BASE_URL: env['METRICS_API_BASE_URL'] ?? DEFAULT_METRICS_API_BASE_URL,
    METRICS_API_KEY: env['METRICS_API_KEY'],
    ...(timeoutMs !== undefined && { METRICS_API_TIMEOUT_MS: timeoutMs }),
    METRICS_FETCH_CONCURRENCY: parseOptionalInt(env['METRICS_FETCH_CONCURRENCY']) ?? 1,
    OPENAI_API_KEY: env['OPENAI_API_KEY'],
    REPORT_MODEL: env['REPORT_MODEL'] ?? 'gpt-4o',
    REPORT_MAX_TOKENS: parseOptionalInt(env['REPORT_MAX_TOKENS']) ?? 16000,
    REPORT_OUTPUT_DIR: env['REPORT_OUTPUT_DIR'] ?? 'output',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
  metrics: {
    baseUrl: env.METRICS_API_BASE_URL.replace(/\/+$/, ''),
    /** Static key passed through to the dashboard API as `x-api-key` */
    apiKey: env.METRICS_API_KEY,
    /** Per-request timeout; undefined keeps the fetch default */
    timeoutMs: env.METRICS_API_TIMEOUT_MS,
    /** How many endpoints of one scope are requested at once (1 = sequential) */
    fetchConcurrency: env.METRICS_FETCH_CONCURRENCY,
  },
  report: {
    openaiApiKey: env.OPENAI_API_KEY,
    model: env.REPORT_MODEL,
    maxTokens: env.REPORT_MAX_TOKENS,
    outputDir: env.REPORT_OUTPUT_DIR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
