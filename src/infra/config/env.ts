/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_PORT = 9475;
export const DEFAULT_REFERENCE_DATABASE_URL = 'postgresql://localhost:5432/who_choice_prices';
export const DEFAULT_TEMPLATES_DIR = './templates';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Integer({ default: DEFAULT_PORT, minimum: 1, maximum: 65535 }),
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

  // Reference data
  REFERENCE_DATABASE_URL: Type.String({ pattern: '^postgres(ql)?://' }),
  TEMPLATES_DIR: Type.String({ minLength: 1 }),

  // Costing
  DEFLATOR_COUNTRY: Type.String({ pattern: '^[A-Z]{3}$' }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value.trim() : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const port = nonEmpty(env['PORT']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: port !== undefined ? Number(port) : DEFAULT_PORT,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REFERENCE_DATABASE_URL: nonEmpty(env['REFERENCE_DATABASE_URL']) ?? DEFAULT_REFERENCE_DATABASE_URL,
    TEMPLATES_DIR: nonEmpty(env['TEMPLATES_DIR']) ?? DEFAULT_TEMPLATES_DIR,
    DEFLATOR_COUNTRY: (nonEmpty(env['DEFLATOR_COUNTRY']) ?? 'USA').toUpperCase(),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
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
  referenceData: {
    url: env.REFERENCE_DATABASE_URL,
    templatesDir: env.TEMPLATES_DIR,
  },
  costing: {
    /** Economy whose GDP deflator re-prices international dollars between years */
    deflatorCountry: env.DEFLATOR_COUNTRY,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
