/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_EXPORT_URL = 'https://prod.nais.nasa.gov/cgibin/npdv/usmap05.cgi';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

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

  // Export service
  EXPORT_URL: Type.String({ minLength: 1 }),
  REQUEST_TIMEOUT_MS: Type.Number({ minimum: 1 }),

  // Output
  OUTPUT_DIR: Type.String({ minLength: 1 }),
  OUTPUT_FILE_PREFIX: Type.String({ minLength: 1 }),

  // Reference data
  REFERENCE_DIR: Type.String({ minLength: 1 }),
  ACRONYMS_FILE: Type.Optional(Type.String({ minLength: 1 })),
});

export type Env = Static<typeof EnvSchema>;

const parseTimeout = (raw: string | undefined): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : 30_000;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    EXPORT_URL: env['EXPORT_URL'] ?? DEFAULT_EXPORT_URL,
    REQUEST_TIMEOUT_MS: parseTimeout(env['REQUEST_TIMEOUT_MS']),
    OUTPUT_DIR: env['OUTPUT_DIR'] ?? 'data',
    OUTPUT_FILE_PREFIX: env['OUTPUT_FILE_PREFIX'] ?? 'contracts',
    REFERENCE_DIR: env['REFERENCE_DIR'] ?? 'reference',
    ACRONYMS_FILE: env['ACRONYMS_FILE'],
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
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  exportService: {
    url: env.EXPORT_URL,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  },
  output: {
    dir: env.OUTPUT_DIR,
    filePrefix: env.OUTPUT_FILE_PREFIX,
  },
  reference: {
    statesFile: path.join(env.REFERENCE_DIR, 'states.json'),
    /** Description normalization is off unless a reference CSV is named */
    acronymsFile:
      env.ACRONYMS_FILE !== undefined
        ? path.resolve(env.REFERENCE_DIR, env.ACRONYMS_FILE)
        : undefined,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
