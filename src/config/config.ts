/**
 * Application Configuration
 * Reads settings from the environment once at startup and checks they are usable
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

// ============================================
// Types
// ============================================

export type Environment = 'development' | 'production';

export type PayloadFormat = 'split' | 'records';

export interface ScoringConfig {
  /** MLflow model serving endpoint (invocations URL) */
  endpointUrl: string;
  /** Bearer token for the serving endpoint. Never log this. */
  token: string;
  /** Abort the remote call after this many ms */
  timeoutMs: number;
  /** Request body layout expected by the serving endpoint */
  payloadFormat: PayloadFormat;
}

export interface ServerConfig {
  port: number;
  host: string;
  /** Empty disables CORS */
  corsOrigins: string[];
  /** Log every request and its outcome */
  debug: boolean;
}

export interface AppConfig {
  appName: string;
  appVersion: string;
  environment: Environment;
  scoring: ScoringConfig;
  server: ServerConfig;
}

export interface ConfigValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================
// Environment Parsing
// ============================================

const DEFAULT_TIMEOUT_SECONDS = 30;

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export const timeoutMsSchema = z
  .number()
  .int()
  .min(1, { message: 'must be at least 0.001 seconds' })
  .max(MAX_TIMEOUT_MS, { message: `must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds` });

/** REQUEST_TIMEOUT is given in seconds */
const timeoutSecondsSchema = z.coerce
  .number()
  .finite()
  .transform((seconds) => Math.round(seconds * 1000))
  .pipe(timeoutMsSchema);

export const portSchema = z.coerce.number().int().min(0).max(65535);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'], {
    errorMap: () => ({ message: 'expected true or false' }),
  })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  MLFLOW_ENDPOINT_URL: z.string().default(''),
  DATABRICKS_TOKEN: z.string().default(''),
  REQUEST_TIMEOUT: timeoutSecondsSchema.default(DEFAULT_TIMEOUT_SECONDS),
  PAYLOAD_FORMAT: z.enum(['split', 'records']).default('split'),
  APP_ENV: z.enum(['development', 'production']).default('development'),
  DEBUG: booleanFlag.optional(),
  HOST: z.string().default('0.0.0.0'),
  PORT: portSchema.default(4000),
  CORS_ORIGINS: z.string().default(''),
  APP_NAME: z.string().default('Diabetes Progression Predictor'),
  APP_VERSION: z.string().default('1.0.0'),
});

/**
 * Blank values count as unset so `PORT=` in a .env file falls back to the default
 */
function pickSet(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(pickSet(env));
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} is invalid: ${issue.message}.`)
    );
  }

  const vars = parsed.data;
  const production = vars.APP_ENV === 'production';

  return Object.freeze({
    appName: vars.APP_NAME,
    appVersion: vars.APP_VERSION,
    environment: vars.APP_ENV,
    scoring: Object.freeze({
      endpointUrl: vars.MLFLOW_ENDPOINT_URL,
      token: vars.DATABRICKS_TOKEN,
      timeoutMs: vars.REQUEST_TIMEOUT,
      payloadFormat: vars.PAYLOAD_FORMAT,
    }),
    server: Object.freeze({
      host: vars.HOST,
      port: vars.PORT,
      corsOrigins: vars.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
      debug: production ? false : vars.DEBUG ?? true,
    }),
  });
}

// ============================================
// Validation
// ============================================

export function validateConfig(config: AppConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { endpointUrl, token } = config.scoring;

  if (!token) {
    errors.push('DATABRICKS_TOKEN is not set. Please set it in your .env file or as an environment variable.');
  }

  if (!endpointUrl) {
    errors.push('MLFLOW_ENDPOINT_URL is not set. Please configure your MLflow endpoint URL.');
  } else if (!endpointUrl.startsWith('https://')) {
    warnings.push(`MLFLOW_ENDPOINT_URL should use HTTPS. Current URL: ${endpointUrl}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

export function assertConfigured(config: AppConfig): void {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigurationError(errors);
  }
}
