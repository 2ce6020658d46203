import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { AppConfigSchema } from '../schemas/configSchema.js';
import { ConfigurationError } from '../utils/errors.js';
import type { AppConfig, BigQueryTarget } from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function loadJsonConfig<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const configPath = join(__dirname, '../../config', filename);
  const content = readFileSync(configPath, 'utf-8');
  const parsed = schema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${filename}: ${parsed.error.message}`);
  }
  return parsed.data;
}

// Load configuration
export const appConfig: AppConfig = loadJsonConfig('default.json', AppConfigSchema);

/**
 * Environment variables the deploy workflow must set on the function.
 */
export const REQUIRED_ENV_VARS = [
  'TELEGRAM_TOKEN',
  'OPENAI_API_KEY',
  'BQ_PROJECT',
  'BQ_DATASET',
  'BQ_TABLE'
] as const;

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

// Environment-based overrides
export function getConfig(): AppConfig {
  return {
    ...appConfig,
    timezone: process.env.BOT_TIMEZONE || appConfig.timezone
  };
}

// Get environment variables with defaults
export function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value) {
    return value;
  }
  if (defaultValue === undefined) {
    throw new ConfigurationError(`Environment variable ${name} is required but not set`);
  }
  return defaultValue;
}

export function getTelegramToken(): string {
  return getEnvVar('TELEGRAM_TOKEN');
}

export function getOpenAIApiKey(): string {
  return getEnvVar('OPENAI_API_KEY');
}

export function getBigQueryTarget(): BigQueryTarget {
  return {
    projectId: getEnvVar('BQ_PROJECT'),
    datasetId: getEnvVar('BQ_DATASET'),
    tableId: getEnvVar('BQ_TABLE')
  };
}
