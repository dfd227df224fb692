/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables the connector reads.
 * Values are parsed by hand; the connector's own credentials are validated
 * separately with zod (see connectors/basecamp/BasecampConfig.ts).
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Basecamp credentials (checked again by the config validator)
  BASECAMP_URL?: string;
  BASECAMP_USERNAME?: string;
  BASECAMP_PASSWORD?: string;
  BASECAMP_DATA_SOURCE_ID: string;
  BASECAMP_USER_AGENT_APP: string;

  // Ingestion
  INGESTION_CONCURRENCY: number;
  INGESTION_UNIT_TIMEOUT_MS: number;
  HTTP_TIMEOUT_MS: number;

  // Index queue (Bull / Redis)
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  INDEX_QUEUE_NAME: string;
}

/**
 * Validate and normalize environment variables.
 *
 * @param source - Variables to read; defaults to process.env
 * @throws Error listing every invalid variable
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const errors: string[] = [];

  const rawNodeEnv = source.NODE_ENV || 'development';
  const nodeEnv = NODE_ENVS.find((value) => value === rawNodeEnv);
  if (!nodeEnv) {
    errors.push(`NODE_ENV: Invalid value "${rawNodeEnv}". Must be development, production, or test.`);
  }

  const concurrency = parseNumericEnv(source.INGESTION_CONCURRENCY, 4);
  if (concurrency < 1) {
    errors.push(`INGESTION_CONCURRENCY: Invalid value "${source.INGESTION_CONCURRENCY}". Must be at least 1.`);
  }

  const unitTimeoutMs = parseNumericEnv(source.INGESTION_UNIT_TIMEOUT_MS, 600_000);
  if (unitTimeoutMs < 0) {
    errors.push(`INGESTION_UNIT_TIMEOUT_MS: Invalid value "${source.INGESTION_UNIT_TIMEOUT_MS}". Use 0 to disable.`);
  }

  const httpTimeoutMs = parseNumericEnv(source.HTTP_TIMEOUT_MS, 30_000);
  if (httpTimeoutMs < 1) {
    errors.push(`HTTP_TIMEOUT_MS: Invalid value "${source.HTTP_TIMEOUT_MS}". Must be positive.`);
  }

  const redisPort = parseNumericEnv(source.REDIS_PORT, 6379);
  if (redisPort < 1 || redisPort > 65535) {
    errors.push(`REDIS_PORT: Invalid value "${source.REDIS_PORT}". Must be between 1 and 65535.`);
  }

  if (errors.length > 0 || !nodeEnv) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  return {
    NODE_ENV: nodeEnv,

    BASECAMP_URL: source.BASECAMP_URL,
    BASECAMP_USERNAME: source.BASECAMP_USERNAME,
    BASECAMP_PASSWORD: source.BASECAMP_PASSWORD,
    BASECAMP_DATA_SOURCE_ID: source.BASECAMP_DATA_SOURCE_ID || 'basecamp',
    BASECAMP_USER_AGENT_APP: source.BASECAMP_USER_AGENT_APP || 'BasecampConnector',

    INGESTION_CONCURRENCY: concurrency,
    INGESTION_UNIT_TIMEOUT_MS: unitTimeoutMs,
    HTTP_TIMEOUT_MS: httpTimeoutMs,

    REDIS_HOST: source.REDIS_HOST || 'localhost',
    REDIS_PORT: redisPort,
    REDIS_PASSWORD: source.REDIS_PASSWORD,
    INDEX_QUEUE_NAME: source.INDEX_QUEUE_NAME || 'index-documents',
  };
}
