/**
 * Environment Variable Validation
 *
 * Centralized parsing and validation of the environment variables the
 * DATEX2 tooling reads. Values are parsed by hand and collected into one
 * typed, cached object.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

export const DEFAULT_DATEX2_URL = 'https://nap.dgt.es/datex2/v3/dgt/SituationPublication/datex2_v36.xml';

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseStringEnv(value: string | undefined, defaultValue: string): string {
  if (!value || value.trim().length === 0) return defaultValue;
  return value.trim();
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL?: string;

  // DATEX2 feed
  DATEX2_URL: string;
  DATEX2_LOCAL_FILE: string;
  DATEX2_FETCH_TIMEOUT_MS: number;
  DATEX2_FETCH_MAX_RETRIES: number;

  // Output files
  MAP_OUTPUT_FILE: string;
  STATS_HTML_OUTPUT_FILE: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate environment variables
 * Validates on first call, then returns cached result
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const datex2Url = parseStringEnv(process.env.DATEX2_URL, DEFAULT_DATEX2_URL);
  try {
    const parsedUrl = new URL(datex2Url);
    if (parsedUrl.protocol !== 'http:' && parsedUrl.protocol !== 'https:') {
      errors.push(`DATEX2_URL: Invalid protocol "${parsedUrl.protocol}". Must be http or https.`);
    }
  } catch {
    errors.push(`DATEX2_URL: Invalid URL "${datex2Url}".`);
  }

  const fetchTimeout = parseNumericEnv(process.env.DATEX2_FETCH_TIMEOUT_MS, 30000);
  if (fetchTimeout < 1) {
    errors.push(`DATEX2_FETCH_TIMEOUT_MS: Invalid value "${process.env.DATEX2_FETCH_TIMEOUT_MS}". Must be at least 1.`);
  }

  const maxRetries = parseNumericEnv(process.env.DATEX2_FETCH_MAX_RETRIES, 2);
  if (maxRetries < 0 || maxRetries > 10) {
    errors.push(`DATEX2_FETCH_MAX_RETRIES: Invalid value "${process.env.DATEX2_FETCH_MAX_RETRIES}". Must be between 0 and 10.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL || undefined,
    DATEX2_URL: datex2Url,
    DATEX2_LOCAL_FILE: parseStringEnv(process.env.DATEX2_LOCAL_FILE, 'datex2_v36.xml'),
    DATEX2_FETCH_TIMEOUT_MS: fetchTimeout,
    DATEX2_FETCH_MAX_RETRIES: maxRetries,
    MAP_OUTPUT_FILE: parseStringEnv(process.env.MAP_OUTPUT_FILE, 'mapa_v16.html'),
    STATS_HTML_OUTPUT_FILE: parseStringEnv(process.env.STATS_HTML_OUTPUT_FILE, 'estadisticas_v16.html'),
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
