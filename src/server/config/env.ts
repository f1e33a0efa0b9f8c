/**
 * Environment Variable Validation
 *
 * Centralized parsing and validation of the harvester's environment variables.
 */

// Load dotenv early so values from .env are visible to validateEnv()
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

type NodeEnv = 'development' | 'production' | 'test';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL?: string;

  // SIEG retrieval API
  SIEG_API_KEY?: string;
  SIEG_BASE_URL: string;
  SIEG_PAGE_SIZE: number;
  SIEG_REQUEST_INTERVAL_MS: number;
  SIEG_TIMEOUT_MS: number;
  SIEG_MAX_RETRIES: number;

  // Download layout
  DOWNLOAD_WINDOW_HOURS: number;
  OUTPUT_DIR: string;

  // Local XML files
  XML_MAX_FILE_BYTES: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If any value is invalid
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

  const baseUrl = process.env.SIEG_BASE_URL || 'https://api.sieg.com/BaixarXmls';
  if (!/^https?:\/\//.test(baseUrl)) {
    errors.push(`SIEG_BASE_URL: Invalid value "${baseUrl}". Must be an http(s) URL.`);
  }

  // The API never returns more than 50 documents per call
  const pageSize = parseNumericEnv(process.env.SIEG_PAGE_SIZE, 50);
  if (pageSize < 1 || pageSize > 50) {
    errors.push(`SIEG_PAGE_SIZE: Invalid value "${process.env.SIEG_PAGE_SIZE}". Must be between 1 and 50.`);
  }

  const requestInterval = parseNumericEnv(process.env.SIEG_REQUEST_INTERVAL_MS, 3000);
  if (requestInterval < 0) {
    errors.push(`SIEG_REQUEST_INTERVAL_MS: Invalid value "${process.env.SIEG_REQUEST_INTERVAL_MS}". Must be 0 or greater.`);
  }

  const timeout = parseNumericEnv(process.env.SIEG_TIMEOUT_MS, 30000);
  if (timeout < 1) {
    errors.push(`SIEG_TIMEOUT_MS: Invalid value "${process.env.SIEG_TIMEOUT_MS}". Must be greater than 0.`);
  }

  const maxRetries = parseNumericEnv(process.env.SIEG_MAX_RETRIES, 3);
  if (maxRetries < 0) {
    errors.push(`SIEG_MAX_RETRIES: Invalid value "${process.env.SIEG_MAX_RETRIES}". Must be 0 or greater.`);
  }

  const windowHours = parseNumericEnv(process.env.DOWNLOAD_WINDOW_HOURS, 2);
  if (windowHours < 1 || windowHours > 24 || 24 % windowHours !== 0) {
    errors.push(`DOWNLOAD_WINDOW_HOURS: Invalid value "${process.env.DOWNLOAD_WINDOW_HOURS}". Must divide 24.`);
  }

  const maxFileBytes = parseNumericEnv(process.env.XML_MAX_FILE_BYTES, 10 * 1024 * 1024);
  if (maxFileBytes < 1) {
    errors.push(`XML_MAX_FILE_BYTES: Invalid value "${process.env.XML_MAX_FILE_BYTES}". Must be greater than 0.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
        `Please check your .env file or environment variables.`,
      { errors }
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL,
    SIEG_API_KEY: process.env.SIEG_API_KEY || undefined,
    SIEG_BASE_URL: baseUrl,
    SIEG_PAGE_SIZE: pageSize,
    SIEG_REQUEST_INTERVAL_MS: requestInterval,
    SIEG_TIMEOUT_MS: timeout,
    SIEG_MAX_RETRIES: maxRetries,
    DOWNLOAD_WINDOW_HOURS: windowHours,
    OUTPUT_DIR: process.env.OUTPUT_DIR || 'temp',
    XML_MAX_FILE_BYTES: maxFileBytes,
  };

  return validatedEnv;
}

/**
 * The API key is only needed by commands that talk to the retrieval API
 * @throws {ConfigurationError} If SIEG_API_KEY is not set
 */
export function requireSiegApiKey(env: Env = validateEnv()): string {
  if (!env.SIEG_API_KEY) {
    throw new ConfigurationError('SIEG_API_KEY: Environment variable is required to download documents.');
  }
  return env.SIEG_API_KEY;
}

/**
 * Drop the cached environment (tests change process.env between cases)
 */
export function resetEnvCache(): void {
  validatedEnv = null;
}
