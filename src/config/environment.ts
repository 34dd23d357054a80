/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - The API key is never logged (see logger.service sanitization)
 * - Production requires DISTANCE_MATRIX_API_KEY (checked by env.validation)
 * =============================================================================
 */

import dotenv from 'dotenv';
import { DISTANCE_MATRIX_ENDPOINT, QUERY_DEFAULTS, TIMEOUTS } from '../core/constants';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

export const config = Object.freeze({
  nodeEnv,

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // Distance matrix API
  distanceMatrix: Object.freeze({
    apiKey: getOptional('DISTANCE_MATRIX_API_KEY', ''),
    baseUrl: getOptional('DISTANCE_MATRIX_BASE_URL', DISTANCE_MATRIX_ENDPOINT),
    timeoutMs: getNumber('DISTANCE_MATRIX_TIMEOUT_MS', TIMEOUTS.HTTP_REQUEST),
    // Defaults for DistanceMatrixService.fromEnvironment()
    mode: getOptional('DISTANCE_MATRIX_MODE', QUERY_DEFAULTS.MODE),
    language: getOptional('DISTANCE_MATRIX_LANGUAGE', QUERY_DEFAULTS.LANGUAGE),
    units: getOptional('DISTANCE_MATRIX_UNITS', QUERY_DEFAULTS.UNITS),
  }),

  // Helpers
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',
});
