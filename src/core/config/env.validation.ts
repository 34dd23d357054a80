/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates the environment variables the client reads.
 *
 * USAGE:
 * ```typescript
 * import { validateAndLogEnvironment } from 'distance-matrix-client';
 * validateAndLogEnvironment(); // Throws in production if invalid
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { ErrorCode, TRAVEL_MODES, Units } from '../constants';
import { ConfigurationError } from '../errors/AppError';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

type Environment = Record<string, string | undefined>;

function isPositiveInteger(value: string): boolean {
  return /^\d+$/.test(value) && parseInt(value, 10) > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // RUNTIME
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  },

  // ==========================================================================
  // DISTANCE MATRIX API
  // ==========================================================================
  {
    name: 'DISTANCE_MATRIX_API_KEY',
    required: false, // Only required in production
    description: 'API key passed through on every request'
  },
  {
    name: 'DISTANCE_MATRIX_BASE_URL',
    required: false,
    validator: isHttpUrl,
    description: 'Distance matrix JSON endpoint'
  },
  {
    name: 'DISTANCE_MATRIX_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInteger,
    description: 'Per-request transport timeout in milliseconds'
  },
  {
    name: 'DISTANCE_MATRIX_MODE',
    required: false,
    default: 'driving',
    validator: (v) => TRAVEL_MODES.some(mode => mode === v),
    description: 'Default travel mode'
  },
  {
    name: 'DISTANCE_MATRIX_LANGUAGE',
    required: false,
    default: 'en',
    description: 'Default response language'
  },
  {
    name: 'DISTANCE_MATRIX_UNITS',
    required: false,
    default: 'imperial',
    validator: (v) => v === Units.IMPERIAL || v === Units.METRIC,
    description: 'Default unit system for text fields'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables.
 * Defaults are written back into `env` for variables that are unset.
 */
export function validateEnvironment(env: Environment = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    // Check if required
    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    if (envVar.name === 'DISTANCE_MATRIX_API_KEY' && !value) {
      if (isProduction) {
        result.valid = false;
        result.errors.push('DISTANCE_MATRIX_API_KEY is required in production');
      } else {
        result.warnings.push('DISTANCE_MATRIX_API_KEY is not set - requests will be rejected by the API');
      }
    }

    // Apply default if not set
    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      // The key itself never goes into the loaded summary
      result.loaded[envVar.name] = envVar.name === 'DISTANCE_MATRIX_API_KEY' ? '[SET]' : finalValue;

      if (!value && envVar.default) {
        env[envVar.name] = envVar.default;
      }
    }
  }

  return result;
}

/**
 * Validate and log results.
 * Throws a ConfigurationError if validation fails in production.
 */
export function validateAndLogEnvironment(env: Environment = process.env): ValidationResult {
  const result = validateEnvironment(env);
  const isProduction = env.NODE_ENV === 'production';

  result.errors.forEach(error => logger.error(`Environment validation error: ${error}`));
  result.warnings.forEach(warning => logger.warn(`Environment validation warning: ${warning}`));

  if (result.valid) {
    logger.info('Environment validation passed', { loaded: result.loaded });
  }

  if (!result.valid && isProduction) {
    throw new ConfigurationError(
      'Environment validation failed in production',
      result.errors.map(message => ({ field: 'env', message })),
      ErrorCode.CONFIG_ENVIRONMENT_INVALID
    );
  }

  return result;
}
