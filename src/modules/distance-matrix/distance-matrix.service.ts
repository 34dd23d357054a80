/**
 * =============================================================================
 * DISTANCE MATRIX SERVICE
 * =============================================================================
 *
 * Client entry point: one validated configuration, one transport.
 *
 * USAGE:
 * ```typescript
 * const client = new DistanceMatrixService({ apiKey: 'test-key', units: 'metric' });
 *
 * const result = await client.run({ origin: 'Boston, MA', destination: 'New York, NY' });
 * if (result.success) console.log(result.distance, result.duration);
 *
 * const results = await client.runBatch([
 *   { origin: 'Boston, MA', destination: 'Chicago, IL' },
 *   { origin: 'Boston, MA', destination: 'Denver, CO', arrivalTime: 1767225600 },
 * ]);
 * ```
 *
 * Check `result.success` rather than catching: only caller mistakes
 * (configuration, request shape, location type) and, on `run`, a failed HTTP
 * call are thrown.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { getErrorMessage, ConfigurationError, TransportError } from '../../core/errors/AppError';
import { FetchTransport, HttpTransport } from '../../shared/services/http.service';
import { logger } from '../../shared/services/logger.service';
import { dispatchAll } from './batch.dispatcher';
import {
  BuiltQuery,
  QueryConfiguration,
  QueryConfigurationInput,
  QueryRequest,
  travelModeSchema,
  unitsSchema,
} from './distance-matrix.schema';
import { buildQuery, createQueryConfiguration } from './query.builder';
import { TravelResult, createTravelResult } from './travel-result.model';

export interface DistanceMatrixServiceOptions {
  /** Defaults to a FetchTransport using DISTANCE_MATRIX_TIMEOUT_MS */
  transport?: HttpTransport;
}

export class DistanceMatrixService {
  readonly configuration: QueryConfiguration;
  private readonly transport: HttpTransport;

  constructor(input: QueryConfigurationInput, options: DistanceMatrixServiceOptions = {}) {
    this.configuration = createQueryConfiguration(input);
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: config.distanceMatrix.timeoutMs });
  }

  /**
   * Client configured from DISTANCE_MATRIX_* environment variables
   */
  static fromEnvironment(
    overrides: Partial<QueryConfigurationInput> = {},
    options: DistanceMatrixServiceOptions = {}
  ): DistanceMatrixService {
    const mode = travelModeSchema.safeParse(config.distanceMatrix.mode);
    if (!mode.success) {
      throw ConfigurationError.fromZodError(mode.error);
    }
    const units = unitsSchema.safeParse(config.distanceMatrix.units);
    if (!units.success) {
      throw ConfigurationError.fromZodError(units.error);
    }

    return new DistanceMatrixService(
      {
        apiKey: config.distanceMatrix.apiKey,
        baseUrl: config.distanceMatrix.baseUrl,
        mode: mode.data,
        language: config.distanceMatrix.language,
        units: units.data,
        ...overrides,
      },
      options
    );
  }

  buildQuery(request: QueryRequest): BuiltQuery {
    return buildQuery(this.configuration, request);
  }

  /**
   * Single request, awaited on its own. A failed HTTP call is thrown as
   * TransportError; a failure reported in the payload is not.
   */
  async run(request: QueryRequest): Promise<TravelResult> {
    const query = this.buildQuery(request);

    let body: unknown;
    try {
      body = await this.transport.getJson(query.url);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(getErrorMessage(error));
    }

    const result = createTravelResult(this.configuration.mode, body, query.appliedOptions);
    logger.debug('Distance matrix request completed', {
      mode: result.mode,
      status: result.status,
      success: result.success,
    });
    return result;
  }

  /**
   * Concurrent requests, results in request order
   */
  async runBatch(requests: readonly QueryRequest[]): Promise<TravelResult[]> {
    return dispatchAll(this.configuration, requests, this.transport);
  }
}
