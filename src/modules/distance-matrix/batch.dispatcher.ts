/**
 * =============================================================================
 * BATCH DISPATCHER
 * =============================================================================
 *
 * Runs many origin/destination requests at once.
 *
 * FLOW:
 * 1. Build every URL up front (a bad request throws before anything is sent)
 * 2. Fire all GETs without waiting on each other; no concurrency cap
 * 3. Wait until every call has settled, successful or not
 * 4. Parse each body with the configured mode's parser; a failed call becomes
 *    a failure marker for its slot only
 *
 * Output order always matches input order, whatever order responses arrive in.
 * There is no cancellation and no internal timeout: a hung call holds the batch
 * until the transport gives up on it.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { RESULT_STATUS } from '../../core/constants';
import { getErrorMessage } from '../../core/errors/AppError';
import { HttpTransport } from '../../shared/services/http.service';
import { logger } from '../../shared/services/logger.service';
import { QueryConfiguration, QueryRequest, TransportFailureMarker } from './distance-matrix.schema';
import { buildQuery } from './query.builder';
import { TravelResult, createTravelResult } from './travel-result.model';

/**
 * JSON-shaped payload standing in for a call that failed
 */
export function toTransportFailureMarker(error: unknown): TransportFailureMarker {
  const message = getErrorMessage(error);
  return {
    status: `${RESULT_STATUS.REQUEST_FAILED}: ${message}`,
    error_message: message,
  };
}

/**
 * Dispatch one request per entry concurrently; one result per entry, same order
 */
export async function dispatchAll(
  configuration: QueryConfiguration,
  requests: readonly QueryRequest[],
  transport: HttpTransport
): Promise<TravelResult[]> {
  const queries = requests.map(request => buildQuery(configuration, request));

  const batchId = uuidv4();
  const startTime = Date.now();
  logger.info('Dispatching distance matrix batch', {
    batchId,
    size: queries.length,
    mode: configuration.mode,
  });

  const outcomes = await Promise.allSettled(
    queries.map(async query => transport.getJson(query.url))
  );

  let transportFailures = 0;
  const results = outcomes.map((outcome, index) => {
    const { appliedOptions } = queries[index];

    if (outcome.status === 'fulfilled') {
      return createTravelResult(configuration.mode, outcome.value, appliedOptions);
    }

    transportFailures++;
    logger.warn('Distance matrix request failed', {
      batchId,
      index,
      error: getErrorMessage(outcome.reason),
    });
    return createTravelResult(configuration.mode, toTransportFailureMarker(outcome.reason), appliedOptions);
  });

  const succeeded = results.filter(result => result.success).length;
  logger.info('Distance matrix batch completed', {
    batchId,
    size: results.length,
    succeeded,
    failed: results.length - succeeded,
    transportFailures,
    elapsedMs: Date.now() - startTime,
  });

  return results;
}
