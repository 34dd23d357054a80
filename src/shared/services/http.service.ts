/**
 * =============================================================================
 * HTTP SERVICE - Transport for distance matrix calls
 * =============================================================================
 *
 * The client only needs one capability from HTTP: GET a URL and hand back the
 * decoded JSON body. `HttpTransport` is that seam; tests swap in a fake.
 *
 * FetchTransport (default):
 * - Node.js global fetch
 * - Per-call timeout via AbortSignal.timeout
 * - Non-2xx, timeout, network failure and non-JSON bodies all throw TransportError
 * =============================================================================
 */

import { ErrorCode, TIMEOUTS } from '../../core/constants';
import { TransportError, getErrorMessage } from '../../core/errors/AppError';
import { redactApiKey } from './logger.service';

/**
 * GET a URL and resolve with its parsed JSON body
 */
export interface HttpTransport {
  getJson(url: string): Promise<unknown>;
}

/**
 * The part of a fetch Response the transport reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchFunction = (input: string, init?: RequestInit) => Promise<FetchResponse>;

export interface FetchTransportOptions {
  /** Per-call timeout (ms) */
  timeoutMs?: number;
  /** Replacement for the global fetch */
  fetchImpl?: FetchFunction;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFunction;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.HTTP_REQUEST;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async getJson(url: string): Promise<unknown> {
    const details = { url: redactApiKey(url) };

    let response: FetchResponse;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      if (isAbortError(error)) {
        throw this.timeoutError(details);
      }
      throw new TransportError(getErrorMessage(error), ErrorCode.TRANSPORT_FAILED, details);
    }

    if (!response.ok) {
      throw new TransportError(
        `HTTP ${response.status}`,
        ErrorCode.TRANSPORT_HTTP_ERROR,
        { ...details, httpStatus: response.status }
      );
    }

    try {
      return await response.json();
    } catch (error) {
      // The abort signal also covers reading the body
      if (isAbortError(error)) {
        throw this.timeoutError(details);
      }
      throw new TransportError(
        `Response body is not valid JSON: ${getErrorMessage(error)}`,
        ErrorCode.TRANSPORT_INVALID_BODY,
        details
      );
    }
  }

  private timeoutError(details: Record<string, unknown>): TransportError {
    return new TransportError(`Request timed out after ${this.timeoutMs}ms`, ErrorCode.TRANSPORT_TIMEOUT, details);
  }
}
