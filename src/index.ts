/**
 * =============================================================================
 * DISTANCE MATRIX CLIENT - Public API
 * =============================================================================
 */

export * from './core';
export * from './modules/distance-matrix';
export { FetchTransport, type FetchTransportOptions, type FetchFunction, type FetchResponse, type HttpTransport } from './shared/services/http.service';
export { redactApiKey } from './shared/services/logger.service';
export { config } from './config/environment';
