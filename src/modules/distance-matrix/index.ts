/**
 * =============================================================================
 * DISTANCE MATRIX MODULE
 * =============================================================================
 *
 * Handles distance matrix queries:
 * - Location encoding (addresses, coordinates, lists)
 * - URL building with applied-option tracking
 * - Mode-tagged result parsing with partial-failure semantics
 * - Concurrent batch dispatch with per-slot failure isolation
 * =============================================================================
 */

export * from './distance-matrix.schema';
export * from './location.formatter';
export * from './query.builder';
export * from './travel-result.model';
export * from './batch.dispatcher';
export * from './distance-matrix.service';
