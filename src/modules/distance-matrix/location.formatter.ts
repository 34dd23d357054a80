/**
 * Location encoding for the `origins` / `destinations` parameters.
 *
 * "123 Fake   Street, Boston MA"  ->  123+Fake+Street+Boston+MA
 * ["Boston MA", "New  ,York"]     ->  Boston+MA|New+York
 * { latitude: 41.43206, longitude: -81.38992 }  ->  41.43206,-81.38992
 */

import { LOCATION_DELIMITERS } from '../../core/constants';
import { LocationTypeError } from '../../core/errors/AppError';
import { coordinatesSchema } from './distance-matrix.schema';

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function formatAddress(address: string): string {
  return address
    .replace(/,/g, ' ')
    .split(/\s+/)
    .filter(word => word.length > 0)
    .join(LOCATION_DELIMITERS.WORD);
}

// Plain decimal notation, at most 7 places (about 1 cm); never exponent form
function formatCoordinate(value: number): string {
  const fixed = value.toFixed(7).replace(/\.?0+$/, '');
  return fixed === '-0' ? '0' : fixed;
}

function formatEntry(entry: unknown): string {
  if (typeof entry === 'string') {
    return formatAddress(entry);
  }

  if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
    const coordinates = coordinatesSchema.safeParse(entry);
    if (!coordinates.success) {
      throw new LocationTypeError('Invalid coordinates: expected latitude in [-90, 90] and longitude in [-180, 180]', {
        issues: coordinates.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return `${formatCoordinate(coordinates.data.latitude)},${formatCoordinate(coordinates.data.longitude)}`;
  }

  throw new LocationTypeError(
    `Location must be an address string, a coordinate pair or a list of them, got ${describeType(entry)}`,
    { receivedType: describeType(entry) }
  );
}

/**
 * Encode a location (or list of locations) for the API.
 * Takes untrusted input: anything else than a string, coordinates, or a flat
 * list of those throws LocationTypeError instead of being stringified.
 */
export function formatLocation(location: unknown): string {
  if (Array.isArray(location)) {
    return location.map(formatEntry).join(LOCATION_DELIMITERS.ENTRY);
  }
  return formatEntry(location);
}
