/**
 * =============================================================================
 * QUERY BUILDER
 * =============================================================================
 *
 * Turns a validated configuration plus one origin/destination request into a
 * request URL, and records which optional parameters were applied.
 *
 * PARAMETER ORDER (fixed, so built URLs are reproducible):
 *   origins, destinations, mode, key,
 *   departure_time | arrival_time,
 *   language, units, avoid, traffic_model, transit_mode, transit_routing_preference
 *
 * Empty options are left out. Values are not URL-encoded beyond the location
 * normalization done by the formatter.
 * =============================================================================
 */

import {
  AppliedOptionName,
  ErrorCode,
  LOCATION_DELIMITERS,
  OPTIONAL_QUERY_PARAMETERS,
  QUERY_DEFAULTS,
  TimeQueryParameter,
  TravelMode,
} from '../../core/constants';
import { ConfigurationError, RequestShapeError } from '../../core/errors/AppError';
import {
  BuiltQuery,
  QueryConfiguration,
  QueryConfigurationInput,
  QueryRequest,
  TravelTime,
  queryConfigurationSchema,
} from './distance-matrix.schema';
import { formatLocation } from './location.formatter';

// =============================================================================
// CONFIGURATION
// =============================================================================

function joinValues(value: string | string[] | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(LOCATION_DELIMITERS.OPTION_VALUE) : undefined;
  }
  return value;
}

/**
 * Validate caller settings and apply defaults.
 * Throws ConfigurationError on an invalid value, or on a transit-only option
 * combined with a non-transit mode.
 */
export function createQueryConfiguration(input: QueryConfigurationInput): QueryConfiguration {
  const mode = input.mode ?? QUERY_DEFAULTS.MODE;

  const parsed = queryConfigurationSchema.safeParse({
    language: QUERY_DEFAULTS.LANGUAGE,
    units: QUERY_DEFAULTS.UNITS,
    ...(mode === TravelMode.DRIVING && { trafficModel: QUERY_DEFAULTS.TRAFFIC_MODEL }),
    ...input,
    mode,
  });

  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error);
  }

  const settings = parsed.data;
  const transitMode = joinValues(settings.transitMode);
  const transitRoutingPreference = settings.transitRoutingPreference;

  if ((transitMode || transitRoutingPreference) && settings.mode !== TravelMode.TRANSIT) {
    const notAllowed = { message: `not allowed with mode '${settings.mode}'` };
    throw new ConfigurationError(
      "'mode' must be set to 'transit' to use 'transitMode' or 'transitRoutingPreference'",
      [
        ...(transitMode ? [{ field: 'transitMode', ...notAllowed }] : []),
        ...(transitRoutingPreference ? [{ field: 'transitRoutingPreference', ...notAllowed }] : []),
      ],
      ErrorCode.CONFIG_TRANSIT_OPTION_MISMATCH
    );
  }

  return Object.freeze({
    apiKey: settings.apiKey,
    mode: settings.mode,
    language: settings.language,
    units: settings.units,
    avoid: joinValues(settings.avoid),
    trafficModel: settings.trafficModel,
    transitMode,
    transitRoutingPreference,
    baseUrl: settings.baseUrl,
  });
}

// =============================================================================
// TIMES
// =============================================================================

function isPresent(value: TravelTime | null | undefined): value is TravelTime {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Encode a departure/arrival time: "now" or whole epoch seconds
 */
export function encodeTravelTime(value: TravelTime, parameter: TimeQueryParameter): string {
  if (value instanceof Date) {
    const time = value.getTime();
    if (isNaN(time)) {
      throw new RequestShapeError(`Invalid ${parameter}: invalid Date`, ErrorCode.REQUEST_TIME_INVALID, { parameter });
    }
    return String(Math.floor(time / 1000));
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new RequestShapeError(`Invalid ${parameter}: ${value}`, ErrorCode.REQUEST_TIME_INVALID, { parameter });
    }
    return String(Math.floor(value));
  }

  const trimmed = value.trim();
  if (trimmed !== QUERY_DEFAULTS.DEPARTURE_TIME && !/^\d+$/.test(trimmed)) {
    throw new RequestShapeError(
      `Invalid ${parameter}: expected "now" or epoch seconds, got "${value}"`,
      ErrorCode.REQUEST_TIME_INVALID,
      { parameter }
    );
  }
  return trimmed;
}

// =============================================================================
// URL
// =============================================================================

/**
 * Build the request URL for one origin/destination pair
 */
export function buildQuery(configuration: QueryConfiguration, request: QueryRequest): BuiltQuery {
  const origins = formatLocation(request.origin);
  const destinations = formatLocation(request.destination);

  const hasDeparture = isPresent(request.departureTime);
  const hasArrival = isPresent(request.arrivalTime);

  if (hasDeparture && hasArrival) {
    throw new RequestShapeError("Can't set both a departure and an arrival time", ErrorCode.REQUEST_TIME_CONFLICT);
  }

  const params: string[] = [
    `origins=${origins}`,
    `destinations=${destinations}`,
    `mode=${configuration.mode}`,
    `key=${configuration.apiKey}`,
  ];
  const appliedOptions: Partial<Record<AppliedOptionName, string>> = {};

  const apply = (name: AppliedOptionName, value: string): void => {
    params.push(`${name}=${value}`);
    appliedOptions[name] = value;
  };

  if (isPresent(request.arrivalTime)) {
    apply('arrival_time', encodeTravelTime(request.arrivalTime, 'arrival_time'));
  } else {
    const departure = isPresent(request.departureTime) ? request.departureTime : QUERY_DEFAULTS.DEPARTURE_TIME;
    apply('departure_time', encodeTravelTime(departure, 'departure_time'));
  }

  for (const { field, param } of OPTIONAL_QUERY_PARAMETERS) {
    const value = configuration[field];
    if (value) {
      apply(param, value);
    }
  }

  return {
    url: `${configuration.baseUrl}?${params.join('&')}`,
    appliedOptions: Object.freeze(appliedOptions),
  };
}
