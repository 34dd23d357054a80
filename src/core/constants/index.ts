/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * Travel modes, request option vocabularies, wire-level status values and
 * error codes used across the client.
 *
 * Import from '../core' (or '../core/constants') in other modules.
 *
 * =============================================================================
 */

// =============================================================================
// TRAVEL MODES
// =============================================================================

/**
 * Travel method requested from the distance matrix API
 */
export enum TravelMode {
  DRIVING = 'driving',
  WALKING = 'walking',
  BICYCLING = 'bicycling',
  TRANSIT = 'transit'
}

export const TRAVEL_MODES: readonly TravelMode[] = [
  TravelMode.DRIVING,
  TravelMode.WALKING,
  TravelMode.BICYCLING,
  TravelMode.TRANSIT
];

// =============================================================================
// REQUEST OPTION VOCABULARIES
// =============================================================================

export enum Units {
  IMPERIAL = 'imperial',
  METRIC = 'metric'
}

/**
 * How historical traffic is applied (driving with a departure time only)
 */
export enum TrafficModel {
  BEST_GUESS = 'best_guess',
  PESSIMISTIC = 'pessimistic',
  OPTIMISTIC = 'optimistic'
}

export enum TransitMode {
  BUS = 'bus',
  SUBWAY = 'subway',
  TRAIN = 'train',
  TRAM = 'tram',
  RAIL = 'rail'
}

export enum TransitRoutingPreference {
  LESS_WALKING = 'less_walking',
  FEWER_TRANSFERS = 'fewer_transfers'
}

export enum AvoidFeature {
  TOLLS = 'tolls',
  HIGHWAYS = 'highways',
  FERRIES = 'ferries',
  INDOOR = 'indoor'
}

// =============================================================================
// QUERY DEFAULTS
// =============================================================================

export const DISTANCE_MATRIX_ENDPOINT = 'https://maps.googleapis.com/maps/api/distancematrix/json';

export const QUERY_DEFAULTS = {
  MODE: TravelMode.DRIVING,
  LANGUAGE: 'en',
  UNITS: Units.IMPERIAL,
  // Only applied when mode is driving
  TRAFFIC_MODEL: TrafficModel.BEST_GUESS,
  DEPARTURE_TIME: 'now'
} as const;

/**
 * Optional configuration options in the order they are appended to a URL.
 * `field` is the configuration property, `param` the wire name.
 */
export const OPTIONAL_QUERY_PARAMETERS = [
  { field: 'language', param: 'language' },
  { field: 'units', param: 'units' },
  { field: 'avoid', param: 'avoid' },
  { field: 'trafficModel', param: 'traffic_model' },
  { field: 'transitMode', param: 'transit_mode' },
  { field: 'transitRoutingPreference', param: 'transit_routing_preference' }
] as const;

export type OptionalQueryParameter = typeof OPTIONAL_QUERY_PARAMETERS[number]['param'];
export type TimeQueryParameter = 'departure_time' | 'arrival_time';
export type AppliedOptionName = TimeQueryParameter | OptionalQueryParameter;

export const LOCATION_DELIMITERS = {
  // Between words of one address
  WORD: '+',
  // Between addresses of a list
  ENTRY: '|',
  // Between values of a multi-value option (avoid, transit_mode)
  OPTION_VALUE: '|'
} as const;

// =============================================================================
// RESPONSE STATUS & RESULT SENTINELS
// =============================================================================

/**
 * Status value the API uses for a successful query or element
 */
export const API_STATUS_OK = 'OK';

export const RESULT_STATUS = {
  SCHEMA_INVALID: 'Response schema invalid',
  REQUEST_FAILED: 'Request failed'
} as const;

/**
 * Transit fare fields when the response carries no fare object
 */
export const FARE_UNAVAILABLE = {
  CURRENCY: 'No fare information available',
  COST: null,
  COST_TEXT: 'No fare information available'
} as const;

/**
 * Distance conversion multipliers applied to the metre value.
 * These do not match the true ratios (1 m = 3.2808 ft = 0.000621 mi);
 * they are kept unchanged so existing consumers see the same numbers.
 */
export const DISTANCE_MULTIPLIERS = {
  FEET: 0.3408,
  MILES: 1609.344
} as const;

// =============================================================================
// TIMEOUTS
// =============================================================================

export const TIMEOUTS = {
  // Per-call transport timeout when none is configured
  HTTP_REQUEST: 10 * 1000        // 10 seconds
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Machine-readable error codes, grouped by prefix:
 * - CFG_1xxx: Configuration
 * - REQ_2xxx: Request shape and input types
 * - NET_3xxx: Transport
 * - SYS_9xxx: Internal
 */
export enum ErrorCode {
  CONFIG_INVALID = 'CFG_1001',
  CONFIG_TRANSIT_OPTION_MISMATCH = 'CFG_1002',
  CONFIG_ENVIRONMENT_INVALID = 'CFG_1003',

  REQUEST_TIME_CONFLICT = 'REQ_2001',
  REQUEST_LOCATION_INVALID = 'REQ_2002',
  REQUEST_TIME_INVALID = 'REQ_2003',

  TRANSPORT_HTTP_ERROR = 'NET_3001',
  TRANSPORT_INVALID_BODY = 'NET_3002',
  TRANSPORT_TIMEOUT = 'NET_3003',
  TRANSPORT_FAILED = 'NET_3004',

  INTERNAL_ERROR = 'SYS_9001'
}
