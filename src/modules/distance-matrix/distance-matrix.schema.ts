/**
 * =============================================================================
 * DISTANCE MATRIX MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Defines the data structures the client works with.
 *
 * KEY CONCEPTS:
 * - QueryConfiguration: per-client settings, validated once at construction
 * - QueryRequest: one origin/destination pair plus an optional time
 * - AppliedOptions: the options that actually made it into a built URL
 * - DistanceMatrixResponse: the JSON payload the API returns (consumed, never produced)
 *
 * EXAMPLE:
 * config  { apiKey: 'test-key', mode: 'driving' }
 * request { origin: 'Boston, MA', destination: 'New York, New York' }
 * url     ...?origins=Boston+MA&destinations=New+York+New+York&mode=driving&key=test-key&departure_time=now&...
 * =============================================================================
 */

import { z } from 'zod';
import {
  AppliedOptionName,
  AvoidFeature,
  DISTANCE_MATRIX_ENDPOINT,
  TrafficModel,
  TransitMode,
  TransitRoutingPreference,
  TravelMode,
  Units,
} from '../../core/constants';

// =============================================================================
// LOCATIONS (Input)
// =============================================================================

/**
 * Latitude/longitude pair, sent as `lat,lng`
 */
export const coordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof coordinatesSchema>;

/** A free-text address or a coordinate pair */
export type Location = string | Coordinates;

/** One location, or several sent together in a single request */
export type LocationInput = Location | Location[];

// =============================================================================
// QUERY CONFIGURATION
// =============================================================================

export const travelModeSchema = z.nativeEnum(TravelMode);
export const unitsSchema = z.nativeEnum(Units);

// Empty string and null both mean "omit from request"
const emptyToUndefined = (value: unknown): unknown => (value === '' || value === null ? undefined : value);

const optionalSetting = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(emptyToUndefined, schema.optional());

const multiValueSetting = <T extends z.ZodTypeAny>(schema: T) =>
  optionalSetting(z.union([schema, z.array(schema)]));

export const queryConfigurationSchema = z.object({
  apiKey: z.string({ required_error: 'apiKey is required' }),
  mode: travelModeSchema,
  language: optionalSetting(z.string()),
  units: optionalSetting(unitsSchema),
  avoid: multiValueSetting(z.nativeEnum(AvoidFeature)),
  trafficModel: optionalSetting(z.nativeEnum(TrafficModel)),
  transitMode: multiValueSetting(z.nativeEnum(TransitMode)),
  transitRoutingPreference: optionalSetting(z.nativeEnum(TransitRoutingPreference)),
  baseUrl: z.string().url().default(DISTANCE_MATRIX_ENDPOINT),
});

type OneOrMany<T> = T | T[];

/**
 * What callers pass when creating a client.
 *
 * A key that is left out takes its default (mode driving, language "en",
 * units imperial, traffic model best_guess for driving). A key set to
 * `''`, `null`, `undefined` or an empty list is omitted from every request.
 */
export interface QueryConfigurationInput {
  /** Passed through unchanged; an invalid key surfaces as a failed result */
  apiKey: string;
  mode?: TravelMode | `${TravelMode}`;
  language?: string | null;
  units?: Units | `${Units}` | null;
  avoid?: OneOrMany<AvoidFeature | `${AvoidFeature}`> | null;
  /** Driving only */
  trafficModel?: TrafficModel | `${TrafficModel}` | null;
  /** Transit only */
  transitMode?: OneOrMany<TransitMode | `${TransitMode}`> | null;
  /** Transit only */
  transitRoutingPreference?: TransitRoutingPreference | `${TransitRoutingPreference}` | null;
  /** Endpoint; defaults to the public distance matrix JSON API */
  baseUrl?: string;
}

/**
 * Validated, immutable client settings.
 * Multi-value options are already joined with "|".
 */
export interface QueryConfiguration {
  readonly apiKey: string;
  readonly mode: TravelMode;
  readonly language?: string;
  readonly units?: Units;
  readonly avoid?: string;
  readonly trafficModel?: TrafficModel;
  readonly transitMode?: string;
  readonly transitRoutingPreference?: TransitRoutingPreference;
  readonly baseUrl: string;
}

// =============================================================================
// QUERY REQUEST
// =============================================================================

/**
 * "now", epoch seconds (number or digit string), or a Date
 */
export type TravelTime = 'now' | number | string | Date;

export interface QueryRequest {
  origin: LocationInput;
  destination: LocationInput;
  /** Defaults to "now" when neither time is given */
  departureTime?: TravelTime | null;
  /** Mutually exclusive with departureTime */
  arrivalTime?: TravelTime | null;
}

/**
 * Options that were non-empty and therefore appended to a built URL,
 * keyed by wire name
 */
export type AppliedOptions = Readonly<Partial<Record<AppliedOptionName, string>>>;

export interface BuiltQuery {
  url: string;
  appliedOptions: AppliedOptions;
}

// =============================================================================
// API RESPONSE (Wire contract)
// =============================================================================

export interface DistanceMatrixValue {
  value: number;
  text?: string;
}

export interface DistanceMatrixFare {
  currency: string;
  value: number;
  text: string;
}

export interface DistanceMatrixElement {
  status: string;
  distance?: DistanceMatrixValue;
  duration?: DistanceMatrixValue;
  /** Driving with a departure time */
  duration_in_traffic?: DistanceMatrixValue;
  /** Transit, when the agency publishes fares */
  fare?: DistanceMatrixFare;
}

export interface DistanceMatrixResponse {
  status: string;
  error_message?: string;
  origin_addresses: string[];
  destination_addresses: string[];
  rows: Array<{ elements: DistanceMatrixElement[] }>;
}

/**
 * JSON-shaped stand-in for a response that never arrived
 */
export type TransportFailureMarker = Pick<DistanceMatrixResponse, 'status' | 'error_message'>;
