/**
 * =============================================================================
 * TRAVEL RESULT MODEL
 * =============================================================================
 *
 * Parses one distance matrix payload (single origin, single destination) into
 * an immutable, mode-tagged result. Parsing never throws on payload content:
 * every problem ends up in `success` / `status`.
 *
 * FAILURE LEVELS:
 * - Query:   top-level status != OK       -> status is that value, nothing else read
 * - Schema:  a key or index is missing    -> status "Response schema invalid: ..."
 * - Element: element status != OK         -> status is that value, addresses still set
 * - Mode:    driving without duration_in_traffic -> schema failure after a good parse
 *
 * Transit fares are optional; their absence leaves the "unavailable" defaults.
 * =============================================================================
 */

import {
  API_STATUS_OK,
  DISTANCE_MULTIPLIERS,
  FARE_UNAVAILABLE,
  RESULT_STATUS,
  TravelMode,
} from '../../core/constants';
import { AppliedOptions } from './distance-matrix.schema';

// =============================================================================
// RESULT TYPES
// =============================================================================

export interface TravelResultBase {
  readonly success: boolean;
  /** "OK", the API's status, or a schema/transport failure description */
  readonly status: string;
  /** `error_message` from the payload, when present */
  readonly errorMessage: string | null;
  readonly origin: string;
  readonly destination: string;
  /** Metres */
  readonly distance: number | null;
  /** Seconds */
  readonly duration: number | null;
  readonly meters: number | null;
  readonly feet: number | null;
  readonly miles: number | null;
  /** Options that were sent with the request that produced this result */
  readonly appliedOptions: AppliedOptions;
}

export interface DrivingResult extends TravelResultBase {
  readonly mode: TravelMode.DRIVING;
  /** Seconds */
  readonly durationInTraffic: number | null;
}

export interface WalkingResult extends TravelResultBase {
  readonly mode: TravelMode.WALKING;
}

export interface BicyclingResult extends TravelResultBase {
  readonly mode: TravelMode.BICYCLING;
}

export interface TransitResult extends TravelResultBase {
  readonly mode: TravelMode.TRANSIT;
  readonly currency: string;
  readonly cost: number | null;
  readonly costText: string;
}

export type TravelResult = DrivingResult | WalkingResult | BicyclingResult | TransitResult;

// =============================================================================
// PAYLOAD NAVIGATION
// =============================================================================

type SchemaFailureKind = 'key' | 'index' | 'type';

/**
 * Raised while walking a payload; always caught inside this module
 */
class ResponseSchemaError extends Error {
  constructor(readonly kind: SchemaFailureKind, readonly path: string) {
    super(
      kind === 'key'
        ? `${RESULT_STATUS.SCHEMA_INVALID}: missing key "${path}"`
        : kind === 'index'
          ? `${RESULT_STATUS.SCHEMA_INVALID}: missing index ${path}`
          : `${RESULT_STATUS.SCHEMA_INVALID}: unexpected value at "${path}"`
    );
    this.name = 'ResponseSchemaError';
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read-only walker over untyped JSON that tracks the path it took
 */
class JsonCursor {
  constructor(private readonly value: unknown, readonly path: string = '') {}

  has(name: string): boolean {
    return isJsonObject(this.value) && Object.prototype.hasOwnProperty.call(this.value, name);
  }

  key(name: string): JsonCursor {
    const path = this.path ? `${this.path}.${name}` : name;
    if (!isJsonObject(this.value) || !Object.prototype.hasOwnProperty.call(this.value, name)) {
      throw new ResponseSchemaError('key', path);
    }
    return new JsonCursor(this.value[name], path);
  }

  index(position: number): JsonCursor {
    const path = `${this.path}[${position}]`;
    if (!Array.isArray(this.value)) {
      throw new ResponseSchemaError('type', this.path);
    }
    if (position >= this.value.length) {
      throw new ResponseSchemaError('index', path);
    }
    return new JsonCursor(this.value[position], path);
  }

  string(): string {
    if (typeof this.value !== 'string') {
      throw new ResponseSchemaError('type', this.path);
    }
    return this.value;
  }

  number(): number {
    if (typeof this.value !== 'number' || !Number.isFinite(this.value)) {
      throw new ResponseSchemaError('type', this.path);
    }
    return this.value;
  }

  /** Value of an optional field, or undefined when absent */
  peek(name: string): unknown {
    return this.has(name) && isJsonObject(this.value) ? this.value[name] : undefined;
  }
}

// =============================================================================
// GENERAL PARSE
// =============================================================================

/**
 * Fields shared by every mode
 */
export interface GeneralParse {
  success: boolean;
  status: string;
  errorMessage: string | null;
  origin: string;
  destination: string;
  distance: number | null;
  duration: number | null;
}

interface Envelope {
  general: GeneralParse;
  /** The element, only when the general parse succeeded */
  element: JsonCursor | null;
}

function readErrorMessage(raw: unknown): string | null {
  return isJsonObject(raw) && typeof raw.error_message === 'string' ? raw.error_message : null;
}

function parseEnvelope(raw: unknown): Envelope {
  const general: GeneralParse = {
    success: false,
    status: '',
    errorMessage: readErrorMessage(raw),
    origin: '',
    destination: '',
    distance: null,
    duration: null,
  };

  try {
    const root = new JsonCursor(raw);
    const status = root.key('status').string();
    if (status !== API_STATUS_OK) {
      general.status = status;
      return { general, element: null };
    }

    const origin = root.key('origin_addresses').index(0).string();
    const destination = root.key('destination_addresses').index(0).string();
    const element = root.key('rows').index(0).key('elements').index(0);

    general.origin = origin;
    general.destination = destination;

    const elementStatus = element.key('status').string();
    if (elementStatus !== API_STATUS_OK) {
      general.status = elementStatus;
      return { general, element: null };
    }

    general.distance = element.key('distance').key('value').number();
    general.duration = element.key('duration').key('value').number();
    general.status = API_STATUS_OK;
    general.success = true;
    return { general, element };
  } catch (error) {
    if (!(error instanceof ResponseSchemaError)) {
      throw error;
    }
    general.status = error.message;
    general.success = false;
    return { general, element: null };
  }
}

/**
 * Validate the envelope common to every mode: query status, addresses,
 * element status, distance and duration
 */
export function parseGeneral(raw: unknown): GeneralParse {
  return parseEnvelope(raw).general;
}

// =============================================================================
// MODE-SPECIFIC PARSERS
// =============================================================================

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function convertDistance(distance: number | null, multiplier: number): number | null {
  return distance === null ? null : roundTo2(distance * multiplier);
}

function baseFields(general: GeneralParse, appliedOptions: AppliedOptions) {
  return {
    success: general.success,
    status: general.status,
    errorMessage: general.errorMessage,
    origin: general.origin,
    destination: general.destination,
    distance: general.distance,
    duration: general.duration,
    meters: general.distance,
    feet: convertDistance(general.distance, DISTANCE_MULTIPLIERS.FEET),
    miles: convertDistance(general.distance, DISTANCE_MULTIPLIERS.MILES),
    appliedOptions: Object.freeze({ ...appliedOptions }),
  };
}

export function parseDrivingResult(raw: unknown, appliedOptions: AppliedOptions = {}): DrivingResult {
  const { general, element } = parseEnvelope(raw);
  let success = general.success;
  let status = general.status;
  let durationInTraffic: number | null = null;

  if (element) {
    try {
      durationInTraffic = element.key('duration_in_traffic').key('value').number();
    } catch (error) {
      if (!(error instanceof ResponseSchemaError)) {
        throw error;
      }
      status = error.message;
      success = false;
    }
  }

  return Object.freeze({
    ...baseFields(general, appliedOptions),
    mode: TravelMode.DRIVING,
    success,
    status,
    durationInTraffic,
  });
}

export function parseTransitResult(raw: unknown, appliedOptions: AppliedOptions = {}): TransitResult {
  const { general, element } = parseEnvelope(raw);
  let currency: string = FARE_UNAVAILABLE.CURRENCY;
  let cost: number | null = FARE_UNAVAILABLE.COST;
  let costText: string = FARE_UNAVAILABLE.COST_TEXT;

  if (element && element.has('fare')) {
    const fare = element.key('fare');
    const fareCurrency = fare.peek('currency');
    const fareValue = fare.peek('value');
    const fareText = fare.peek('text');

    if (typeof fareCurrency === 'string') currency = fareCurrency;
    if (typeof fareValue === 'number' && Number.isFinite(fareValue)) cost = fareValue;
    if (typeof fareText === 'string') costText = fareText;
  }

  return Object.freeze({
    ...baseFields(general, appliedOptions),
    mode: TravelMode.TRANSIT,
    currency,
    cost,
    costText,
  });
}

export function parseWalkingResult(raw: unknown, appliedOptions: AppliedOptions = {}): WalkingResult {
  const { general } = parseEnvelope(raw);
  return Object.freeze({ ...baseFields(general, appliedOptions), mode: TravelMode.WALKING });
}

export function parseBicyclingResult(raw: unknown, appliedOptions: AppliedOptions = {}): BicyclingResult {
  const { general } = parseEnvelope(raw);
  return Object.freeze({ ...baseFields(general, appliedOptions), mode: TravelMode.BICYCLING });
}

// =============================================================================
// FACTORY & HELPERS
// =============================================================================

type TravelResultParser = (raw: unknown, appliedOptions?: AppliedOptions) => TravelResult;

const RESULT_PARSERS: Record<TravelMode, TravelResultParser> = {
  [TravelMode.DRIVING]: parseDrivingResult,
  [TravelMode.WALKING]: parseWalkingResult,
  [TravelMode.BICYCLING]: parseBicyclingResult,
  [TravelMode.TRANSIT]: parseTransitResult,
};

/**
 * Parse a payload with the parser for `mode`
 */
export function createTravelResult(mode: TravelMode, raw: unknown, appliedOptions: AppliedOptions = {}): TravelResult {
  return RESULT_PARSERS[mode](raw, appliedOptions);
}

export function isDrivingResult(result: TravelResult): result is DrivingResult {
  return result.mode === TravelMode.DRIVING;
}

export function isWalkingResult(result: TravelResult): result is WalkingResult {
  return result.mode === TravelMode.WALKING;
}

export function isBicyclingResult(result: TravelResult): result is BicyclingResult {
  return result.mode === TravelMode.BICYCLING;
}

export function isTransitResult(result: TravelResult): result is TransitResult {
  return result.mode === TravelMode.TRANSIT;
}

export function describeTravelResult(result: TravelResult): string {
  return `Origin: ${result.origin}, Destination: ${result.destination}, Status: ${result.status}`;
}
