/**
 * =============================================================================
 * BATCH DISPATCHER - Tests
 * =============================================================================
 *
 * Concurrent fan-out: every call starts before any settles, output order
 * follows input order, and one failed call only affects its own slot.
 * =============================================================================
 */

import { TravelMode } from '../core/constants';
import { RequestShapeError } from '../core/errors/AppError';
import { dispatchAll, toTransportFailureMarker } from '../modules/distance-matrix/batch.dispatcher';
import { QueryRequest } from '../modules/distance-matrix/distance-matrix.schema';
import { createQueryConfiguration } from '../modules/distance-matrix/query.builder';
import { isTransitResult } from '../modules/distance-matrix/travel-result.model';
import { HttpTransport } from '../shared/services/http.service';
import { logger } from '../shared/services/logger.service';

// =============================================================================
// MOCK SETUP
// =============================================================================

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
  redactApiKey: (value: string) => value,
}));

jest.mock('uuid', () => ({
  v4: () => 'batch-test-0001',
}));

// =============================================================================
// HELPERS
// =============================================================================

interface PendingCall {
  url: string;
  resolve: (body: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Transport whose calls stay pending until the test settles them
 */
class ControlledTransport implements HttpTransport {
  readonly calls: PendingCall[] = [];

  getJson(url: string): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.calls.push({ url, resolve, reject });
    });
  }
}

/**
 * Transport that answers immediately from a handler
 */
class StubTransport implements HttpTransport {
  readonly urls: string[] = [];

  constructor(private readonly handler: (url: string) => unknown) {}

  async getJson(url: string): Promise<unknown> {
    this.urls.push(url);
    return this.handler(url);
  }
}

function okPayload(origin: string, destination: string, distance: number) {
  return {
    status: 'OK',
    origin_addresses: [origin],
    destination_addresses: [destination],
    rows: [{
      elements: [{
        status: 'OK',
        distance: { value: distance },
        duration: { value: distance / 10 },
        duration_in_traffic: { value: distance / 8 },
      }],
    }],
  };
}

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

const driving = createQueryConfiguration({ apiKey: 'test-key' });

const REQUESTS: QueryRequest[] = [
  { origin: 'Boston MA', destination: 'Providence RI' },
  { origin: 'Boston MA', destination: 'Hartford CT' },
  { origin: 'Boston MA', destination: 'Albany NY' },
];

// =============================================================================
// TESTS
// =============================================================================

describe('dispatchAll', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('starts every call before any response arrives', () => {
    const transport = new ControlledTransport();
    void dispatchAll(driving, REQUESTS, transport);

    expect(transport.calls.map(call => call.url.split('&')[1])).toEqual([
      'destinations=Providence+RI',
      'destinations=Hartford+CT',
      'destinations=Albany+NY',
    ]);
  });

  it('returns results in request order when responses arrive in reverse', async () => {
    const transport = new ControlledTransport();
    const pending = dispatchAll(driving, REQUESTS, transport);

    const [first, second, third] = transport.calls;
    third.resolve(okPayload('Boston, MA, USA', 'Albany, NY, USA', 270000));
    await flush();
    second.resolve(okPayload('Boston, MA, USA', 'Hartford, CT, USA', 164000));
    await flush();
    first.resolve(okPayload('Boston, MA, USA', 'Providence, RI, USA', 80000));

    const results = await pending;

    expect(results.map(result => result.destination)).toEqual([
      'Providence, RI, USA',
      'Hartford, CT, USA',
      'Albany, NY, USA',
    ]);
    expect(results.map(result => result.distance)).toEqual([80000, 164000, 270000]);
    expect(results.every(result => result.success)).toBe(true);
  });

  it('isolates a failed call to its own slot', async () => {
    const transport = new ControlledTransport();
    const pending = dispatchAll(driving, REQUESTS, transport);

    transport.calls[0].resolve(okPayload('Boston, MA, USA', 'Providence, RI, USA', 80000));
    transport.calls[1].reject(new Error('socket hang up'));
    transport.calls[2].resolve(okPayload('Boston, MA, USA', 'Albany, NY, USA', 270000));

    const results = await pending;

    expect(results).toHaveLength(3);
    expect(results[0].success).toBe(true);
    expect(results[2].success).toBe(true);
    expect(results[1].success).toBe(false);
    expect(results[1].status).toBe('Request failed: socket hang up');
    expect(results[1].errorMessage).toBe('socket hang up');
    expect(results[1].origin).toBe('');
    expect(logger.warn).toHaveBeenCalledWith('Distance matrix request failed', {
      batchId: 'batch-test-0001',
      index: 1,
      error: 'socket hang up',
    });
  });

  it('isolates a transport that throws synchronously', async () => {
    let call = 0;
    const transport: HttpTransport = {
      getJson: () => {
        call++;
        if (call === 1) {
          throw new Error('bad socket');
        }
        return Promise.resolve(okPayload('Boston, MA, USA', 'Somewhere', 1000));
      },
    };

    const results = await dispatchAll(driving, REQUESTS.slice(0, 2), transport);

    expect(results[0].status).toBe('Request failed: bad socket');
    expect(results[1].success).toBe(true);
  });

  it('rejects before sending anything when a request is malformed', async () => {
    const transport = new StubTransport(() => okPayload('a', 'b', 1));
    const requests: QueryRequest[] = [
      REQUESTS[0],
      { origin: 'Boston MA', destination: 'Albany NY', departureTime: 'now', arrivalTime: 1767225600 },
    ];

    await expect(dispatchAll(driving, requests, transport)).rejects.toThrow(RequestShapeError);
    expect(transport.urls).toEqual([]);
  });

  it('returns an empty list for an empty batch', async () => {
    const transport = new StubTransport(() => okPayload('a', 'b', 1));

    await expect(dispatchAll(driving, [], transport)).resolves.toEqual([]);
    expect(transport.urls).toEqual([]);
  });

  it('parses every slot with the configured mode', async () => {
    const transit = createQueryConfiguration({ apiKey: 'test-key', mode: 'transit', transitMode: 'rail' });
    const transport = new StubTransport(() => okPayload('Boston, MA, USA', 'Salem, MA, USA', 26000));

    const [result] = await dispatchAll(transit, REQUESTS.slice(0, 1), transport);

    expect(result.mode).toBe(TravelMode.TRANSIT);
    expect(isTransitResult(result) && result.costText).toBe('No fare information available');
    expect(transport.urls[0]).toContain('&transit_mode=rail');
  });

  it('gives each result the options of its own request', async () => {
    const transport = new StubTransport(() => okPayload('Boston, MA, USA', 'Albany, NY, USA', 270000));
    const results = await dispatchAll(
      driving,
      [
        { origin: 'Boston MA', destination: 'Albany NY' },
        { origin: 'Boston MA', destination: 'Albany NY', arrivalTime: 1767225600 },
      ],
      transport
    );

    expect(results[0].appliedOptions.departure_time).toBe('now');
    expect(results[1].appliedOptions.arrival_time).toBe('1767225600');
    expect(results[1].appliedOptions.departure_time).toBeUndefined();
  });

  it('logs a summary when the batch completes', async () => {
    const transport = new StubTransport(url => (url.includes('Hartford') ? { status: 'OVER_QUERY_LIMIT' } : okPayload('a', 'b', 1)));

    await dispatchAll(driving, REQUESTS, transport);

    expect(logger.info).toHaveBeenCalledWith('Dispatching distance matrix batch', {
      batchId: 'batch-test-0001',
      size: 3,
      mode: 'driving',
    });
    expect(logger.info).toHaveBeenCalledWith('Distance matrix batch completed', expect.objectContaining({
      batchId: 'batch-test-0001',
      size: 3,
      succeeded: 2,
      failed: 1,
      transportFailures: 0,
    }));
  });
});

describe('toTransportFailureMarker', () => {
  it('prefixes the status and keeps the message', () => {
    expect(toTransportFailureMarker(new Error('ECONNRESET'))).toEqual({
      status: 'Request failed: ECONNRESET',
      error_message: 'ECONNRESET',
    });
  });
});
