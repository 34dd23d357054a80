/**
 * Error hierarchy and error codes
 */

import { z } from 'zod';
import { ErrorCode } from '../core/constants';
import {
  AppError,
  ConfigurationError,
  LocationTypeError,
  RequestShapeError,
  TransportError,
  getErrorMessage,
  isConfigurationError,
  isOperationalError,
  isTransportError,
} from '../core/errors/AppError';

describe('AppError', () => {
  it('serializes code, message and details', () => {
    const error = new TransportError('HTTP 502', ErrorCode.TRANSPORT_HTTP_ERROR, { httpStatus: 502 });
    const json = error.toJSON();

    expect(error.name).toBe('TransportError');
    expect(json.success).toBe(false);
    expect(json.error.code).toBe('NET_3001');
    expect(json.error.message).toBe('HTTP 502');
    expect(json.error.details).toEqual({ httpStatus: 502 });
    expect(json.error.timestamp).toBe(error.timestamp);
    expect(json.error).not.toHaveProperty('stack');
  });

  it('keeps instanceof working for every subclass', () => {
    const errors = [
      new ConfigurationError(),
      new RequestShapeError(),
      new LocationTypeError('bad location'),
      new TransportError('down'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(Error);
      expect(isOperationalError(error)).toBe(true);
    }
    expect(isConfigurationError(errors[0])).toBe(true);
    expect(isTransportError(errors[3])).toBe(true);
    expect(isTransportError(errors[0])).toBe(false);
  });

  it('defaults to the internal error code', () => {
    const error = new AppError('boom');

    expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(error.isOperational).toBe(true);
  });
});

describe('ConfigurationError.fromZodError', () => {
  it('lists every field in the message', () => {
    const schema = z.object({
      timeoutMs: z.number({ invalid_type_error: 'must be a number' }),
      language: z.string({ required_error: 'is required' }),
    });
    const parsed = schema.safeParse({ timeoutMs: 'soon' });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const error = ConfigurationError.fromZodError(parsed.error);

      expect(error.message).toBe('Invalid configuration: timeoutMs: must be a number; language: is required');
      expect(error.errors).toEqual([
        { field: 'timeoutMs', message: 'must be a number' },
        { field: 'language', message: 'is required' },
      ]);
      expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    }
  });
});

describe('getErrorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(404)).toBe('404');
  });
});
