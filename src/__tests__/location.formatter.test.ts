/**
 * Location encoding for origins / destinations
 */

import { ErrorCode } from '../core/constants';
import { LocationTypeError } from '../core/errors/AppError';
import { formatLocation } from '../modules/distance-matrix/location.formatter';

describe('formatLocation', () => {
  describe('single address', () => {
    it('joins words with "+" and drops commas and repeated spaces', () => {
      expect(formatLocation('123 Fake   Street, Boston MA')).toBe('123+Fake+Street+Boston+MA');
    });

    it('trims leading and trailing whitespace', () => {
      expect(formatLocation('  Boston,MA \t')).toBe('Boston+MA');
    });

    it('returns an empty string for an empty address', () => {
      expect(formatLocation('')).toBe('');
    });

    it('leaves already formatted output unchanged', () => {
      const once = formatLocation('24 Sussex Drive, Ottawa ON');
      expect(formatLocation(once)).toBe(once);
      expect(once).toBe('24+Sussex+Drive+Ottawa+ON');
    });
  });

  describe('lists', () => {
    it('formats each entry and joins them with "|"', () => {
      expect(formatLocation(['Boston MA', 'New  ,York'])).toBe('Boston+MA|New+York');
    });

    it('never emits whitespace', () => {
      const inputs = [
        ['  Portland ,  ME', 'Salem\nMA'],
        ['Concord\tNH'],
        ['a , b , c', ' d '],
      ];
      for (const input of inputs) {
        expect(formatLocation(input)).not.toMatch(/\s/);
      }
    });

    it('uses "|" only between entries', () => {
      const formatted = formatLocation(['Boston MA', 'Providence RI', 'Hartford CT']);
      expect(formatted.split('|')).toEqual(['Boston+MA', 'Providence+RI', 'Hartford+CT']);
    });
  });

  describe('coordinates', () => {
    it('encodes a coordinate pair as lat,lng', () => {
      expect(formatLocation({ latitude: 41.43206, longitude: -81.38992 })).toBe('41.43206,-81.38992');
    });

    it('writes tiny and whole values in plain decimal notation', () => {
      expect(formatLocation({ latitude: 1e-7, longitude: 0 })).toBe('0.0000001,0');
      expect(formatLocation({ latitude: -1e-9, longitude: 12 })).toBe('0,12');
      expect(formatLocation({ latitude: -45.5, longitude: 180 })).toBe('-45.5,180');
    });

    it('mixes addresses and coordinates in a list', () => {
      expect(formatLocation(['Boston MA', { latitude: -33.86748, longitude: 151.20699 }]))
        .toBe('Boston+MA|-33.86748,151.20699');
    });

    it('rejects out-of-range coordinates', () => {
      expect(() => formatLocation({ latitude: 95, longitude: 10 })).toThrow(LocationTypeError);
    });
  });

  describe('invalid input', () => {
    it('throws LocationTypeError for a number instead of stringifying it', () => {
      expect(() => formatLocation(123)).toThrow(LocationTypeError);
      expect(() => formatLocation(123)).toThrow(
        'Location must be an address string, a coordinate pair or a list of them, got number'
      );
    });

    it('throws for null and for non-string list entries', () => {
      expect(() => formatLocation(null)).toThrow(LocationTypeError);
      expect(() => formatLocation(['Boston MA', 7])).toThrow(LocationTypeError);
      expect(() => formatLocation([['nested']])).toThrow('got array');
    });

    it('carries the location error code', () => {
      expect.assertions(3);
      try {
        formatLocation(true);
      } catch (error) {
        expect(error).toBeInstanceOf(LocationTypeError);
        if (error instanceof LocationTypeError) {
          expect(error.code).toBe(ErrorCode.REQUEST_LOCATION_INVALID);
          expect(error.details).toEqual({ receivedType: 'boolean' });
        }
      }
    });
  });
});
