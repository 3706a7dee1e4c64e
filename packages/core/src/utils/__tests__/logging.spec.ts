import { describe, it, expect } from 'vitest';
import { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog } from '../logging.js';

describe('Logging Utilities', () => {
  describe('serializeForLog', () => {
    it('returns primitives unchanged', () => {
      expect(serializeForLog(null)).toBe(null);
      expect(serializeForLog(undefined)).toBe(undefined);
      expect(serializeForLog(42)).toBe(42);
      expect(serializeForLog('hello')).toBe('hello');
    });

    it('drops undefined values and functions from objects', () => {
      const obj = { name: 'test', value: undefined, fn: () => 'x', nested: { key: 'value' } };
      expect(serializeForLog(obj)).toEqual({ name: 'test', nested: { key: 'value' } });
    });

    it('describes circular structures instead of throwing', () => {
      const obj: Record<string, unknown> = { name: 'test' };
      obj.self = obj;

      const result = serializeForLog(obj);

      expect(typeof result).toBe('string');
      expect(String(result).startsWith('[Unserializable object: ')).toBe(true);
    });
  });

  describe('truncateString', () => {
    it('returns short strings unchanged', () => {
      expect(truncateString('hello world', 50)).toBe('hello world');
    });

    it('truncates at max length with an ellipsis', () => {
      expect(truncateString('this is a very long string', 10)).toBe('this is a ...');
    });

    it('defaults to 500 characters', () => {
      expect(truncateString('a'.repeat(600))).toHaveLength(503);
    });
  });

  describe('sanitizeHeadersForLog', () => {
    it('returns undefined for no headers', () => {
      expect(sanitizeHeadersForLog(undefined)).toBeUndefined();
    });

    it('redacts sensitive headers case-insensitively and keeps the rest', () => {
      const result = sanitizeHeadersForLog({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-token',
        'X-API-Key': 'test-key',
        cookie: 'session=1',
        'set-cookie': 'session=2',
      });

      expect(result).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'REDACTED',
        'X-API-Key': 'REDACTED',
        cookie: 'REDACTED',
        'set-cookie': 'REDACTED',
      });
    });
  });

  describe('errorToLog', () => {
    it('uses the error name, message and stack', () => {
      const result = errorToLog(new TypeError('Type error message'));

      expect(result.type).toBe('TypeError');
      expect(result.message).toBe('Type error message');
      expect(result).toHaveProperty('stack');
    });

    it('copies plain objects', () => {
      const obj = { code: 'ERR_123', details: 'Something went wrong' };
      expect(errorToLog(obj)).toEqual(obj);
    });

    it('wraps the description of circular objects in a message', () => {
      const obj: Record<string, unknown> = { message: 'error' };
      obj.self = obj;

      const result = errorToLog(obj);

      expect(String(result.message).startsWith('[Unserializable object: ')).toBe(true);
    });

    it('handles primitives', () => {
      expect(errorToLog('string error')).toEqual({ type: 'string', message: 'string error' });
      expect(errorToLog(42)).toEqual({ type: 'number', message: '42' });
      expect(errorToLog(null)).toHaveProperty('message', 'null');
    });
  });
});
