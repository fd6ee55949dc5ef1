import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LOGGING_OPTIONS,
  getLoggingOptions,
  summarizeValue,
  truncateForLogging,
  valueForLog,
} from '../logging-helpers.js';

describe('Logging Helpers', () => {
  describe('getLoggingOptions', () => {
    it('should return defaults when no options provided', () => {
      expect(getLoggingOptions()).toEqual({
        maxArrayItems: 10,
        maxDepth: 2,
        logBody: 'summary',
      });
    });

    it('should merge provided options with defaults', () => {
      const options = getLoggingOptions({ maxArrayItems: 5, logBody: true });
      expect(options).toEqual({ maxArrayItems: 5, maxDepth: 2, logBody: true });
    });
  });

  describe('truncateForLogging', () => {
    const options = DEFAULT_LOGGING_OPTIONS;

    it('should handle null, undefined and primitives', () => {
      expect(truncateForLogging(null, options)).toBe(null);
      expect(truncateForLogging(undefined, options)).toBe(undefined);
      expect(truncateForLogging('test', options)).toBe('test');
      expect(truncateForLogging(42, options)).toBe(42);
    });

    it('should render bytes by length', () => {
      expect(truncateForLogging(new Uint8Array(12), options)).toBe('[Bytes: 12]');
    });

    it('should truncate arrays at maxArrayItems', () => {
      const result = truncateForLogging([1, 2, 3, 4, 5, 6, 7], { ...options, maxArrayItems: 5 });
      expect(result).toEqual([1, 2, 3, 4, 5, '... and 2 more items']);
    });

    it('should skip arrays when maxArrayItems is 0', () => {
      expect(truncateForLogging([1, 2, 3], { ...options, maxArrayItems: 0 })).toBe('[Array: 3 items (truncated)]');
    });

    it('should respect maxDepth for nested objects', () => {
      const nested = { level1: { level2: { level3: { data: 'deep' } } } };
      expect(truncateForLogging(nested, { ...options, maxDepth: 2 })).toEqual({
        level1: { level2: '[Object: 1 keys]' },
      });
    });

    it('should summarize arrays at the depth limit', () => {
      expect(truncateForLogging({ a: [1, 2] }, { ...options, maxDepth: 1 })).toEqual({ a: '[Array: 2 items]' });
    });
  });

  describe('summarizeValue', () => {
    it('should handle null and undefined', () => {
      expect(summarizeValue(null)).toEqual({ type: 'null' });
      expect(summarizeValue(undefined)).toEqual({ type: 'undefined' });
    });

    it('should summarize arrays by their first item', () => {
      const result = summarizeValue([
        { id: '1', name: 'one', a: 1, b: 2, c: 3, d: 4 },
        { id: '2' },
      ]);
      expect(result).toEqual({
        type: 'array',
        count: 2,
        itemKeys: ['id', 'name', 'a', 'b', 'c'],
        itemCount: 6,
      });
    });

    it('should summarize objects', () => {
      expect(summarizeValue({ id: '123', nested: { foo: 'bar' } })).toEqual({
        type: 'object',
        keyCount: 2,
        keys: ['id', 'nested'],
      });
    });

    it('should report byte arrays by length', () => {
      expect(summarizeValue(new Uint8Array(3))).toEqual({ type: 'bytes', byteLength: 3 });
    });

    it('should truncate long string values to 100 chars', () => {
      expect(summarizeValue('x'.repeat(200))).toEqual({ type: 'string', value: 'x'.repeat(100) });
    });
  });

  describe('valueForLog', () => {
    const value = { items: [1, 2, 3] };

    it('should summarize by default', () => {
      expect(valueForLog(value)).toEqual({ type: 'object', keyCount: 1, keys: ['items'] });
    });

    it('should return undefined when bodies are not logged', () => {
      expect(valueForLog(value, { logBody: false })).toBeUndefined();
    });

    it('should truncate when full bodies are logged', () => {
      expect(valueForLog(value, { logBody: true, maxArrayItems: 2 })).toEqual({ items: [1, 2, '... and 1 more items'] });
    });
  });
});
