import { describe, it, expect } from 'vitest';
import { HeaderFields } from '../header-fields.js';

describe('HeaderFields', () => {
  it('joins repeated values of a field with ", "', () => {
    const fields = new HeaderFields().add('X-Tag', 'a').add('x-tag', 'b');

    expect(fields.get('X-TAG')).toBe('a, b');
    expect(fields.toRecord()).toEqual({ 'X-Tag': 'a, b' });
  });

  it('keeps the first-seen casing when a field is replaced', () => {
    const fields = new HeaderFields().set('X-Trace', '1').set('x-trace', '2');

    expect(fields.toRecord()).toEqual({ 'X-Trace': '2' });
    expect(fields.size).toBe(1);
  });

  it('builds from a record, adding array items one by one and skipping undefined', () => {
    const fields = HeaderFields.from({ 'Set-Cookie': ['a=1', 'b=2'], Host: 'api.test', Skip: undefined });

    expect(fields.get('set-cookie')).toBe('a=1, b=2');
    expect(fields.has('skip')).toBe(false);
    expect(fields.size).toBe(2);
  });

  it('merges pairs by replacing existing values', () => {
    const initial: Array<[string, string]> = [['Accept', 'text/html']];
    const update: Array<[string, string]> = [['accept', 'application/json']];
    const fields = HeaderFields.from(initial).merge(update);

    expect(fields.toRecord()).toEqual({ Accept: 'application/json' });
  });

  it('replaces a field with all items of an array value on merge', () => {
    const fields = HeaderFields.from({ Via: 'proxy-a' }).merge({ via: ['proxy-b', 'proxy-c'] });

    expect(fields.get('Via')).toBe('proxy-b, proxy-c');
    expect(fields.toRecord()).toEqual({ Via: 'proxy-b, proxy-c' });
  });

  it('removes a field merged with an empty array', () => {
    const fields = HeaderFields.from({ Via: 'proxy-a', Host: 'api.test' }).merge({ via: [] });

    expect(fields.toRecord()).toEqual({ Host: 'api.test' });
  });

  it('deletes case-insensitively', () => {
    const fields = HeaderFields.from({ Authorization: 'Bearer test-token' });

    expect(fields.delete('authorization')).toBe(true);
    expect(fields.delete('authorization')).toBe(false);
    expect(fields.size).toBe(0);
  });

  it('clones independently', () => {
    const original = HeaderFields.from({ Accept: 'application/json' });
    const copy = original.clone();
    copy.set('Accept', 'text/plain').set('X-Extra', '1');

    expect(original.toRecord()).toEqual({ Accept: 'application/json' });
    expect(copy.toRecord()).toEqual({ Accept: 'text/plain', 'X-Extra': '1' });
  });

  it('iterates in insertion order', () => {
    const fields = new HeaderFields().set('B', '2').set('A', '1').add('b', '3');

    expect([...fields]).toEqual([
      ['B', '2, 3'],
      ['A', '1'],
    ]);
  });
});
