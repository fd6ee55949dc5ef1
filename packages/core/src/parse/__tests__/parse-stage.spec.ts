import { describe, it, expect, vi } from 'vitest';
import { JsonDecodeError } from '../../errors/index.js';
import { HeaderFields } from '../../headers/header-fields.js';
import type { HttpResponseInfo } from '../../interfaces/transport.js';
import { jsonHandler, ParseStage } from '../parse-stage.js';

const info: HttpResponseInfo = { url: 'https://api.test/items', status: 200, headers: new HeaderFields() };
const body = new TextEncoder().encode('{"count":2}');
const notCanceled = () => false;

describe('ParseStage', () => {
  it('yields the body from the raw source', async () => {
    const stage = ParseStage.raw();

    expect(stage.length).toBe(0);
    expect(await stage.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: body });
  });

  it('runs stages once each, in order', async () => {
    const calls: string[] = [];
    const stage = ParseStage.raw()
      .map((_res, bytes) => {
        calls.push('decode');
        return new TextDecoder().decode(bytes);
      })
      .map(async (_res, text) => {
        calls.push('length');
        return text.length;
      });

    expect(stage.length).toBe(2);
    expect(await stage.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: 11 });
    expect(calls).toEqual(['decode', 'length']);
  });

  it('passes the response to every stage', async () => {
    const stage = ParseStage.raw().map((res) => res.status);

    expect(await stage.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: 200 });
  });

  it('short-circuits on the first failure', async () => {
    const failure = new Error('bad payload');
    const after = vi.fn();
    const stage = ParseStage.raw()
      .map(() => {
        throw failure;
      })
      .map(after);

    expect(await stage.execute(info, body, notCanceled)).toEqual({ kind: 'error', error: failure });
    expect(after).not.toHaveBeenCalled();
  });

  it('wraps thrown non-errors', async () => {
    const stage = ParseStage.raw().map(() => {
      throw 'not an error';
    });

    const outcome = await stage.execute(info, body, notCanceled);
    expect(outcome.kind).toBe('error');
    expect(outcome.kind === 'error' && outcome.error.message).toBe('not an error');
  });

  it('stops before the next stage once canceled', async () => {
    let canceled = false;
    const second = vi.fn();
    const stage = ParseStage.raw()
      .map((_res, bytes) => {
        canceled = true;
        return bytes;
      })
      .map(second);

    expect(await stage.execute(info, body, () => canceled)).toEqual({ kind: 'canceled' });
    expect(second).not.toHaveBeenCalled();
  });

  it('reports cancellation that happens during the last stage', async () => {
    let canceled = false;
    const stage = ParseStage.raw().map(() => {
      canceled = true;
      return 1;
    });

    expect(await stage.execute(info, body, () => canceled)).toEqual({ kind: 'canceled' });
  });

  it('is immutable: map returns a new chain', async () => {
    const base = ParseStage.raw();
    const mapped = base.map(() => 'x');

    expect(base.length).toBe(0);
    expect(await base.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: body });
    expect(await mapped.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: 'x' });
  });
});

describe('jsonHandler', () => {
  it('decodes JSON bodies', async () => {
    const stage = ParseStage.raw().map(jsonHandler());

    expect(await stage.execute(info, body, notCanceled)).toEqual({ kind: 'value', value: { count: 2 } });
  });

  it('fails with JsonDecodeError on malformed bodies', async () => {
    const stage = ParseStage.raw().map(jsonHandler());
    const outcome = await stage.execute(info, new TextEncoder().encode('nope'), notCanceled);

    expect(outcome.kind === 'error' && outcome.error).toBeInstanceOf(JsonDecodeError);
  });
});
