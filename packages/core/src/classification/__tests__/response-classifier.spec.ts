import { describe, it, expect } from 'vitest';
import { ApiError } from '../../errors/index.js';
import { HeaderFields } from '../../headers/header-fields.js';
import type { TransportResponse } from '../../interfaces/transport.js';
import { classifyResponse, type EntityExpectation } from '../response-classifier.js';

const body = new TextEncoder().encode('payload');

function response(status: number, headers: Record<string, string> = {}): TransportResponse {
  return { url: 'https://api.test/items', status, headers: HeaderFields.from(headers), body };
}

const parsedJson: EntityExpectation = {
  expectsEntity: true,
  toleratesNoContent: false,
  followRedirects: true,
  expectedContentTypes: ['application/json'],
};

const raw: EntityExpectation = {
  expectsEntity: false,
  toleratesNoContent: false,
  followRedirects: true,
  expectedContentTypes: [],
};

function errorOf(result: ReturnType<typeof classifyResponse>): ApiError {
  if (result.kind !== 'failure') throw new Error(`expected failure, got ${result.kind}`);
  return result.error;
}

describe('classifyResponse', () => {
  it('accepts a 2xx with a matching content type', () => {
    const result = classifyResponse(response(200, { 'Content-Type': 'application/json; charset=utf-8' }), parsedJson);

    expect(result).toEqual({ kind: 'success-with-body', body });
  });

  it('rejects a 2xx with the wrong content type', () => {
    const error = errorOf(classifyResponse(response(200, { 'Content-Type': 'text/plain' }), parsedJson));

    expect(error.detail).toEqual({ kind: 'UnexpectedContentType', contentType: 'text/plain', body });
    expect(error.message).toBe('HTTP response had unexpected content type "text/plain"');
  });

  it('fails non-2xx statuses with the body attached', () => {
    const error = errorOf(classifyResponse(response(404), parsedJson));

    expect(error.detail).toEqual({ kind: 'FailedResponse', statusCode: 404, body });
    expect(error.message).toBe('HTTP response indicated failure (404 Not Found)');
  });

  it('does not validate content type on failures', () => {
    const error = errorOf(classifyResponse(response(500, { 'Content-Type': 'text/html' }), parsedJson));

    expect(error.kind).toBe('FailedResponse');
  });

  describe('204 No Content', () => {
    it('is an empty success when tolerated', () => {
      expect(classifyResponse(response(204), { ...parsedJson, toleratesNoContent: true })).toEqual({
        kind: 'success-no-content',
      });
    });

    it('fails when an entity is expected', () => {
      const error = errorOf(classifyResponse(response(204), parsedJson));

      expect(error.kind).toBe('UnexpectedNoContent');
      expect(error.message).toBe('HTTP response returned 204 No Content when an entity was expected');
    });

    it('hands raw requests the body without checking content type', () => {
      expect(classifyResponse(response(204, { 'Content-Type': 'text/plain' }), raw)).toEqual({
        kind: 'success-with-body',
        body,
      });
    });
  });

  describe('redirects that were not followed', () => {
    it('fail with the location when an entity is expected', () => {
      const error = errorOf(classifyResponse(response(302, { Location: '/next' }), { ...parsedJson, followRedirects: false }));

      expect(error.detail).toEqual({ kind: 'UnexpectedRedirect', statusCode: 302, location: '/next', body });
      expect(error.message).toBe('HTTP response returned a redirection (302 Found) when an entity was expected');
    });

    it('pass through for raw requests', () => {
      expect(classifyResponse(response(301), { ...raw, followRedirects: false })).toEqual({
        kind: 'redirect-without-body-expected',
        body,
      });
    });

    it('are plain failures when redirects were meant to be followed', () => {
      const error = errorOf(classifyResponse(response(302, { Location: '/next' }), parsedJson));

      expect(error.detail).toEqual({ kind: 'FailedResponse', statusCode: 302, body });
    });
  });
});
