import { describe, it, expect } from 'vitest';
import { HeaderFields } from '../../headers/header-fields.js';
import { authorizationFor, prepareTransportRequest } from '../prepare-request.js';
import { dataBody, formBody, jsonBody, RequestDescriptor } from '../request-descriptor.js';

const decode = (bytes: Uint8Array | undefined) => new TextDecoder().decode(bytes);

describe('prepareTransportRequest', () => {
  it('generates Accept over the manager default', () => {
    const descriptor = new RequestDescriptor({ method: 'GET', url: 'https://api.test/items' });
    const request = prepareTransportRequest(descriptor, {
      defaultHeaders: HeaderFields.from({ 'User-Agent': 'ua/1', Accept: 'text/html' }),
      expectedContentTypes: ['application/json'],
    });

    expect(request.headers).toEqual({ 'User-Agent': 'ua/1', Accept: 'application/json' });
  });

  it('lets the request override the generated Accept', () => {
    const descriptor = new RequestDescriptor({
      method: 'GET',
      url: 'https://api.test/items',
      headers: { accept: 'application/xml' },
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: ['application/json'] });

    expect(request.headers).toEqual({ Accept: 'application/xml' });
  });

  it('replaces Authorization when a credential is present', () => {
    const descriptor = new RequestDescriptor({
      method: 'GET',
      url: 'https://api.test/items',
      headers: { authorization: 'Token abc' },
    });
    const request = prepareTransportRequest(descriptor, {
      expectedContentTypes: [],
      credential: { kind: 'basic', username: 'user', password: 'pass' },
    });

    expect(request.headers).toEqual({ Authorization: 'Basic dXNlcjpwYXNz' });
  });

  it('derives Content-Type and Content-Length from a JSON body', () => {
    const descriptor = new RequestDescriptor({
      method: 'POST',
      url: 'https://api.test/items',
      headers: { 'content-type': 'text/plain', 'Content-Length': '999' },
      body: jsonBody({ a: 1 }),
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: [] });

    expect(request.headers).toEqual({
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Length': '7',
    });
    expect(decode(request.body)).toBe('{"a":1}');
  });

  it('form-encodes form bodies', () => {
    const descriptor = new RequestDescriptor({
      method: 'POST',
      url: 'https://api.test/login',
      body: formBody({ q: 'a b', n: 1 }),
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: [] });

    expect(decode(request.body)).toBe('q=a+b&n=1');
    expect(request.headers['Content-Type']).toBe('application/x-www-form-urlencoded; charset=utf-8');
    expect(request.headers['Content-Length']).toBe('9');
  });

  it('passes raw data through with its content type', () => {
    const descriptor = new RequestDescriptor({
      method: 'PUT',
      url: 'https://api.test/blob',
      body: dataBody(new Uint8Array([1, 2, 3]), 'image/png'),
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: [] });

    expect(request.body).toEqual(new Uint8Array([1, 2, 3]));
    expect(request.headers).toEqual({ 'Content-Type': 'image/png', 'Content-Length': '3' });
  });

  it('drops a caller Content-Type when there is no body', () => {
    const descriptor = new RequestDescriptor({
      method: 'GET',
      url: 'https://api.test/items',
      headers: { 'Content-Type': 'application/json' },
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: [] });

    expect(request.headers).toEqual({});
    expect(request.body).toBeUndefined();
  });

  it('copies the URL, timeout and transfer flags', () => {
    const descriptor = new RequestDescriptor({
      method: 'GET',
      url: 'https://api.test/items',
      query: { page: 3 },
      cachePolicy: 'reload-ignoring-cache',
      followRedirects: false,
      allowsCellularAccess: false,
      userInitiated: true,
    });
    const request = prepareTransportRequest(descriptor, { expectedContentTypes: [], defaultTimeoutMs: 5000 });

    expect(request).toMatchObject({
      method: 'GET',
      url: 'https://api.test/items?page=3',
      timeoutMs: 5000,
      cachePolicy: 'reload-ignoring-cache',
      followRedirects: false,
      allowsCellularAccess: false,
      userInitiated: true,
    });

    descriptor.timeoutMs = 100;
    expect(prepareTransportRequest(descriptor, { expectedContentTypes: [], defaultTimeoutMs: 5000 }).timeoutMs).toBe(100);
  });
});

describe('authorizationFor', () => {
  it('formats bearer tokens', () => {
    expect(authorizationFor({ kind: 'bearer', token: 'test-token' })).toBe('Bearer test-token');
  });
});
