import { HeaderFields } from '../headers/header-fields.js';
import type { TransportRequest } from '../interfaces/transport.js';
import { buildAcceptHeader } from '../negotiation/content-negotiator.js';
import { encodeJson } from '../parse/json.js';
import type { Credential, RequestBody, RequestDescriptor } from './request-descriptor.js';

export interface PrepareOptions {
  /** Manager-level headers (User-Agent, Accept-Language, ...); the request's own headers win */
  defaultHeaders?: HeaderFields;
  expectedContentTypes: readonly string[];
  /** Credential resolved for this request; replaces any Authorization header */
  credential?: Credential;
  defaultTimeoutMs?: number;
}

interface EncodedBody {
  bytes: Uint8Array;
  contentType: string;
}

export function encodeBody(body: RequestBody): EncodedBody {
  switch (body.kind) {
    case 'json':
      return { bytes: encodeJson(body.value), contentType: 'application/json; charset=utf-8' };
    case 'form': {
      const params = new URLSearchParams();
      for (const { name, value } of body.items) params.append(name, value);
      return {
        bytes: new TextEncoder().encode(params.toString()),
        contentType: 'application/x-www-form-urlencoded; charset=utf-8',
      };
    }
    case 'data':
      return { bytes: body.data, contentType: body.contentType };
  }
}

export function authorizationFor(credential: Credential): string {
  switch (credential.kind) {
    case 'basic':
      return `Basic ${Buffer.from(`${credential.username}:${credential.password}`).toString('base64')}`;
    case 'bearer':
      return `Bearer ${credential.token}`;
  }
}

/**
 * Turn a descriptor snapshot into the request a transport sends.
 *
 * Header precedence, lowest first: manager defaults, generated Accept,
 * the request's own fields. Authorization is replaced when a credential is
 * present; Content-Type and Content-Length always come from the body.
 */
export function prepareTransportRequest(descriptor: RequestDescriptor, options: PrepareOptions): TransportRequest {
  const headers = new HeaderFields(options.defaultHeaders);

  const accept = buildAcceptHeader(options.expectedContentTypes);
  if (accept !== undefined) headers.set('Accept', accept);

  headers.merge(descriptor.headerFields);

  if (options.credential) {
    headers.delete('Authorization');
    headers.set('Authorization', authorizationFor(options.credential));
  }

  headers.delete('Content-Type');
  headers.delete('Content-Length');

  let body: Uint8Array | undefined;
  if (descriptor.body) {
    const encoded = encodeBody(descriptor.body);
    body = encoded.bytes;
    headers.set('Content-Type', encoded.contentType);
    headers.set('Content-Length', String(encoded.bytes.byteLength));
  }

  return {
    method: descriptor.method,
    url: descriptor.resolvedUrl().href,
    headers: headers.toRecord(),
    body,
    timeoutMs: descriptor.timeoutMs ?? options.defaultTimeoutMs,
    cachePolicy: descriptor.cachePolicy,
    followRedirects: descriptor.followRedirects,
    allowsCellularAccess: descriptor.allowsCellularAccess,
    userInitiated: descriptor.userInitiated,
  };
}
