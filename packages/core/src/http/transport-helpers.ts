import { TransportError } from '../errors/index.js';
import { HeaderFields } from '../headers/header-fields.js';
import type { TransportRequest } from '../interfaces/transport.js';
import type { CachePolicy } from '../request/request-descriptor.js';

/**
 * Cache-Control directives that express a cache policy on the wire.
 * Server-side clients keep no HTTP cache of their own, so the policy is
 * passed on to intermediaries instead.
 */
export function cacheControlFor(policy: CachePolicy | undefined): string | undefined {
  switch (policy) {
    case 'reload-ignoring-cache':
      return 'no-cache';
    case 'return-cache-else-load':
      return 'max-stale';
    case 'return-cache-dont-load':
      return 'only-if-cached';
    case 'use-protocol-default':
    case undefined:
      return undefined;
  }
}

/**
 * Wire headers for a finalized request.
 * A Cache-Control header set by the caller is left alone.
 */
export function wireHeaders(request: TransportRequest): Record<string, string> {
  const headers = HeaderFields.from(request.headers);
  const cacheControl = cacheControlFor(request.cachePolicy);
  if (cacheControl !== undefined && !headers.has('Cache-Control')) {
    headers.set('Cache-Control', cacheControl);
    if (request.cachePolicy === 'reload-ignoring-cache') headers.set('Pragma', 'no-cache');
  }
  return headers.toRecord();
}

/** Low-level error code carried by an error or its cause (ECONNREFUSED, ENOTFOUND, ...) */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return errorCode(err.cause);
  return undefined;
}

export function transportErrorFrom(err: unknown, fallbackMessage = 'Transport failed'): TransportError {
  if (err instanceof TransportError) return err;
  const message = err instanceof Error && err.message ? err.message : fallbackMessage;
  return new TransportError(message, { code: errorCode(err), cause: err });
}
