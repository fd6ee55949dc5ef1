/**
 * Logging Utilities - Safe object serialization for logging
 */

import { ApiError, TransportError } from '../errors/index.js';
import { HeaderFields } from '../headers/header-fields.js';

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and safely handles various object types.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'api-key', 'x-api-key', 'password', 'token', 'cookie', 'set-cookie'];

/**
 * Sanitize sensitive headers from logging
 * Masks values of headers that typically contain sensitive information.
 */
export function sanitizeHeadersForLog(
  headers?: HeaderFields | Record<string, unknown>
): Record<string, string> | undefined {
  if (!headers) return undefined;

  const record = headers instanceof HeaderFields ? headers.toRecord() : headers;
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(record)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = 'REDACTED';
    } else {
      sanitized[key] = String(value);
    }
  }

  return sanitized;
}

/**
 * Create a safe log object from an error
 * Extracts relevant error information in a standardized format suitable for logging.
 * Response bodies carried by ApiError are reported by length only.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof ApiError) {
    return {
      type: error.name,
      kind: error.kind,
      message: error.message,
      statusCode: error.statusCode,
      bodyLength: error.body?.byteLength,
    };
  }

  if (error instanceof TransportError) {
    return {
      type: error.name,
      message: error.message,
      code: error.code,
    };
  }

  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null ? { ...serialized } : { message: serialized };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
