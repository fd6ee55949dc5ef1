import { STATUS_CODES } from 'node:http';

/**
 * Classification failures produced by the response classifier and content
 * negotiator. Transports never produce these.
 */
export type ApiErrorDetail =
  | { kind: 'FailedResponse'; statusCode: number; body: Uint8Array }
  | { kind: 'UnexpectedContentType'; contentType: string; body: Uint8Array }
  | { kind: 'UnexpectedNoContent' }
  | { kind: 'UnexpectedRedirect'; statusCode: number; location?: string; body: Uint8Array };

export type ApiErrorKind = ApiErrorDetail['kind'];

/**
 * Localized reason phrase for a status code, e.g. 404 -> "Not Found"
 */
export function statusText(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? 'Unknown Status';
}

function describe(detail: ApiErrorDetail): string {
  switch (detail.kind) {
    case 'FailedResponse':
      return `HTTP response indicated failure (${detail.statusCode} ${statusText(detail.statusCode)})`;
    case 'UnexpectedContentType':
      return `HTTP response had unexpected content type ${JSON.stringify(detail.contentType)}`;
    case 'UnexpectedNoContent':
      return 'HTTP response returned 204 No Content when an entity was expected';
    case 'UnexpectedRedirect':
      return `HTTP response returned a redirection (${detail.statusCode} ${statusText(detail.statusCode)}) when an entity was expected`;
  }
}

/**
 * ApiError
 * Raised when a response arrived but could not be accepted.
 * Match on `detail.kind` to tell the categories apart.
 */
export class ApiError extends Error {
  readonly detail: ApiErrorDetail;

  constructor(detail: ApiErrorDetail) {
    super(describe(detail));
    Object.setPrototypeOf(this, ApiError.prototype);
    this.name = 'ApiError';
    this.detail = detail;
  }

  get kind(): ApiErrorKind {
    return this.detail.kind;
  }

  get statusCode(): number | undefined {
    return 'statusCode' in this.detail ? this.detail.statusCode : undefined;
  }

  get body(): Uint8Array | undefined {
    return 'body' in this.detail ? this.detail.body : undefined;
  }

  static failedResponse(statusCode: number, body: Uint8Array): ApiError {
    return new ApiError({ kind: 'FailedResponse', statusCode, body });
  }

  static unexpectedContentType(contentType: string, body: Uint8Array): ApiError {
    return new ApiError({ kind: 'UnexpectedContentType', contentType, body });
  }

  static unexpectedNoContent(): ApiError {
    return new ApiError({ kind: 'UnexpectedNoContent' });
  }

  static unexpectedRedirect(statusCode: number, location: string | undefined, body: Uint8Array): ApiError {
    return new ApiError({ kind: 'UnexpectedRedirect', statusCode, location, body });
  }
}

/**
 * TransportError
 * Network-level failure (connection refused, DNS, timeout, aborted socket).
 * Transports reject with this; the pipeline passes it through unclassified.
 */
export class TransportError extends Error {
  /** Low-level error code if the underlying client exposed one (ECONNREFUSED, ETIMEDOUT, ...) */
  readonly code?: string;

  constructor(message: string, opts?: { code?: string; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    Object.setPrototypeOf(this, TransportError.prototype);
    this.name = 'TransportError';
    this.code = opts?.code;
  }

  /** Wrap anything a transport threw into an Error, keeping existing Errors as-is */
  static from(err: unknown): Error {
    if (err instanceof Error) return err;
    return new TransportError(typeof err === 'string' ? err : 'Transport failed', { cause: err });
  }
}

/**
 * JsonDecodeError
 * Thrown by the JSON parse stage when the body is not valid JSON
 */
export class JsonDecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    Object.setPrototypeOf(this, JsonDecodeError.prototype);
    this.name = 'JsonDecodeError';
  }
}

/**
 * ValidationError
 * Thrown when input validation fails
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = 'ValidationError';
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(typeof err === 'string' ? err : `Non-error value thrown: ${String(err)}`, { cause: err });
}
