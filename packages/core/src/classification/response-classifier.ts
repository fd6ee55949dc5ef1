import { ApiError } from '../errors/index.js';
import type { TransportResponse } from '../interfaces/transport.js';
import { validateContentType } from '../negotiation/content-negotiator.js';

/**
 * What the request expects from the response body
 */
export interface EntityExpectation {
  /** A parse chain will consume the body (JSON, custom handlers) */
  expectsEntity: boolean;
  /** A 204 is an acceptable answer that produces an empty (undefined) value */
  toleratesNoContent: boolean;
  /** Whether the transport was asked to follow redirects */
  followRedirects: boolean;
  expectedContentTypes: readonly string[];
}

export type ResponseClassification =
  | { kind: 'success-with-body'; body: Uint8Array }
  | { kind: 'success-no-content' }
  | { kind: 'redirect-without-body-expected'; body: Uint8Array }
  | { kind: 'failure'; error: ApiError };

const isRedirect = (status: number) => status >= 300 && status < 400;
const isSuccess = (status: number) => status >= 200 && status < 300;

/**
 * Map a raw response onto success / failure categories.
 * Pure: depends only on the response metadata and the expectation.
 */
export function classifyResponse(
  response: TransportResponse,
  expectation: EntityExpectation
): ResponseClassification {
  const { status, body } = response;

  if (status === 204) {
    if (expectation.toleratesNoContent) return { kind: 'success-no-content' };
    if (expectation.expectsEntity) return { kind: 'failure', error: ApiError.unexpectedNoContent() };
    return { kind: 'success-with-body', body };
  }

  if (isRedirect(status) && !expectation.followRedirects) {
    if (expectation.expectsEntity) {
      const location = response.headers.get('location');
      return { kind: 'failure', error: ApiError.unexpectedRedirect(status, location, body) };
    }
    return { kind: 'redirect-without-body-expected', body };
  }

  if (!isSuccess(status)) {
    return { kind: 'failure', error: ApiError.failedResponse(status, body) };
  }

  const validation = validateContentType(
    response.headers.get('content-type'),
    expectation.expectedContentTypes,
    body
  );
  if (validation.kind === 'mismatched') {
    return { kind: 'failure', error: ApiError.unexpectedContentType(validation.contentType, validation.body) };
  }
  return { kind: 'success-with-body', body };
}
