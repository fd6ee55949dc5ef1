import type { HttpResponseInfo } from '../interfaces/transport.js';

/**
 * Terminal outcome of a task. Exactly one variant describes what happened.
 *
 * - success: the response was accepted and every parse stage ran
 * - error: transport failure (no response), classification failure or a
 *   parse stage threw (response attached)
 * - canceled: carries nothing
 */
export type TaskResult<T> =
  | { readonly kind: 'success'; readonly response: HttpResponseInfo; readonly value: T }
  | { readonly kind: 'error'; readonly response?: HttpResponseInfo; readonly error: Error }
  | { readonly kind: 'canceled' };

export type SuccessResult<T> = Extract<TaskResult<T>, { kind: 'success' }>;
export type ErrorResult = Extract<TaskResult<never>, { kind: 'error' }>;
export type CanceledResult = Extract<TaskResult<never>, { kind: 'canceled' }>;

export const success = <T>(response: HttpResponseInfo, value: T): TaskResult<T> => ({
  kind: 'success',
  response,
  value,
});

export const failure = (error: Error, response?: HttpResponseInfo): ErrorResult => ({
  kind: 'error',
  error,
  response,
});

const CANCELED: CanceledResult = { kind: 'canceled' };

export const canceled = (): CanceledResult => CANCELED;

export const isSuccess = <T>(result: TaskResult<T>): result is SuccessResult<T> => result.kind === 'success';
export const isError = <T>(result: TaskResult<T>): result is ErrorResult => result.kind === 'error';
export const isCanceled = <T>(result: TaskResult<T>): result is CanceledResult => result.kind === 'canceled';

/** Value of a successful result; undefined otherwise */
export function resultValue<T>(result: TaskResult<T>): T | undefined {
  return result.kind === 'success' ? result.value : undefined;
}

/** Error of a failed result; undefined otherwise (including canceled) */
export function resultError<T>(result: TaskResult<T>): Error | undefined {
  return result.kind === 'error' ? result.error : undefined;
}

/**
 * Response of a successful result, or of a failed one whose failure happened
 * after the response arrived. Undefined for transport failures and cancellation.
 */
export function resultResponse<T>(result: TaskResult<T>): HttpResponseInfo | undefined {
  return result.kind === 'canceled' ? undefined : result.response;
}

export interface ResultMatcher<T, R> {
  success(value: T, response: HttpResponseInfo): R;
  error(error: Error, response: HttpResponseInfo | undefined): R;
  canceled(): R;
}

export function matchResult<T, R>(result: TaskResult<T>, matcher: ResultMatcher<T, R>): R {
  switch (result.kind) {
    case 'success':
      return matcher.success(result.value, result.response);
    case 'error':
      return matcher.error(result.error, result.response);
    case 'canceled':
      return matcher.canceled();
  }
}

/** Transform the value of a successful result, leaving the other variants untouched */
export function mapResult<T, U>(result: TaskResult<T>, transform: (value: T) => U): TaskResult<U> {
  return result.kind === 'success' ? success(result.response, transform(result.value)) : result;
}
