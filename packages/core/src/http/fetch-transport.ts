import { TransportError } from '../errors/index.js';
import { HeaderFields } from '../headers/header-fields.js';
import type { Logger } from '../interfaces/logger.js';
import { createConsoleLogger } from '../interfaces/logger.js';
import type { Transport, TransportRequest, TransportResponse } from '../interfaces/transport.js';
import { errorToLog, sanitizeHeadersForLog } from '../utils/logging.js';
import { transportErrorFrom, wireHeaders } from './transport-helpers.js';

export interface FetchTransportOptions {
  defaultTimeoutMs?: number;
  // fetchFn can be provided for environments where `fetch` is not global
  fetchFn?: typeof fetch;
  debug?: boolean;
  logger?: Logger;
}

interface LinkedSignal {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/** Abort when the task aborts or the timeout elapses, whichever comes first */
function linkSignal(parent: AbortSignal, timeoutMs: number | undefined): LinkedSignal {
  const controller = new AbortController();
  let expired = false;

  const onAbort = () => controller.abort(parent.reason);
  if (parent.aborted) controller.abort(parent.reason);
  else parent.addEventListener('abort', onAbort, { once: true });

  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          expired = true;
          controller.abort();
        }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent.removeEventListener('abort', onAbort);
    },
  };
}

function toHeaderFields(headers: Headers): HeaderFields {
  const fields = new HeaderFields();
  headers.forEach((value, name) => {
    fields.add(name, value);
  });
  return fields;
}

/**
 * Create a Transport backed by the WHATWG fetch API.
 * With `followRedirects: false` the request uses `redirect: 'manual'`, so
 * 3xx responses come back as-is with their Location header.
 */
export function createFetchTransport(opts: FetchTransportOptions = {}): Transport {
  const fetchFn = opts.fetchFn ?? globalThis.fetch;
  if (typeof fetchFn !== 'function') throw new Error('fetch is not available in this environment; provide fetchFn');

  const resolvedDebug = opts.debug ?? process.env.HTTP_DEBUG === '1';
  const log = opts.logger ?? createConsoleLogger();

  return {
    async send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
      const headers = wireHeaders(request);
      const timeoutMs = request.timeoutMs ?? opts.defaultTimeoutMs;
      if (resolvedDebug) {
        log.debug('request', {
          method: request.method,
          url: request.url,
          headers: sanitizeHeadersForLog(headers),
          bodyLength: request.body?.byteLength ?? 0,
        });
      }

      const linked = linkSignal(signal, timeoutMs);
      try {
        const res = await fetchFn(request.url, {
          method: request.method,
          headers,
          body: request.body,
          redirect: request.followRedirects ? 'follow' : 'manual',
          signal: linked.signal,
        });
        const body = new Uint8Array(await res.arrayBuffer());

        const response: TransportResponse = {
          url: res.url || request.url,
          status: res.status,
          statusText: res.statusText || undefined,
          headers: toHeaderFields(res.headers),
          body,
        };
        if (resolvedDebug) {
          log.debug('response', {
            status: response.status,
            statusText: response.statusText,
            headers: sanitizeHeadersForLog(response.headers),
            bodyLength: body.byteLength,
          });
        }
        return response;
      } catch (err) {
        const error = linked.timedOut()
          ? new TransportError(`Request timed out after ${timeoutMs}ms`, { code: 'ETIMEDOUT', cause: err })
          : signal.aborted
            ? new TransportError('Request aborted', { code: 'ERR_CANCELED', cause: err })
            : transportErrorFrom(err, `${request.method} ${request.url} failed`);
        if (resolvedDebug) log.debug('error', { url: request.url, error: errorToLog(error) });
        throw error;
      } finally {
        linked.dispose();
      }
    },
  };
}

export default createFetchTransport;
