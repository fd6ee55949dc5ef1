import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { HeaderFields } from '../headers/header-fields.js';
import type { Logger } from '../interfaces/logger.js';
import { createConsoleLogger } from '../interfaces/logger.js';
import type { Transport, TransportRequest, TransportResponse } from '../interfaces/transport.js';
import { errorToLog, sanitizeHeadersForLog } from '../utils/logging.js';
import { transportErrorFrom, wireHeaders } from './transport-helpers.js';

export interface AxiosTransportOptions {
  axiosInstance?: AxiosInstance;
  /** Used when a request carries no timeout of its own */
  defaultTimeoutMs?: number;
  /** Redirect limit when a request follows redirects */
  maxRedirects?: number;
  debug?: boolean;
  logger?: Logger;
}

function toHeaderFields(headers: AxiosResponse['headers']): HeaderFields {
  const fields = new HeaderFields();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) fields.add(name, String(item));
    } else {
      fields.add(name, String(value));
    }
  }
  return fields;
}

function toBytes(data: ArrayBuffer | undefined): Uint8Array {
  return data ? new Uint8Array(data) : new Uint8Array();
}

function finalUrl(response: AxiosResponse, requested: string): string {
  // follow-redirects exposes the last hop on the native response
  const responseUrl: unknown = response.request?.res?.responseUrl;
  return typeof responseUrl === 'string' && responseUrl.length > 0 ? responseUrl : requested;
}

/**
 * Create a Transport backed by Axios.
 * - Every status resolves; classification happens upstream.
 * - Bodies are read as raw bytes (`responseType: 'arraybuffer'`).
 * - Axios errors become TransportError with the low-level code kept.
 */
export function createAxiosTransport(opts: AxiosTransportOptions = {}): Transport {
  const instance: AxiosInstance =
    opts.axiosInstance ?? axios.create({ timeout: opts.defaultTimeoutMs ?? 30_000 });

  const resolvedDebug = opts.debug ?? process.env.HTTP_DEBUG === '1';
  const log = opts.logger ?? createConsoleLogger();

  function toAxiosConfig(
    request: TransportRequest,
    headers: Record<string, string>,
    signal: AbortSignal
  ): AxiosRequestConfig<Buffer> {
    const config: AxiosRequestConfig<Buffer> = {
      method: request.method,
      url: request.url,
      headers,
      responseType: 'arraybuffer',
      validateStatus: () => true,
      maxRedirects: request.followRedirects ? opts.maxRedirects ?? 5 : 0,
      signal,
    };
    // Buffer keeps axios from sending the whole backing store of a view
    if (request.body) config.data = Buffer.from(request.body);
    if (typeof request.timeoutMs === 'number') config.timeout = request.timeoutMs;
    return config;
  }

  return {
    async send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
      const headers = wireHeaders(request);
      const config = toAxiosConfig(request, headers, signal);
      if (resolvedDebug) {
        log.debug('request', {
          method: request.method,
          url: request.url,
          headers: sanitizeHeadersForLog(headers),
          bodyLength: request.body?.byteLength ?? 0,
        });
      }

      let res: AxiosResponse<ArrayBuffer | undefined>;
      try {
        res = await instance.request<ArrayBuffer | undefined>(config);
      } catch (err) {
        const error = transportErrorFrom(err, `${request.method} ${request.url} failed`);
        if (resolvedDebug) log.debug('error', { url: request.url, error: errorToLog(error) });
        throw error;
      }

      const response: TransportResponse = {
        url: finalUrl(res, request.url),
        status: res.status,
        statusText: res.statusText || undefined,
        headers: toHeaderFields(res.headers),
        body: toBytes(res.data),
      };

      if (resolvedDebug) {
        log.debug('response', {
          status: response.status,
          statusText: response.statusText,
          headers: sanitizeHeadersForLog(response.headers),
          bodyLength: response.body.byteLength,
        });
      }
      return response;
    },
  };
}

export default createAxiosTransport;
