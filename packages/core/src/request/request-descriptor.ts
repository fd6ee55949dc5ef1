import { HeaderFields, type HeaderInit } from '../headers/header-fields.js';
import { ValidationError } from '../errors/index.js';
import type { JsonValue } from '../parse/json.js';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Ordered query parameter. Repeated names are allowed and kept in order.
 */
export interface QueryItem {
  name: string;
  value: string;
}

export type QueryInit =
  | readonly QueryItem[]
  | Record<string, string | number | boolean | undefined>;

/**
 * Cache behaviour requested from the transport.
 * `undefined` on the descriptor means "use the protocol default".
 */
export type CachePolicy =
  | 'use-protocol-default'
  | 'reload-ignoring-cache'
  | 'return-cache-else-load'
  | 'return-cache-dont-load';

export type Credential =
  | { kind: 'basic'; username: string; password: string }
  | { kind: 'bearer'; token: string };

export type RequestBody =
  | { kind: 'json'; value: JsonValue }
  | { kind: 'form'; items: readonly QueryItem[] }
  | { kind: 'data'; data: Uint8Array; contentType: string };

export const jsonBody = (value: JsonValue): RequestBody => ({ kind: 'json', value });

export const formBody = (items: QueryInit): RequestBody => ({ kind: 'form', items: toQueryItems(items) });

export const dataBody = (data: Uint8Array, contentType = 'application/octet-stream'): RequestBody => ({
  kind: 'data',
  data,
  contentType,
});

function copyBody(body: RequestBody): RequestBody {
  switch (body.kind) {
    case 'json':
      return { kind: 'json', value: structuredClone(body.value) };
    case 'form':
      return { kind: 'form', items: body.items.map((item) => ({ ...item })) };
    case 'data':
      return { kind: 'data', data: body.data.slice(), contentType: body.contentType };
  }
}

export function toQueryItems(init: QueryInit | undefined): QueryItem[] {
  if (!init) return [];
  if (isQueryItemList(init)) return init.map((item) => ({ name: item.name, value: item.value }));
  const items: QueryItem[] = [];
  for (const [name, value] of Object.entries(init)) {
    if (value === undefined) continue;
    items.push({ name, value: String(value) });
  }
  return items;
}

function isQueryItemList(init: QueryInit): init is readonly QueryItem[] {
  return Array.isArray(init);
}

export interface RequestDescriptorInit {
  method: HttpMethod;
  url: URL | string;
  query?: QueryInit;
  headers?: HeaderInit;
  body?: RequestBody;
  timeoutMs?: number;
  cachePolicy?: CachePolicy;
  followRedirects?: boolean;
  allowsCellularAccess?: boolean;
  userInitiated?: boolean;
  credential?: Credential;
}

/**
 * RequestDescriptor
 * Configuration of a single HTTP call.
 *
 * Mutable until it is handed to a task; a task works on its own `clone()`,
 * so edits made after `perform()` never reach the in-flight request.
 */
export class RequestDescriptor {
  readonly method: HttpMethod;
  readonly url: URL;
  readonly headerFields: HeaderFields;
  query: QueryItem[];
  body?: RequestBody;
  credential?: Credential;
  followRedirects: boolean;
  allowsCellularAccess: boolean;
  userInitiated: boolean;

  private timeoutMs_?: number;
  private cachePolicy_?: CachePolicy;

  constructor(init: RequestDescriptorInit) {
    this.method = init.method;
    this.url = parseUrl(init.url);
    this.headerFields = new HeaderFields(init.headers);
    this.query = toQueryItems(init.query);
    this.body = init.body;
    this.credential = init.credential;
    this.followRedirects = init.followRedirects ?? true;
    this.allowsCellularAccess = init.allowsCellularAccess ?? true;
    this.userInitiated = init.userInitiated ?? false;
    this.timeoutMs = init.timeoutMs;
    this.cachePolicy = init.cachePolicy;
  }

  /** Request timeout in milliseconds; `undefined` falls back to the transport default */
  get timeoutMs(): number | undefined {
    return this.timeoutMs_;
  }

  set timeoutMs(value: number | undefined) {
    if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
      throw new ValidationError('timeoutMs must be a positive number', { timeoutMs: value });
    }
    this.timeoutMs_ = value;
  }

  /** Cache policy override; `undefined` means the protocol default */
  get cachePolicy(): CachePolicy | undefined {
    return this.cachePolicy_;
  }

  set cachePolicy(value: CachePolicy | undefined) {
    this.cachePolicy_ = value === 'use-protocol-default' ? undefined : value;
  }

  addQuery(name: string, value: string): this {
    this.query.push({ name, value });
    return this;
  }

  /** Deep copy of every mutable field, body payload included */
  clone(): RequestDescriptor {
    return new RequestDescriptor({
      method: this.method,
      url: this.url.href,
      query: this.query,
      headers: this.headerFields,
      body: this.body ? copyBody(this.body) : undefined,
      timeoutMs: this.timeoutMs_,
      cachePolicy: this.cachePolicy_,
      followRedirects: this.followRedirects,
      allowsCellularAccess: this.allowsCellularAccess,
      userInitiated: this.userInitiated,
      credential: this.credential ? { ...this.credential } : undefined,
    });
  }

  /** URL with the descriptor's query items appended after any existing query */
  resolvedUrl(): URL {
    const url = new URL(this.url.href);
    for (const { name, value } of this.query) url.searchParams.append(name, value);
    return url;
  }
}

function parseUrl(input: URL | string): URL {
  if (input instanceof URL) return new URL(input.href);
  try {
    return new URL(input);
  } catch {
    throw new ValidationError(`Invalid request URL: ${input}`, { url: input });
  }
}
