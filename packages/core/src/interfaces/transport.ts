import type { HeaderFields } from '../headers/header-fields.js';
import type { CachePolicy, Credential, HttpMethod } from '../request/request-descriptor.js';

/**
 * Finalized request handed to a transport.
 *
 * Headers are complete: Accept, Authorization, Content-Type and
 * Content-Length have already been computed.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array;

  /** Milliseconds; undefined = transport default */
  timeoutMs?: number;

  /** undefined = protocol default */
  cachePolicy?: CachePolicy;

  /** When false the transport must return 3xx responses instead of following them */
  followRedirects: boolean;

  /**
   * Advisory network policy. Server-side transports generally have no
   * notion of cellular links or foreground priority and may ignore these.
   */
  allowsCellularAccess: boolean;
  userInitiated: boolean;
}

/**
 * Response metadata passed to classifiers, parse stages and result handlers
 */
export interface HttpResponseInfo {
  /** Final URL (after any redirects the transport followed) */
  url: string;
  status: number;
  statusText?: string;
  headers: HeaderFields;
}

/**
 * Raw response returned by a transport
 */
export interface TransportResponse extends HttpResponseInfo {
  body: Uint8Array;
}

/**
 * Transport
 * Performs the network operation for a finalized request.
 *
 * Implementations resolve with any HTTP status (classification is not their
 * job) and reject only on transport-level failures: connection errors,
 * timeouts, aborts.
 */
export interface Transport {
  send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
}

/**
 * CredentialStore
 * Supplies a credential for requests that do not carry one.
 * A credential always replaces a caller-supplied Authorization header.
 */
export interface CredentialStore {
  credentialFor(url: URL): Credential | undefined | Promise<Credential | undefined>;
}
