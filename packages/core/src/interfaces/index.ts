export type { Logger } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type {
  CredentialStore,
  HttpResponseInfo,
  Transport,
  TransportRequest,
  TransportResponse,
} from './transport.js';
