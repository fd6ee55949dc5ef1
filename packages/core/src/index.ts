// Manager and request builders
export { ApiManager } from './manager/api-manager.js';
export type { RequestOptions } from './manager/api-manager.js';
export { ApiManagerSettingsSchema, resolveApiManagerOptions } from './manager/config.js';
export type { ApiManagerOptions, ApiManagerSettings, ResolvedApiManagerOptions } from './manager/config.js';
export { ApiRequest, ApiDeleteRequest, JSON_CONTENT_TYPES } from './request/api-request.js';
export type { PerformOptions, RequestPerformer } from './request/api-request.js';

// Request model
export {
  RequestDescriptor,
  HTTP_METHODS,
  jsonBody,
  formBody,
  dataBody,
  toQueryItems,
} from './request/request-descriptor.js';
export type {
  CachePolicy,
  Credential,
  HttpMethod,
  QueryInit,
  QueryItem,
  RequestBody,
  RequestDescriptorInit,
} from './request/request-descriptor.js';
export { prepareTransportRequest, encodeBody, authorizationFor } from './request/prepare-request.js';
export type { PrepareOptions } from './request/prepare-request.js';
export { HeaderFields, HEADER_VALUE_DELIMITER } from './headers/header-fields.js';
export type { HeaderInit } from './headers/header-fields.js';

// Response handling
export { parseMediaType, buildAcceptHeader, validateContentType } from './negotiation/content-negotiator.js';
export type { MediaType, ContentTypeValidation } from './negotiation/content-negotiator.js';
export { classifyResponse } from './classification/response-classifier.js';
export type { EntityExpectation, ResponseClassification } from './classification/response-classifier.js';
export { ParseStage, jsonHandler } from './parse/parse-stage.js';
export type { ParseHandler, StageOutcome } from './parse/parse-stage.js';
export { decodeJson, encodeJson, stripNulls } from './parse/json.js';
export type { JsonObject, JsonParseOptions, JsonPrimitive, JsonValue } from './parse/json.js';

// Tasks and results
export { Task } from './task/task.js';
export type { CompletionExecutor, CompletionHandler, TaskControl, TaskOptions, TaskState } from './task/task.js';
export { runTask } from './task/run-task.js';
export type { ResponsePlan, TaskEnvironment } from './task/run-task.js';
export {
  success,
  failure,
  canceled,
  isSuccess,
  isError,
  isCanceled,
  resultValue,
  resultError,
  resultResponse,
  matchResult,
  mapResult,
} from './result/task-result.js';
export type {
  TaskResult,
  SuccessResult,
  ErrorResult,
  CanceledResult,
  ResultMatcher,
} from './result/task-result.js';

// Errors
export {
  ApiError,
  TransportError,
  JsonDecodeError,
  ValidationError,
  statusText,
  toError,
} from './errors/index.js';
export type { ApiErrorDetail, ApiErrorKind } from './errors/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Transports (convenience exports)
export { createAxiosTransport } from './http/axios-transport.js';
export type { AxiosTransportOptions } from './http/axios-transport.js';
export { createFetchTransport } from './http/fetch-transport.js';
export type { FetchTransportOptions } from './http/fetch-transport.js';

// Utilities
export * from './utils/index.js';
