import { ValidationError, toError } from '../errors/index.js';
import { HeaderFields } from '../headers/header-fields.js';
import type { Logger } from '../interfaces/logger.js';
import { createConsoleLogger } from '../interfaces/logger.js';
import {
  ApiDeleteRequest,
  ApiRequest,
  type PerformOptions,
  type RequestPerformer,
} from '../request/api-request.js';
import {
  jsonBody,
  RequestDescriptor,
  type HttpMethod,
  type QueryInit,
  type RequestBody,
} from '../request/request-descriptor.js';
import type { JsonValue } from '../parse/json.js';
import { failure } from '../result/task-result.js';
import { runTask, type ResponsePlan, type TaskEnvironment } from '../task/run-task.js';
import { Task, type CompletionExecutor, type CompletionHandler } from '../task/task.js';
import { errorToLog } from '../utils/logging.js';
import { resolveApiManagerOptions, type ApiManagerOptions } from './config.js';

export interface RequestOptions {
  query?: QueryInit;
  body?: RequestBody;
}

/**
 * ApiManager
 * Entry point for building requests against one environment.
 *
 * Holds the base URL, transport, credential store, default headers and
 * logging setup. There is no shared default instance: construct one and
 * pass it where it is needed.
 *
 * Usage:
 * ```typescript
 * const api = new ApiManager({
 *   baseUrl: 'https://api.example.com/v1/',
 *   transport: createAxiosTransport(),
 * });
 *
 * const task = api
 *   .get('users/42')
 *   .parseAsJsonWith((_res, json) => UserSchema.parse(json))
 *   .perform((_task, result) => {
 *     if (result.kind === 'success') console.log(result.value.name);
 *   });
 * ```
 */
export class ApiManager implements RequestPerformer {
  readonly baseUrl: URL;
  readonly logger: Logger;

  private readonly env: TaskEnvironment;
  private readonly executor: CompletionExecutor;

  constructor(options: ApiManagerOptions) {
    const resolved = resolveApiManagerOptions(options);
    this.baseUrl = new URL(resolved.baseUrl);
    this.logger = resolved.logger ?? createConsoleLogger();
    this.executor = resolved.executor ?? 'inline';

    const defaultHeaders = new HeaderFields();
    if (resolved.userAgent) defaultHeaders.set('User-Agent', resolved.userAgent);
    if (resolved.acceptLanguage) defaultHeaders.set('Accept-Language', resolved.acceptLanguage);
    if (resolved.defaultHeaders) defaultHeaders.merge(resolved.defaultHeaders);

    this.env = {
      transport: resolved.transport,
      credentialStore: resolved.credentialStore,
      defaultHeaders,
      defaultTimeoutMs: resolved.defaultTimeoutMs,
      logger: this.logger,
      debug: resolved.debug,
      debugFullBody: resolved.debugFullBody,
      logging: resolved.logging,
    };
  }

  /**
   * Resolve a path against the base URL. Absolute URLs pass through.
   * @throws ValidationError if the result is not a valid URL
   */
  resolveUrl(path: string): URL {
    try {
      return new URL(path, this.baseUrl);
    } catch {
      throw new ValidationError(`Cannot resolve request path: ${path}`, { path, baseUrl: this.baseUrl.href });
    }
  }

  /** Build a descriptor for an arbitrary method */
  descriptor(method: HttpMethod, path: string, options: RequestOptions = {}): RequestDescriptor {
    return new RequestDescriptor({
      method,
      url: this.resolveUrl(path),
      query: options.query,
      body: options.body,
    });
  }

  request(method: HttpMethod, path: string, options?: RequestOptions): ApiRequest<Uint8Array> {
    return ApiRequest.raw(this, this.descriptor(method, path, options));
  }

  get(path: string, query?: QueryInit): ApiRequest<Uint8Array> {
    return this.request('GET', path, { query });
  }

  post(path: string, body?: RequestBody, query?: QueryInit): ApiRequest<Uint8Array> {
    return this.request('POST', path, { body, query });
  }

  /** POST with a JSON body */
  postJson(path: string, json: JsonValue, query?: QueryInit): ApiRequest<Uint8Array> {
    return this.request('POST', path, { body: jsonBody(json), query });
  }

  put(path: string, body?: RequestBody, query?: QueryInit): ApiRequest<Uint8Array> {
    return this.request('PUT', path, { body, query });
  }

  patch(path: string, body?: RequestBody, query?: QueryInit): ApiRequest<Uint8Array> {
    return this.request('PATCH', path, { body, query });
  }

  delete(path: string, query?: QueryInit): ApiDeleteRequest<Uint8Array> {
    return ApiDeleteRequest.raw(this, this.descriptor('DELETE', path, { query }));
  }

  /**
   * Start a task for a descriptor. The descriptor is copied first, so the
   * caller may keep editing it without affecting the task.
   */
  perform<T>(
    descriptor: RequestDescriptor,
    plan: ResponsePlan<T>,
    handler: CompletionHandler<T>,
    options: PerformOptions = {}
  ): Task<T> {
    const snapshot = descriptor.clone();
    return new Task<T>(
      {
        request: snapshot,
        handler,
        executor: options.executor ?? this.executor,
        logger: this.logger,
      },
      (control) => {
        runTask(snapshot, plan, this.env, control).catch((err: unknown) => {
          const error = toError(err);
          this.logger.error('task failed before a response arrived', { taskId: control.taskId, error: errorToLog(error) });
          control.settle(failure(error));
        });
      }
    );
  }
}
