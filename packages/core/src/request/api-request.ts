import type { HeaderFields } from '../headers/header-fields.js';
import { jsonHandler, ParseStage, type ParseHandler } from '../parse/parse-stage.js';
import type { JsonParseOptions, JsonValue } from '../parse/json.js';
import type { TaskResult } from '../result/task-result.js';
import type { ResponsePlan } from '../task/run-task.js';
import type { CompletionExecutor, CompletionHandler, Task } from '../task/task.js';
import type { CachePolicy, Credential, HttpMethod, RequestDescriptor } from './request-descriptor.js';

export const JSON_CONTENT_TYPES: readonly string[] = ['application/json'];

export interface PerformOptions {
  /** Where the completion handler runs; defaults to the manager's executor */
  executor?: CompletionExecutor;
}

/**
 * Something that can start tasks (the ApiManager)
 */
export interface RequestPerformer {
  perform<T>(
    descriptor: RequestDescriptor,
    plan: ResponsePlan<T>,
    handler: CompletionHandler<T>,
    options?: PerformOptions
  ): Task<T>;
}

/**
 * Configuration shared by every request builder.
 * Setters forward to the wrapped descriptor.
 */
abstract class RequestBuilder<T> {
  protected constructor(
    protected readonly performer: RequestPerformer,
    readonly descriptor: RequestDescriptor,
    protected readonly stage: ParseStage<T>,
    expectedContentTypes: readonly string[]
  ) {
    this.expectedContentTypes = [...expectedContentTypes];
  }

  /**
   * Media types the response may have, in Accept priority order.
   * Used to generate Accept (unless a header is set explicitly) and to
   * validate the response Content-Type. Put a `q` parameter last.
   */
  expectedContentTypes: string[];

  get method(): HttpMethod {
    return this.descriptor.method;
  }

  get url(): URL {
    return this.descriptor.resolvedUrl();
  }

  get headerFields(): HeaderFields {
    return this.descriptor.headerFields;
  }

  /** Append a header value; an existing value is extended with ", " */
  addHeader(name: string, value: string): this {
    this.descriptor.headerFields.add(name, value);
    return this;
  }

  /** Replace a header value */
  setHeader(name: string, value: string): this {
    this.descriptor.headerFields.set(name, value);
    return this;
  }

  header(name: string): string | undefined {
    return this.descriptor.headerFields.get(name);
  }

  withTimeout(timeoutMs: number | undefined): this {
    this.descriptor.timeoutMs = timeoutMs;
    return this;
  }

  withCachePolicy(policy: CachePolicy | undefined): this {
    this.descriptor.cachePolicy = policy;
    return this;
  }

  withCredential(credential: Credential | undefined): this {
    this.descriptor.credential = credential;
    return this;
  }

  followRedirects(follow: boolean): this {
    this.descriptor.followRedirects = follow;
    return this;
  }

  allowCellularAccess(allow: boolean): this {
    this.descriptor.allowsCellularAccess = allow;
    return this;
  }

  userInitiated(userInitiated: boolean): this {
    this.descriptor.userInitiated = userInitiated;
    return this;
  }
}

/**
 * ApiRequest
 * A request whose successful result carries a `T`.
 *
 * Raw requests yield the body bytes. Each `parse*` call returns a new
 * request with a copy of this one's configuration and one more stage.
 * A parsed request rejects 204 No Content with `UnexpectedNoContent`.
 */
export class ApiRequest<T> extends RequestBuilder<T> {
  constructor(
    performer: RequestPerformer,
    descriptor: RequestDescriptor,
    stage: ParseStage<T>,
    expectedContentTypes: readonly string[] = []
  ) {
    super(performer, descriptor, stage, expectedContentTypes);
  }

  static raw(performer: RequestPerformer, descriptor: RequestDescriptor): ApiRequest<Uint8Array> {
    return new ApiRequest(performer, descriptor, ParseStage.raw());
  }

  /** Add a parse stage. Expected content types carry over unchanged. */
  parse<U>(handler: ParseHandler<T, U>): ApiRequest<U> {
    return new ApiRequest(this.performer, this.descriptor.clone(), this.stage.map(handler), this.expectedContentTypes);
  }

  /** Decode the body as JSON; expects `application/json` */
  parseAsJson(this: ApiRequest<Uint8Array>, options?: JsonParseOptions): ApiRequest<JsonValue> {
    return new ApiRequest(this.performer, this.descriptor.clone(), this.stage.map(jsonHandler(options)), JSON_CONTENT_TYPES);
  }

  /** Decode the body as JSON, then pass it through `handler` */
  parseAsJsonWith<U>(
    this: ApiRequest<Uint8Array>,
    handler: ParseHandler<JsonValue, U>,
    options?: JsonParseOptions
  ): ApiRequest<U> {
    return this.parseAsJson(options).parse(handler);
  }

  /**
   * Start the request. The handler is called exactly once.
   * Later changes to this builder do not affect the returned task.
   */
  perform(handler: CompletionHandler<T>, options?: PerformOptions): Task<T> {
    return this.performer.perform(
      this.descriptor,
      {
        stage: this.stage,
        expectedContentTypes: [...this.expectedContentTypes],
        expectsEntity: this.stage.length > 0,
      },
      handler,
      options
    );
  }

  /** Start the request and wait for its result */
  performAsync(options?: PerformOptions): Promise<TaskResult<T>> {
    return this.perform(() => undefined, options).completion;
  }
}

/**
 * ApiDeleteRequest
 * Like ApiRequest, but 204 No Content is a success with an undefined value,
 * for raw and parsed requests alike.
 */
export class ApiDeleteRequest<T> extends RequestBuilder<T> {
  constructor(
    performer: RequestPerformer,
    descriptor: RequestDescriptor,
    stage: ParseStage<T>,
    expectedContentTypes: readonly string[] = []
  ) {
    super(performer, descriptor, stage, expectedContentTypes);
  }

  static raw(performer: RequestPerformer, descriptor: RequestDescriptor): ApiDeleteRequest<Uint8Array> {
    return new ApiDeleteRequest(performer, descriptor, ParseStage.raw());
  }

  parse<U>(handler: ParseHandler<T, U>): ApiDeleteRequest<U> {
    return new ApiDeleteRequest(
      this.performer,
      this.descriptor.clone(),
      this.stage.map(handler),
      this.expectedContentTypes
    );
  }

  parseAsJson(this: ApiDeleteRequest<Uint8Array>, options?: JsonParseOptions): ApiDeleteRequest<JsonValue> {
    return new ApiDeleteRequest(
      this.performer,
      this.descriptor.clone(),
      this.stage.map(jsonHandler(options)),
      JSON_CONTENT_TYPES
    );
  }

  parseAsJsonWith<U>(
    this: ApiDeleteRequest<Uint8Array>,
    handler: ParseHandler<JsonValue, U>,
    options?: JsonParseOptions
  ): ApiDeleteRequest<U> {
    return this.parseAsJson(options).parse(handler);
  }

  perform(handler: CompletionHandler<T | undefined>, options?: PerformOptions): Task<T | undefined> {
    const plan: ResponsePlan<T | undefined> = {
      stage: this.stage,
      expectedContentTypes: [...this.expectedContentTypes],
      expectsEntity: this.stage.length > 0,
      noContent: { value: undefined },
    };
    return this.performer.perform(this.descriptor, plan, handler, options);
  }

  performAsync(options?: PerformOptions): Promise<TaskResult<T | undefined>> {
    return this.perform(() => undefined, options).completion;
  }
}
