import { toError } from '../errors/index.js';
import type { HttpResponseInfo } from '../interfaces/transport.js';
import { decodeJson, type JsonParseOptions, type JsonValue } from './json.js';

/**
 * Transform applied to the previous stage's value.
 * Returning undefined/null is a successful empty value; throwing fails the task.
 */
export type ParseHandler<In, Out> = (response: HttpResponseInfo, value: In) => Out | Promise<Out>;

export type StageOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'error'; error: Error }
  | { kind: 'canceled' };

class StageCanceled extends Error {
  constructor() {
    super('parse chain canceled');
    Object.setPrototypeOf(this, StageCanceled.prototype);
    this.name = 'StageCanceled';
  }
}

/** Cancellation probe consulted before each stage */
type CancellationProbe = () => boolean;

type StageRunner<T> = (response: HttpResponseInfo, body: Uint8Array, isCanceled: CancellationProbe) => Promise<T>;

/**
 * ParseStage
 * A chain of transforms from raw response bytes to a typed value.
 *
 * Stages run once each, in the order they were added. The first failure
 * short-circuits the rest. The cancellation probe is checked before every
 * stage; once it reports true no further stage is invoked.
 */
export class ParseStage<T> {
  private constructor(
    private readonly runner: StageRunner<T>,
    /** Number of transforms after the raw source */
    readonly length: number
  ) {}

  /** The raw-bytes source: yields the response body unchanged */
  static raw(): ParseStage<Uint8Array> {
    return new ParseStage<Uint8Array>(async (_response, body) => body, 0);
  }

  /** Append a transform */
  map<U>(handler: ParseHandler<T, U>): ParseStage<U> {
    const previous = this.runner;
    return new ParseStage<U>(async (response, body, isCanceled) => {
      const value = await previous(response, body, isCanceled);
      if (isCanceled()) throw new StageCanceled();
      return handler(response, value);
    }, this.length + 1);
  }

  /**
   * Run the chain.
   * Never throws: failures and cancellation come back as outcomes.
   */
  async execute(response: HttpResponseInfo, body: Uint8Array, isCanceled: CancellationProbe): Promise<StageOutcome<T>> {
    try {
      const value = await this.runner(response, body, isCanceled);
      if (isCanceled()) return { kind: 'canceled' };
      return { kind: 'value', value };
    } catch (err) {
      if (err instanceof StageCanceled) return { kind: 'canceled' };
      return { kind: 'error', error: toError(err) };
    }
  }
}

/** JSON decoding transform for a bytes stage */
export function jsonHandler(options: JsonParseOptions = {}): ParseHandler<Uint8Array, JsonValue> {
  return (_response, body) => decodeJson(body, options);
}
