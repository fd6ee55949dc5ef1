import { randomUUID } from 'node:crypto';
import type { Logger } from '../interfaces/logger.js';
import { silentLogger } from '../interfaces/logger.js';
import type { RequestDescriptor } from '../request/request-descriptor.js';
import { canceled, type TaskResult } from '../result/task-result.js';
import { errorToLog } from '../utils/logging.js';

export type TaskState = 'pending' | 'succeeded' | 'failed' | 'canceled';

export type CompletionHandler<T> = (task: Task<T>, result: TaskResult<T>) => void;

/**
 * Where the completion handler runs.
 *
 * - 'inline': on the continuation that settled the task (default)
 * - 'microtask': queued with queueMicrotask
 * - 'macrotask': queued with setImmediate
 * - a function: receives the delivery callback and runs it wherever it likes
 */
export type CompletionExecutor = 'inline' | 'microtask' | 'macrotask' | ((deliver: () => void) => void);

/**
 * Capabilities handed to the code that drives a task
 */
export interface TaskControl<T> {
  readonly signal: AbortSignal;
  readonly taskId: string;
  isCanceled(): boolean;
  /**
   * Move the task to its terminal state.
   * Returns false if the task was already terminal; the result is dropped.
   */
  settle(result: TaskResult<T>): boolean;
}

export interface TaskOptions<T> {
  /** Snapshot of the request this task performs */
  request: RequestDescriptor;
  handler: CompletionHandler<T>;
  executor?: CompletionExecutor;
  logger?: Logger;
}

function schedule(executor: CompletionExecutor, deliver: () => void): void {
  switch (executor) {
    case 'inline':
      deliver();
      return;
    case 'microtask':
      queueMicrotask(deliver);
      return;
    case 'macrotask':
      setImmediate(deliver);
      return;
    default:
      executor(deliver);
  }
}

function stateFor(result: TaskResult<unknown>): TaskState {
  switch (result.kind) {
    case 'success':
      return 'succeeded';
    case 'error':
      return 'failed';
    case 'canceled':
      return 'canceled';
  }
}

/**
 * Task
 * Handle for one in-flight request.
 *
 * The state moves from 'pending' to exactly one terminal state. Whichever of
 * natural completion or cancel() gets there first wins; the completion
 * handler is invoked once with that result.
 */
export class Task<T> {
  readonly id: string = randomUUID();

  /** Resolves with the terminal result; never rejects */
  readonly completion: Promise<TaskResult<T>>;

  private readonly snapshot: RequestDescriptor;
  private state_: TaskState = 'pending';
  private result_?: TaskResult<T>;
  private readonly controller = new AbortController();
  private readonly handler: CompletionHandler<T>;
  private readonly executor: CompletionExecutor;
  private readonly logger: Logger;
  private readonly resolveCompletion: (result: TaskResult<T>) => void;

  constructor(options: TaskOptions<T>, start: (control: TaskControl<T>) => void) {
    this.snapshot = options.request;
    this.handler = options.handler;
    this.executor = options.executor ?? 'inline';
    this.logger = options.logger ?? silentLogger;

    let resolve: (result: TaskResult<T>) => void = () => undefined;
    this.completion = new Promise<TaskResult<T>>((r) => {
      resolve = r;
    });
    this.resolveCompletion = resolve;

    start({
      signal: this.controller.signal,
      taskId: this.id,
      isCanceled: () => this.state_ === 'canceled',
      settle: (result) => this.settle(result),
    });
  }

  /** Copy of the request this task performs; editing it does not affect the task */
  get request(): RequestDescriptor {
    return this.snapshot.clone();
  }

  get state(): TaskState {
    return this.state_;
  }

  get isCanceled(): boolean {
    return this.state_ === 'canceled';
  }

  get isFinished(): boolean {
    return this.state_ !== 'pending';
  }

  /** Terminal result, once there is one */
  get result(): TaskResult<T> | undefined {
    return this.result_;
  }

  /**
   * Cancel the task. No-op once the task is terminal.
   * The in-flight transport call is aborted; network I/O already under way
   * may still run to completion, but its result is discarded.
   */
  cancel(): void {
    if (this.settle(canceled())) {
      this.controller.abort();
    }
  }

  private settle(result: TaskResult<T>): boolean {
    if (this.state_ !== 'pending') return false;
    this.state_ = stateFor(result);
    this.result_ = result;
    this.resolveCompletion(result);
    schedule(this.executor, () => this.deliver(result));
    return true;
  }

  private deliver(result: TaskResult<T>): void {
    try {
      this.handler(this, result);
    } catch (err) {
      this.logger.error('completion handler threw', { taskId: this.id, error: errorToLog(err) });
    }
  }
}
