import { classifyResponse } from '../classification/response-classifier.js';
import { ApiError, TransportError } from '../errors/index.js';
import type { HeaderFields } from '../headers/header-fields.js';
import type { Logger } from '../interfaces/logger.js';
import type { CredentialStore, HttpResponseInfo, Transport, TransportResponse } from '../interfaces/transport.js';
import type { ParseStage } from '../parse/parse-stage.js';
import { prepareTransportRequest } from '../request/prepare-request.js';
import type { RequestDescriptor } from '../request/request-descriptor.js';
import { failure, success } from '../result/task-result.js';
import type { LoggingOptions } from '../utils/logging-helpers.js';
import { valueForLog } from '../utils/logging-helpers.js';
import { errorToLog } from '../utils/logging.js';
import type { TaskControl } from './task.js';

/**
 * How a request turns a response into its value
 */
export interface ResponsePlan<T> {
  stage: ParseStage<T>;
  expectedContentTypes: readonly string[];
  /** True when a parse chain consumes the body (anything beyond raw bytes) */
  expectsEntity: boolean;
  /** Present when 204 No Content is acceptable; holds the value to deliver */
  noContent?: { value: T };
}

/**
 * Collaborators shared by every task of a manager
 */
export interface TaskEnvironment {
  transport: Transport;
  credentialStore?: CredentialStore;
  defaultHeaders?: HeaderFields;
  defaultTimeoutMs?: number;
  logger: Logger;
  debug: boolean;
  debugFullBody: boolean;
  logging?: LoggingOptions;
}

function responseInfo(response: TransportResponse): HttpResponseInfo {
  return {
    url: response.url,
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  };
}

/**
 * Drive one task: finalize the request, send it, classify the response and
 * run the parse chain. Every path ends in at most one `control.settle` call;
 * settling after cancellation is a no-op.
 */
export async function runTask<T>(
  snapshot: RequestDescriptor,
  plan: ResponsePlan<T>,
  env: TaskEnvironment,
  control: TaskControl<T>
): Promise<void> {
  const { logger } = env;
  const taskId = control.taskId;

  const credential = snapshot.credential ?? (await env.credentialStore?.credentialFor(snapshot.resolvedUrl()));
  if (control.isCanceled()) return;

  const request = prepareTransportRequest(snapshot, {
    defaultHeaders: env.defaultHeaders,
    expectedContentTypes: plan.expectedContentTypes,
    credential,
    defaultTimeoutMs: env.defaultTimeoutMs,
  });

  let response: TransportResponse;
  try {
    response = await env.transport.send(request, control.signal);
  } catch (err) {
    if (control.isCanceled()) {
      if (env.debug) logger.debug('transport aborted after cancel', { taskId });
      return;
    }
    const error = TransportError.from(err);
    if (env.debug) logger.debug('error', { taskId, error: errorToLog(error) });
    control.settle(failure(error));
    return;
  }

  if (control.isCanceled()) {
    if (env.debug) logger.debug('discarding response of canceled task', { taskId, status: response.status });
    return;
  }

  const info = responseInfo(response);
  const classification = classifyResponse(response, {
    expectsEntity: plan.expectsEntity,
    toleratesNoContent: plan.noContent !== undefined,
    followRedirects: request.followRedirects,
    expectedContentTypes: plan.expectedContentTypes,
  });

  switch (classification.kind) {
    case 'failure':
      if (env.debug) logger.debug('response rejected', { taskId, error: errorToLog(classification.error) });
      control.settle(failure(classification.error, info));
      return;

    case 'success-no-content':
      control.settle(
        plan.noContent ? success(info, plan.noContent.value) : failure(ApiError.unexpectedNoContent(), info)
      );
      return;

    case 'success-with-body':
    case 'redirect-without-body-expected': {
      const outcome = await plan.stage.execute(info, classification.body, control.isCanceled);
      switch (outcome.kind) {
        case 'canceled':
          return;
        case 'error':
          if (env.debug) logger.debug('parse failed', { taskId, error: errorToLog(outcome.error) });
          control.settle(failure(outcome.error, info));
          return;
        case 'value':
          if (env.debug && env.debugFullBody) {
            logger.debug('parsed', { taskId, value: valueForLog(outcome.value, env.logging) });
          }
          control.settle(success(info, outcome.value));
          return;
      }
    }
  }
}
