import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { Logger } from '../interfaces/logger.js';
import type { CredentialStore, Transport } from '../interfaces/transport.js';
import type { CompletionExecutor } from '../task/task.js';

/**
 * Zod schemas for runtime validation of manager options
 */

const LoggingOptionsSchema = z.object({
  maxArrayItems: z.number().int().nonnegative().optional(),
  maxDepth: z.number().int().nonnegative().optional(),
  logBody: z.union([z.boolean(), z.literal('summary')]).optional(),
});

export const ApiManagerSettingsSchema = z.object({
  /** Base URL that request paths are resolved against */
  baseUrl: z.string().url('baseUrl must be an absolute URL'),
  defaultTimeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
  acceptLanguage: z.string().min(1).optional(),
  defaultHeaders: z.record(z.string()).optional(),
  debug: z.boolean().optional(),
  debugFullBody: z.boolean().optional(),
  logging: LoggingOptionsSchema.optional(),
});

export type ApiManagerSettings = z.infer<typeof ApiManagerSettingsSchema>;

/**
 * Everything needed to construct an ApiManager: serializable settings plus
 * the injected collaborators.
 */
export interface ApiManagerOptions extends ApiManagerSettings {
  transport: Transport;
  logger?: Logger;
  credentialStore?: CredentialStore;
  /** Default executor for completion handlers */
  executor?: CompletionExecutor;
}

export interface ResolvedApiManagerOptions extends ApiManagerOptions {
  debug: boolean;
  debugFullBody: boolean;
}

/**
 * Validate settings and fill in debug flags from the environment.
 * HTTP_DEBUG=1 turns on request/response debug logs, HTTP_DEBUG_FULL=1 adds
 * parsed values. Explicit options win over the environment.
 *
 * @throws ValidationError listing the invalid settings
 */
export function resolveApiManagerOptions(
  options: ApiManagerOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedApiManagerOptions {
  const { transport, logger, credentialStore, executor, ...settings } = options;
  const parsed = ApiManagerSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new ValidationError('Invalid ApiManager options', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }

  return {
    ...parsed.data,
    transport,
    logger,
    credentialStore,
    executor,
    debug: parsed.data.debug ?? env.HTTP_DEBUG === '1',
    debugFullBody: parsed.data.debugFullBody ?? env.HTTP_DEBUG_FULL === '1',
  };
}
