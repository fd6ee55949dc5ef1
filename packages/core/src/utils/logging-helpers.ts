/**
 * Logging helpers for response payloads
 *
 * Keep debug logs readable when responses are large: decoded values are
 * summarized or truncated according to LoggingOptions.
 */

/**
 * Logging options for controlling verbosity of response logging
 */
export interface LoggingOptions {
  /**
   * Maximum number of items to log in arrays
   * Set to 0 to skip the array contents entirely
   */
  maxArrayItems?: number;

  /**
   * Maximum depth for nested object logging
   * Set to 0 to log only the type/count
   */
  maxDepth?: number;

  /**
   * How parsed response values are logged when full-body debugging is on
   * false = not at all, true = truncated value, "summary" = shape only
   * Default: "summary"
   */
  logBody?: boolean | 'summary';
}

/**
 * Default logging options
 * Conservative defaults to avoid polluting logs with large responses
 */
export const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
  maxArrayItems: 10,
  maxDepth: 2,
  logBody: 'summary',
};

/**
 * Get merged logging options with defaults
 */
export function getLoggingOptions(options?: LoggingOptions): Required<LoggingOptions> {
  return {
    ...DEFAULT_LOGGING_OPTIONS,
    ...options,
  };
}

/**
 * Safely truncate a value for logging
 * Respects maxDepth and maxArrayItems
 */
export function truncateForLogging(
  value: unknown,
  options: Required<LoggingOptions>,
  currentDepth: number = 0
): unknown {
  if (value instanceof Uint8Array) {
    return `[Bytes: ${value.byteLength}]`;
  }

  // Check depth limit
  if (currentDepth >= options.maxDepth) {
    if (value === null || value === undefined) return value;
    if (Array.isArray(value)) {
      return `[Array: ${value.length} items]`;
    }
    if (typeof value === 'object') {
      return `[Object: ${Object.keys(value).length} keys]`;
    }
    return value;
  }

  // Handle arrays
  if (Array.isArray(value)) {
    if (options.maxArrayItems === 0) {
      return `[Array: ${value.length} items (truncated)]`;
    }

    const mapped = value
      .slice(0, options.maxArrayItems)
      .map((item: unknown) => truncateForLogging(item, options, currentDepth + 1));

    if (value.length > options.maxArrayItems) {
      return [...mapped, `... and ${value.length - options.maxArrayItems} more items`];
    }
    return mapped;
  }

  // Handle objects
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      result[key] = truncateForLogging(member, options, currentDepth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Create a summary of a parsed value
 * Returns shape info without the full payload
 */
export function summarizeValue(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return { type: String(value) };

  if (value instanceof Uint8Array) {
    return { type: 'bytes', byteLength: value.byteLength };
  }

  if (Array.isArray(value)) {
    const first: unknown = value[0];
    const keys = first !== null && typeof first === 'object' ? Object.keys(first) : [];
    return {
      type: 'array',
      count: value.length,
      itemKeys: keys.slice(0, 5), // Show first 5 keys as sample
      itemCount: keys.length,
    };
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return {
      type: 'object',
      keyCount: keys.length,
      keys: keys.slice(0, 10), // Show first 10 keys as sample
    };
  }

  return {
    type: typeof value,
    value: String(value).slice(0, 100), // Truncate to 100 chars
  };
}

/**
 * Render a parsed response value for a debug log entry
 * Returns undefined when the options say not to log it
 */
export function valueForLog(value: unknown, options?: LoggingOptions): unknown {
  const resolved = getLoggingOptions(options);
  if (resolved.logBody === false) return undefined;
  if (resolved.logBody === 'summary') return summarizeValue(value);
  return truncateForLogging(value, resolved);
}
