/**
 * Content negotiation
 * Builds the Accept header from the expected media types and checks the
 * response's Content-Type against the same list.
 */

export interface MediaType {
  /** "type/subtype", lowercased */
  essence: string;
  /** Parameters as written, in order (names lowercased) */
  parameters: Array<[string, string]>;
}

export type ContentTypeValidation =
  | { kind: 'matched' }
  | { kind: 'mismatched'; contentType: string; body: Uint8Array };

/**
 * Parse a media type such as `application/json; charset=utf-8`.
 * Returns undefined for an empty string.
 */
export function parseMediaType(input: string): MediaType | undefined {
  const [head = '', ...rest] = input.split(';');
  const essence = head.trim().toLowerCase();
  if (!essence) return undefined;

  const parameters: Array<[string, string]> = [];
  for (const part of rest) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim().toLowerCase();
    let value = part.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (name) parameters.push([name, value]);
  }
  return { essence, parameters };
}

/**
 * Accept header for the expected media types, in priority order.
 * Each entry is used verbatim (parameters included). Returns undefined for
 * an empty list so the transport default applies.
 */
export function buildAcceptHeader(expectedTypes: readonly string[]): string | undefined {
  const entries = expectedTypes.map((t) => t.trim()).filter((t) => t.length > 0);
  return entries.length > 0 ? entries.join(', ') : undefined;
}

/**
 * Check a response Content-Type against the expected media types.
 *
 * - no expected types: matched
 * - missing or empty Content-Type: matched
 * - otherwise the base media types are compared case-insensitively,
 *   parameters ignored on both sides
 *
 * Callers skip this for 204 responses.
 */
export function validateContentType(
  contentType: string | undefined,
  expectedTypes: readonly string[],
  body: Uint8Array
): ContentTypeValidation {
  if (expectedTypes.length === 0) return { kind: 'matched' };
  if (contentType === undefined) return { kind: 'matched' };

  const actual = parseMediaType(contentType);
  if (!actual) return { kind: 'matched' };

  const matched = expectedTypes.some((expected) => parseMediaType(expected)?.essence === actual.essence);
  return matched ? { kind: 'matched' } : { kind: 'mismatched', contentType, body };
}
