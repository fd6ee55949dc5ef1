import { JsonDecodeError } from '../errors/index.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface JsonParseOptions {
  /**
   * Drop `null` object members and array elements, recursively.
   * A top-level `null` is always returned as `null`.
   * Default: false
   */
  omitNulls?: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a UTF-8 JSON body.
 * @throws JsonDecodeError if the bytes are not UTF-8 or not valid JSON
 */
export function decodeJson(body: Uint8Array, options: JsonParseOptions = {}): JsonValue {
  let text: string;
  try {
    text = utf8.decode(body);
  } catch (err) {
    throw new JsonDecodeError('Response body is not valid UTF-8', err);
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new JsonDecodeError(`Response body is not valid JSON: ${reason}`, err);
  }

  if (!options.omitNulls) return parsed;
  return stripNulls(parsed) ?? null;
}

/**
 * Remove nulls from a JSON value. Returns `undefined` when the value itself is null.
 */
export function stripNulls(value: JsonValue): JsonValue | undefined {
  if (value === null) return undefined;
  if (Array.isArray(value)) {
    const out: JsonValue[] = [];
    for (const item of value) {
      const stripped = stripNulls(item);
      if (stripped !== undefined) out.push(stripped);
    }
    return out;
  }
  if (typeof value === 'object') {
    const members: Array<[string, JsonValue]> = [];
    for (const [key, member] of Object.entries(value)) {
      const stripped = stripNulls(member);
      if (stripped !== undefined) members.push([key, stripped]);
    }
    // fromEntries defines own properties, so a "__proto__" key stays data
    return Object.fromEntries(members);
  }
  return value;
}

/** Encode a JSON request body */
export function encodeJson(value: JsonValue): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}
