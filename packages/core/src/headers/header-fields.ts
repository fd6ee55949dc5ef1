/**
 * HeaderFields
 * Case-insensitive HTTP header map.
 *
 * Field names are matched case-insensitively. The casing stored for a field is
 * the casing it was first seen with; later `set`/`add` calls keep that casing.
 * Iteration follows insertion order so serialized headers are deterministic.
 */

/** Delimiter used to join repeated values of a list-valued field */
export const HEADER_VALUE_DELIMITER = ', ';

interface HeaderEntry {
  name: string;
  value: string;
}

export type HeaderInit =
  | HeaderFields
  | Record<string, string | readonly string[] | undefined>
  | Iterable<readonly [string, string]>;

export class HeaderFields implements Iterable<[string, string]> {
  private readonly entries_ = new Map<string, HeaderEntry>();

  constructor(init?: HeaderInit) {
    if (init) this.merge(init);
  }

  /**
   * Build a header set from a plain record, an iterable of pairs or another set.
   * Array values are added one by one, so they end up delimiter-joined.
   */
  static from(init?: HeaderInit): HeaderFields {
    return new HeaderFields(init);
  }

  get size(): number {
    return this.entries_.size;
  }

  /**
   * Append a value to a field.
   * If the field already has a value the new one is joined with ", ".
   */
  add(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entries_.get(key);
    if (existing) {
      existing.value = `${existing.value}${HEADER_VALUE_DELIMITER}${value}`;
    } else {
      this.entries_.set(key, { name, value });
    }
    return this;
  }

  /** Replace a field's value unconditionally */
  set(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entries_.get(key);
    if (existing) {
      existing.value = value;
    } else {
      this.entries_.set(key, { name, value });
    }
    return this;
  }

  get(name: string): string | undefined {
    return this.entries_.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.entries_.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    return this.entries_.delete(name.toLowerCase());
  }

  /**
   * Merge another header source into this one.
   * Plain values replace existing fields; array values replace the field
   * with all of their items joined.
   */
  merge(init: HeaderInit): this {
    if (init instanceof HeaderFields) {
      for (const [name, value] of init) this.set(name, value);
      return this;
    }
    if (isPairIterable(init)) {
      for (const [name, value] of init) this.set(name, value);
      return this;
    }
    for (const [name, value] of Object.entries(init)) {
      if (value === undefined) continue;
      if (typeof value === 'string') {
        this.set(name, value);
        continue;
      }
      if (value.length === 0) {
        this.delete(name);
        continue;
      }
      // set keeps the casing the field was first seen with
      value.forEach((item, index) => (index === 0 ? this.set(name, item) : this.add(name, item)));
    }
    return this;
  }

  clone(): HeaderFields {
    return new HeaderFields(this);
  }

  /** Ordered dictionary of canonical field names to values */
  toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const { name, value } of this.entries_.values()) out[name] = value;
    return out;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const { name, value } of this.entries_.values()) yield [name, value];
  }
}

function isPairIterable(init: HeaderInit): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}
