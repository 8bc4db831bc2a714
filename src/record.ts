import { FieldTypeError } from "./errors.js";
import { kindOf, setField, valueToText, type FeedMap, type FeedValue } from "./feedValue.js";

interface Entry {
  key: string;
  value: FeedValue;
}

/**
 * One product record. Keys are folded to lower case once at construction; among keys that differ only
 * by case the first one in iteration order wins. Records are never mutated after construction.
 */
export class FeedRecord {
  private readonly byField: ReadonlyMap<string, Entry>;
  private readonly ordered: readonly Entry[];

  constructor(entries: Iterable<readonly [string, FeedValue]>) {
    const byField = new Map<string, Entry>();
    const ordered: Entry[] = [];
    for (const [key, value] of entries) {
      const entry = { key, value };
      ordered.push(entry);
      const folded = key.toLowerCase();
      if (!byField.has(folded)) byField.set(folded, entry);
    }
    this.byField = byField;
    this.ordered = ordered;
  }

  static fromMap(map: FeedMap): FeedRecord {
    return new FeedRecord(Object.entries(map));
  }

  get size(): number {
    return this.ordered.length;
  }

  get(field: string): FeedValue | undefined {
    return this.byField.get(field.toLowerCase())?.value;
  }

  /** Present means set to something other than null or the empty string. */
  has(field: string): boolean {
    const v = this.get(field);
    return v !== undefined && v !== null && v !== "";
  }

  /**
   * Scalar field as text; `undefined` when absent or empty.
   * Throws `FieldTypeError` for lists and maps.
   */
  text(field: string): string | undefined {
    const v = this.get(field);
    if (v === undefined || v === null || v === "") return undefined;
    if (typeof v === "object") throw new FieldTypeError(field, kindOf(v));
    return valueToText(v);
  }

  /** First present field among aliases, e.g. `weight` then `shipping_weight`. */
  firstPresent(...fields: string[]): { field: string; value: FeedValue } | undefined {
    for (const field of fields) {
      const value = this.get(field);
      if (value !== undefined && value !== null && value !== "") return { field, value };
    }
    return undefined;
  }

  keys(): string[] {
    return this.ordered.map((e) => e.key);
  }

  toObject(): FeedMap {
    const out: FeedMap = {};
    for (const { key, value } of this.ordered) {
      if (!Object.hasOwn(out, key)) setField(out, key, value);
    }
    return out;
  }
}
