/**
 * Field Store
 *
 * Typed container of provenance-tagged field values for one document kind.
 * Used for per-method partial records and for the merged record.
 */

import type {
  ExtractionMethod,
  FieldKey,
  FieldMap,
  FieldProvenance,
  FieldReader,
  FieldSink,
  FieldValue,
} from '../types';

/**
 * A value counts as empty when it carries no information: null, blank
 * strings, empty lists, or an object whose members are all empty.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.values(value).every(isEmptyValue);
  return false;
}

export class FieldStore<F> implements FieldReader<F> {
  private readonly fields: FieldMap<F> = {};

  get<P extends keyof F>(key: P): FieldValue<F[P]> | undefined {
    return this.fields[key];
  }

  value<P extends keyof F>(key: P): F[P] | undefined {
    return this.fields[key]?.value;
  }

  has(key: keyof F): boolean {
    const entry = this.fields[key];
    return entry !== undefined && !isEmptyValue(entry.value);
  }

  set<P extends keyof F>(key: P, entry: FieldValue<F[P]>): void {
    this.fields[key] = entry;
  }

  /**
   * Populated keys, in catalogue order.
   */
  populated(keys: ReadonlyArray<FieldKey<F>>): Array<FieldKey<F>> {
    return keys.filter((key) => this.has(key));
  }

  provenance(keys: ReadonlyArray<FieldKey<F>>): Record<string, FieldProvenance> {
    const out: Record<string, FieldProvenance> = {};
    for (const key of keys) {
      const entry = this.fields[key];
      if (entry !== undefined && !isEmptyValue(entry.value)) {
        out[key] = { source: entry.source, confidence: entry.confidence ?? null };
      }
    }
    return out;
  }

  /**
   * Plain key/value view of populated fields, for prompts and logs.
   */
  snapshot(keys: ReadonlyArray<FieldKey<F>>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const key of keys) {
      if (this.has(key)) out[key] = this.fields[key]?.value;
    }
    return out;
  }

  /**
   * Sink that writes values tagged with `source`. Empty values are dropped
   * and the first write to a key wins.
   */
  sink(source: ExtractionMethod): FieldSink<F> {
    return (key, value, confidence) => {
      if (value === null || value === undefined || isEmptyValue(value) || this.has(key)) {
        return;
      }
      this.set(key, confidence === undefined ? { value, source } : { value, source, confidence });
    };
  }
}
