import { IncompleteExtractionError } from '../agents/errors';
import type { ExtractionTask, FieldName } from './types';

/** Null, blank strings and lists without a non-blank entry count as absent. */
export function hasValue(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.some((item) => hasValue(item));
  return true;
}

/**
 * Field state for one extraction. A field is written at most once: the
 * first response that supplies it wins and later responses cannot revise it.
 */
export class FieldTracker<T extends Record<string, unknown>> {
  private readonly state: Partial<T> = {};

  constructor(private readonly task: Pick<ExtractionTask<T>, 'name' | 'schema' | 'fields'>) {}

  private isSet(name: FieldName<T>): boolean {
    return hasValue(this.state[name]);
  }

  /** Required fields still unset. */
  missingFields(): FieldName<T>[] {
    return this.task.fields
      .filter((field) => field.required && !this.isSet(field.name))
      .map((field) => field.name);
  }

  /** Every unset field, optional ones included. */
  unsetFields(): FieldName<T>[] {
    return this.task.fields.filter((field) => !this.isSet(field.name)).map((field) => field.name);
  }

  filledFields(): FieldName<T>[] {
    return this.task.fields.filter((field) => this.isSet(field.name)).map((field) => field.name);
  }

  isComplete(): boolean {
    return this.missingFields().length === 0;
  }

  /** Stores non-empty values for unset fields; returns the names filled. */
  merge(response: Partial<T>): FieldName<T>[] {
    const filled: FieldName<T>[] = [];
    for (const name of this.unsetFields()) {
      const value = response[name];
      if (!hasValue(value)) continue;
      this.state[name] = value;
      filled.push(name);
    }
    return filled;
  }

  snapshot(): Partial<T> {
    return { ...this.state };
  }

  finalize(): T {
    const missing = this.missingFields();
    if (missing.length > 0) {
      throw new IncompleteExtractionError(this.task.name, missing);
    }
    return this.task.schema.parse(this.snapshot());
  }
}
