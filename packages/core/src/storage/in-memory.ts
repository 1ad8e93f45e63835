/**
 * In-memory record store
 * @internal
 */

import type { ErrorCode, OperationResult } from '../types/public-api.js';
import { createServiceError, fail, notFound, ok } from '../utils/errors.js';

/**
 * Options for creating a store
 */
export interface InMemoryStoreOptions {
  /** Entity name used in error messages (default: 'Record') */
  entity?: string;
  /** Code returned when inserting an existing id (default: ALREADY_EXISTS) */
  duplicateCode?: ErrorCode;
}

/**
 * In-memory record store keyed by id
 *
 * Holds records by value: every read returns a deep clone and every write
 * stores one, so callers never share references with the store.
 *
 * Synchronous by design: on a single event loop `update()` is an atomic
 * read-modify-write, so no per-key lock is needed.
 *
 * @example
 * ```typescript
 * const store = new InMemoryStore<{ count: number }>({ entity: 'Counter' });
 * store.insert('a', { count: 0 });
 * store.update('a', c => ({ count: c.count + 1 }));
 * ```
 *
 * @internal
 */
export class InMemoryStore<T> {
  private records = new Map<string, T>();
  protected readonly entity: string;
  private readonly duplicateCode: ErrorCode;

  constructor(options?: InMemoryStoreOptions) {
    this.entity = options?.entity ?? 'Record';
    this.duplicateCode = options?.duplicateCode ?? 'ALREADY_EXISTS';
  }

  /**
   * Insert a new record. Fails with the store's duplicate code if the id
   * exists; the existing record is left untouched.
   */
  insert(id: string, value: T): OperationResult<T> {
    if (this.records.has(id)) {
      return fail(createServiceError(
        this.duplicateCode,
        `${this.entity} already exists: ${id}`,
        { id }
      ));
    }
    this.records.set(id, structuredClone(value));
    return ok(structuredClone(value));
  }

  get(id: string): OperationResult<T> {
    const value = this.records.get(id);
    if (value === undefined) return notFound(this.entity, id);
    // Return deep clone to prevent caller mutations from affecting stored data
    return ok(structuredClone(value));
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * Atomic read-modify-write of one record.
   *
   * The mutator receives a private copy and returns the next value; if it
   * throws, the stored record is unchanged.
   */
  update(id: string, mutator: (current: T) => T): OperationResult<T> {
    const current = this.records.get(id);
    if (current === undefined) return notFound(this.entity, id);

    const next = mutator(structuredClone(current));
    this.records.set(id, structuredClone(next));
    return ok(structuredClone(next));
  }

  /**
   * Delete a record. Idempotent.
   */
  remove(id: string): void {
    this.records.delete(id);
  }

  /**
   * All records in insertion order
   */
  list(): T[] {
    return Array.from(this.records.values(), value => structuredClone(value));
  }

  /**
   * Clear all entries (useful for testing)
   */
  clear(): void {
    this.records.clear();
  }

  size(): number {
    return this.records.size;
  }
}
