/**
 * Keyed Store
 *
 * In-memory map of records addressed by tuple keys such as
 * [organization, account] or [proposal, voter]. Records hold ids of
 * other records, never references to them.
 */

import type { StagedWrites, UnitOfWork } from "./unit-of-work.js";

export type KeyPart = string | number;

const TOMBSTONE: unique symbol = Symbol("tombstone");

export function encodeKey(key: readonly KeyPart[]): string {
  return JSON.stringify(key);
}

export class KeyedStore<K extends readonly KeyPart[], V> implements StagedWrites {
  private readonly committed = new Map<string, V>();
  private readonly staged = new Map<string, V | typeof TOMBSTONE>();

  constructor(
    public readonly name: string,
    private readonly unitOfWork: UnitOfWork
  ) {}

  get(key: K): V | undefined {
    const encoded = encodeKey(key);
    if (this.staged.has(encoded)) {
      const value = this.staged.get(encoded);
      return value === TOMBSTONE ? undefined : value;
    }
    return this.committed.get(encoded);
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  put(key: K, value: V): void {
    this.unitOfWork.enlist(this);
    this.staged.set(encodeKey(key), value);
  }

  delete(key: K): void {
    this.unitOfWork.enlist(this);
    this.staged.set(encodeKey(key), TOMBSTONE);
  }

  /**
   * Current view, staged writes included. Insertion order of committed
   * records is kept; new staged records follow.
   */
  values(): V[] {
    const result: V[] = [];
    for (const [encoded, value] of this.committed) {
      if (this.staged.has(encoded)) {
        const staged = this.staged.get(encoded);
        if (staged !== TOMBSTONE && staged !== undefined) {
          result.push(staged);
        }
      } else {
        result.push(value);
      }
    }
    for (const [encoded, staged] of this.staged) {
      if (!this.committed.has(encoded) && staged !== TOMBSTONE) {
        result.push(staged);
      }
    }
    return result;
  }

  filter(predicate: (value: V) => boolean): V[] {
    return this.values().filter(predicate);
  }

  get size(): number {
    return this.values().length;
  }

  commitStaged(): void {
    for (const [encoded, value] of this.staged) {
      if (value === TOMBSTONE) {
        this.committed.delete(encoded);
      } else {
        this.committed.set(encoded, value);
      }
    }
    this.staged.clear();
  }

  discardStaged(): void {
    this.staged.clear();
  }
}
