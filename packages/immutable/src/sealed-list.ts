/**
 * Sealed containers
 *
 * A ListBuilder collects elements, then seal() hands out a SealedList and
 * closes the builder for good. SealedList and SealedMap have no mutating
 * members at all; their backing storage is a private copy.
 */

import { ImmutabilityError } from './errors.js';

export class SealedList<T> implements Iterable<T> {
  private readonly items: readonly T[];

  constructor(items: Iterable<T> = []) {
    this.items = Object.freeze([...items]);
    Object.freeze(this);
  }

  static of<T>(...items: T[]): SealedList<T> {
    return new SealedList(items);
  }

  get length(): number {
    return this.items.length;
  }

  get first(): T | undefined {
    return this.items[0];
  }

  get last(): T | undefined {
    return this.items[this.items.length - 1];
  }

  /** Element at `index`; negative indices count from the end */
  at(index: number): T | undefined {
    return this.items.at(index);
  }

  /**
   * Element at `index`, failing when out of range
   */
  get(index: number): T {
    if (index < 0 || index >= this.items.length) {
      throw new RangeError(`index ${index} out of range for sealed list of length ${this.items.length}`);
    }
    return this.items[index];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  includes(item: T): boolean {
    return this.items.includes(item);
  }

  some(predicate: (item: T, index: number) => boolean): boolean {
    return this.items.some(predicate);
  }

  every(predicate: (item: T, index: number) => boolean): boolean {
    return this.items.every(predicate);
  }

  find(predicate: (item: T, index: number) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  map<U>(fn: (item: T, index: number) => U): U[] {
    return this.items.map(fn);
  }

  forEach(fn: (item: T, index: number) => void): void {
    this.items.forEach(fn);
  }

  /** Mutable copy */
  toArray(): T[] {
    return [...this.items];
  }
}

export class ListBuilder<T> {
  private readonly items: T[] = [];
  private sealed = false;

  constructor(items: Iterable<T> = []) {
    this.items.push(...items);
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get length(): number {
    return this.items.length;
  }

  push(...items: T[]): this {
    this.ensureOpen('push');
    this.items.push(...items);
    return this;
  }

  insert(index: number, item: T): this {
    this.ensureOpen('insert');
    if (index < 0 || index > this.items.length) {
      throw new RangeError(`cannot insert at ${index} into a list of length ${this.items.length}`);
    }
    this.items.splice(index, 0, item);
    return this;
  }

  /** Remove the first occurrence of `item`; false when absent */
  remove(item: T): boolean {
    this.ensureOpen('remove');
    const at = this.items.indexOf(item);
    if (at < 0) return false;
    this.items.splice(at, 1);
    return true;
  }

  removeAt(index: number): T {
    this.ensureOpen('removeAt');
    if (index < 0 || index >= this.items.length) {
      throw new RangeError(`index ${index} out of range for list of length ${this.items.length}`);
    }
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  clear(): void {
    this.ensureOpen('clear');
    this.items.length = 0;
  }

  seal(): SealedList<T> {
    this.ensureOpen('seal');
    this.sealed = true;
    return new SealedList(this.items);
  }

  private ensureOpen(operation: string): void {
    if (this.sealed) {
      throw new ImmutabilityError(`cannot ${operation}: list is sealed`);
    }
  }
}

/**
 * Read-only ordered map, used for attribute dictionaries of immutable operations
 */
export class SealedMap<K, V> implements ReadonlyMap<K, V> {
  private readonly entryMap: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]> = []) {
    this.entryMap = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.entryMap.size;
  }

  get(key: K): V | undefined {
    return this.entryMap.get(key);
  }

  has(key: K): boolean {
    return this.entryMap.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.entryMap.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries() {
    return this.entryMap.entries();
  }

  keys() {
    return this.entryMap.keys();
  }

  values() {
    return this.entryMap.values();
  }

  [Symbol.iterator]() {
    return this.entryMap[Symbol.iterator]();
  }
}
