/**
 * Generic ordered container of elements.
 *
 * Base for AttributeContainer and DataRecords. Subclasses decide which
 * elements are admissible by overriding `validate()`; every bulk insert
 * validates the whole batch before touching the container.
 *
 * @module containers/data-container
 */

import { IndexOutOfBoundsError } from '../errors.js';

export abstract class DataContainer<T> implements Iterable<T> {
  protected elements: T[] = [];

  constructor(elements: Iterable<T> = []) {
    this.elements = Array.from(elements);
  }

  get size(): number {
    return this.elements.length;
  }

  get isEmpty(): boolean {
    return this.elements.length === 0;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.elements[Symbol.iterator]();
  }

  /**
   * Element at `index`.
   *
   * @throws {IndexOutOfBoundsError} if there is no element at `index`
   */
  at(index: number): T {
    this.checkIndex(index);
    return this.elements[index];
  }

  /** Shallow copy of the elements, in order. */
  toArray(): T[] {
    return this.elements.slice();
  }

  /**
   * Hook run on every element before it is inserted. Throws to reject.
   */
  protected validate(_element: T): void {}

  add(element: T): void {
    this.validate(element);
    this.elements.push(element);
  }

  /**
   * Append every element of `elements`. Nothing is appended if any
   * element is rejected.
   */
  addAll(elements: Iterable<T>): void {
    const batch = Array.from(elements);
    for (const element of batch) {
      this.validate(element);
    }
    this.elements.push(...batch);
  }

  addContainer(other: DataContainer<T>): void {
    this.addAll(other.elements);
  }

  /**
   * Keep only the elements for which `predicate` holds, in order.
   *
   * @returns the number of elements left
   */
  filter(predicate: (element: T, index: number) => boolean): number {
    this.elements = this.elements.filter(predicate);
    return this.elements.length;
  }

  /**
   * Keep only the elements at the given positions. Relative order is
   * preserved and repeated positions are kept once.
   *
   * @throws {IndexOutOfBoundsError} if any position is out of range
   */
  keepIndices(indices: Iterable<number>): number {
    const keep = new Set(indices);
    for (const index of keep) {
      this.checkIndex(index);
    }
    return this.filter((_element, index) => keep.has(index));
  }

  clear(): void {
    this.elements = [];
  }

  /**
   * Elements at the given positions, in the given order (repeats allowed).
   *
   * @throws {IndexOutOfBoundsError} if any position is out of range
   */
  protected pickIndices(indices: readonly number[]): T[] {
    for (const index of indices) {
      this.checkIndex(index);
    }
    return indices.map((index) => this.elements[index]);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.elements.length) {
      throw new IndexOutOfBoundsError(index, 0, this.elements.length - 1);
    }
  }
}
