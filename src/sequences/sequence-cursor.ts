/**
 * Cursor over the indices of a file sequence.
 *
 * Holds its own position, so any number of cursors may walk the same
 * sequence at once. The upper bound is read on every step: an upper bound
 * extended mid-iteration is picked up.
 */
export class SequenceCursor implements IterableIterator<string> {
  private index: number;

  constructor(
    start: number,
    private readonly upperBound: () => number,
    private readonly format: (index: number) => string,
  ) {
    this.index = start;
  }

  /** Index the next call to `next()` will produce. */
  get position(): number {
    return this.index;
  }

  next(): IteratorResult<string> {
    if (this.index > this.upperBound()) {
      return { done: true, value: undefined };
    }
    const value = this.format(this.index);
    this.index++;
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
