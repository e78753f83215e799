/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * Lazy sequence that re-runs its source on every iteration, so the same
 * sequence can be walked any number of times and always reflects the current forest.
 */
export class RecordSequence<T> implements Iterable<T> {
  constructor(private readonly source: () => Iterable<T>) {}

  [Symbol.iterator](): Iterator<T> {
    return this.source()[Symbol.iterator]();
  }

  toArray(): T[] {
    return [...this];
  }

  first(): T | undefined {
    for (const item of this) return item;
    return undefined;
  }

  find(predicate: (item: T) => boolean): T | undefined {
    for (const item of this) if (predicate(item)) return item;
    return undefined;
  }

  filter(predicate: (item: T) => boolean): RecordSequence<T> {
    const source = this.source;
    return new RecordSequence(function* () {
      for (const item of source()) if (predicate(item)) yield item;
    });
  }

  map<U>(fn: (item: T) => U): RecordSequence<U> {
    const source = this.source;
    return new RecordSequence(function* () {
      for (const item of source()) yield fn(item);
    });
  }

  count(): number {
    let n = 0;
    for (const _item of this) n++;
    return n;
  }
}
