/**
 * Re-iterable lazy sequence of integers in [start, end).
 * Unlike a generator object, it can be read more than once.
 */
export function lazyRange(start: number, end: number): Iterable<number> {
  return {
    *[Symbol.iterator]() {
      for (let i = start; i < end; i++) {
        yield i;
      }
    },
  };
}

export function lazyMap<T, U>(source: Iterable<T>, fn: (item: T) => U): Iterable<U> {
  return {
    *[Symbol.iterator]() {
      for (const item of source) {
        yield fn(item);
      }
    },
  };
}
