export interface Delimited<T> {
  value: T;
  isFirst: boolean;
  isLast: boolean;
}

/** Yields each item of `items` tagged with its position in the sequence. */
export function* delimited<T>(items: readonly T[]): Generator<Delimited<T>> {
  const last = items.length - 1;
  for (const [i, value] of items.entries()) {
    yield { value, isFirst: i === 0, isLast: i === last };
  }
}
