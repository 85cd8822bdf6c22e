/**
 * Split a list into consecutive chunks of at most `size` items.
 *
 * @example
 * ```typescript
 * chunk(["1", "2", "3"], 2); // [["1", "2"], ["3"]]
 * ```
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`Chunk size must be a positive number, got ${size}.`);
  }

  const chunks: T[][] = [];

  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }

  return chunks;
}

/**
 * Drop `null` and `undefined` entries.
 */
export function compact<T>(items: (T | null | undefined)[]): T[] {
  return items.filter((item): item is T => item !== null && item !== undefined);
}

/**
 * Keep the first occurrence of every identity; items without an identity are
 * compared by reference.
 */
export function uniqueBy<T>(items: T[], identify: (item: T) => string | undefined): T[] {
  const seen = new Set<string>();
  const seenItems = new Set<T>();
  const result: T[] = [];

  for (const item of items) {
    const identity = identify(item);

    if (identity === undefined) {
      if (seenItems.has(item)) continue;
      seenItems.add(item);
    } else {
      if (seen.has(identity)) continue;
      seen.add(identity);
    }

    result.push(item);
  }

  return result;
}
