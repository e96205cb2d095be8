/**
 * Helpers for the one-based index maps every builder level keeps.
 */

/**
 * Highest index a builder accepts at any level. Rendering fills every gap
 * below the highest index set.
 */
export const MAX_INDEX = 9999;

/**
 * @throws RangeError unless index is an integer in 1..MAX_INDEX
 */
export function assertIndex(index: number, what: string): void {
  if (!Number.isInteger(index) || index < 1 || index > MAX_INDEX) {
    throw new RangeError(`${what} index must be an integer from 1 to ${MAX_INDEX}, got ${index}`);
  }
}

export function maxIndex(entries: ReadonlyMap<number, unknown>): number {
  let max = 0;
  for (const index of entries.keys()) {
    if (index > max) max = index;
  }
  return max;
}

/**
 * Render positions `from`..max joined by `separator`; unset positions are empty.
 */
export function joinIndexed<T>(
  entries: ReadonlyMap<number, T>,
  separator: string,
  render: (entry: T) => string,
  from = 1
): string {
  const parts: string[] = [];
  const last = maxIndex(entries);
  for (let i = from; i <= last; i++) {
    const entry = entries.get(i);
    parts.push(entry === undefined ? '' : render(entry));
  }
  return parts.join(separator);
}
