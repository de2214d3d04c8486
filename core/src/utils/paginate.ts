/**
 * Windowing of a list around a cursor for list-style prompts.
 */

export interface Page<T> {
  /** The window starts at the first item. */
  first: boolean;
  /** The window ends at the last item. */
  last: boolean;
  content: T[];
  /** Cursor position relative to `content`, or null when nothing is highlighted. */
  cursor: number | null;
  /** Length of the whole list. */
  total: number;
}

/**
 * Returns the `pageSize` window that keeps `cursor` visible: anchored to the
 * start while the cursor is in the first half page, anchored to the end while
 * it is in the last half page, centred on it otherwise.
 */
export function paginate<T>(pageSize: number, items: readonly T[], cursor: number | null): Page<T> {
  const total = items.length;
  const selected = cursor ?? 0;
  const half = Math.floor(pageSize / 2);

  let start: number;
  let relative: number;

  if (total <= pageSize) {
    start = 0;
    relative = selected;
  } else if (selected < half) {
    start = 0;
    relative = selected;
  } else if (total - selected - 1 < half) {
    start = total - pageSize;
    relative = selected - start;
  } else {
    start = selected - half;
    relative = half;
  }

  const end = Math.min(start + pageSize, total);

  return {
    first: start === 0,
    last: end === total,
    content: items.slice(start, end),
    cursor: cursor === null ? null : relative,
    total,
  };
}
