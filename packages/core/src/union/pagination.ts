/**
 * Union window planning.
 *
 * Given every source's total in priority order, decide how many rows each
 * source contributes to the page `[offset, offset + limit)` of their
 * concatenation, and from which offset inside the source.
 */

import { validatePagination } from '../utils';

import type { SourceWindow } from '../types';

export interface SourceTotal {
  sourceId: string;
  /** `null` when the source's size is unknown; it then absorbs the remaining budget */
  total: number | null;
}

/**
 * Walk the sources with a cursor over the virtual concatenation.
 *
 * @example
 * ```typescript
 * planUnionWindows(
 *   [{ sourceId: 'a', total: 3 }, { sourceId: 'b', total: 4 }, { sourceId: 'c', total: 5 }],
 *   5,
 *   3,
 * );
 * // a: 0 rows, b: 4 rows from 0, c: 1 row from 0
 * ```
 */
export function planUnionWindows(sources: readonly SourceTotal[], limit: number, offset: number): SourceWindow[] {
  validatePagination(limit, offset);

  let cursor = 0;
  let remaining = limit;

  return sources.map(({ sourceId, total }) => {
    if (remaining === 0) {
      return { sourceId, fetchLimit: 0, fetchOffset: 0 };
    }

    // entirely before the page
    if (total !== null && cursor + total <= offset) {
      cursor += total;
      return { sourceId, fetchLimit: 0, fetchOffset: 0 };
    }

    const fetchOffset = Math.max(0, offset - cursor);
    const fetchLimit = total === null ? remaining : Math.min(remaining, total - fetchOffset);

    remaining -= fetchLimit;
    cursor += fetchOffset + fetchLimit;

    return { sourceId, fetchLimit, fetchOffset };
  });
}

/**
 * Sum of the totals, or `null` when any of them is unknown.
 */
export function sumTotals(totals: readonly (number | null)[]): number | null {
  let sum = 0;
  for (const total of totals) {
    if (total === null) {
      return null;
    }
    sum += total;
  }
  return sum;
}
