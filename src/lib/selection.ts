import type { BrushSelection, DateInterval, DateLike } from '../types';
import { LOG_PREFIX } from '../config';
import { toDate } from './dateUtils';

/** Orders two dates into an interval, swapping them when reversed. */
export function normalizeInterval(a: Date, b: Date): DateInterval {
    return a.getTime() <= b.getTime()
        ? { start: a, end: b }
        : { start: b, end: a };
}

/**
 * Resolves the date interval the rainfall map should cover.
 *
 * Only the first box of the selection counts; a selection dragged right to
 * left is swapped. Without a usable selection the fallback comes back as is.
 */
export function resolveSelectionInterval(
    selection: BrushSelection | null | undefined,
    fallback: DateInterval
): DateInterval {
    const box = selection?.[0];
    if (!box) return fallback;

    const [rawStart, rawEnd] = box.x;
    const start = toDate(rawStart);
    const end = toDate(rawEnd);
    if (!start || !end) {
        console.warn(`${LOG_PREFIX} Ignoring selection with unreadable bounds`, box.x);
        return fallback;
    }

    return normalizeInterval(start, end);
}

/**
 * Turns a brush index range over a date axis into a one-box selection.
 * Returns null when either index is missing or out of range.
 */
export function selectionFromIndexRange(
    dates: readonly DateLike[],
    startIndex: number | undefined,
    endIndex: number | undefined
): BrushSelection | null {
    if (startIndex === undefined || endIndex === undefined) return null;
    const start = dates[startIndex];
    const end = dates[endIndex];
    if (start === undefined || end === undefined) return null;
    return [{ x: [start, end] }];
}
