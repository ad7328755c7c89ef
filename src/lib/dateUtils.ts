import { differenceInSeconds, isValid, parseISO } from 'date-fns';
import type { DateLike } from '../types';

const DAY_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parses a date-like value into a Date.
 * Plain YYYY-MM-DD strings and timestamps without an offset are read as UTC
 * so that day spacing is always 86400 seconds regardless of the viewer's
 * timezone.
 */
export function parseDate(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValid(value) ? new Date(value.getTime()) : null;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        const d = new Date(value);
        return isValid(d) ? d : null;
    }
    if (typeof value !== 'string') return null;

    const trimmed = value.trim();
    const dayMatch = DAY_ONLY.exec(trimmed);
    if (dayMatch) {
        const [, y, m, d] = dayMatch;
        const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
        // Reject rollovers such as 2024-02-31
        return date.getUTCDate() === Number(d) ? date : null;
    }

    // Chart libraries hand back "YYYY-MM-DD HH:mm:ss"
    const iso = trimmed.replace(' ', 'T');
    const parsed = parseISO(iso.includes('T') && !HAS_OFFSET.test(iso) ? `${iso}Z` : iso);
    return isValid(parsed) ? parsed : null;
}

export function toDate(value: DateLike): Date | null {
    return parseDate(value);
}

/** YYYY-MM-DD in UTC. */
export function toDayKey(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function secondsBetween(later: Date, earlier: Date): number {
    return differenceInSeconds(later, earlier);
}

export function isWithin(date: Date, start: Date, end: Date): boolean {
    const t = date.getTime();
    return t >= start.getTime() && t <= end.getTime();
}

/**
 * Formats a date string (YYYY-MM-DD) or Date object to DD/MM/YYYY.
 * Uses string manipulation for YYYY-MM-DD strings to avoid timezone shifts.
 */
export function formatDate(date: string | Date | null | undefined): string {
    if (!date) return '-';

    if (typeof date === 'string') {
        if (DAY_ONLY.test(date)) {
            const parts = date.split('-');
            return `${parts[2]}/${parts[1]}/${parts[0]}`;
        }
    }

    const d = new Date(date);
    if (isNaN(d.getTime())) return String(date);

    const month = (d.getUTCMonth() + 1).toString().padStart(2, '0');
    const day = d.getUTCDate().toString().padStart(2, '0');
    const year = d.getUTCFullYear();

    return `${day}/${month}/${year}`;
}
