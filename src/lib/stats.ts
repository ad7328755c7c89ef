import type { AggregationStatistic } from '../types';

// ── Basic descriptive stats ───────────────────────────────────────

export function sum(values: readonly number[]): number {
    return values.reduce((s, v) => s + v, 0);
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return sum(values) / values.length;
}

export function median(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 !== 0
        ? sorted[mid]
        : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function sampleStdDev(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const m = mean(values);
    const squaredDiffs = values.reduce((s, v) => s + (v - m) ** 2, 0);
    // Sample standard deviation (n-1)
    return Math.sqrt(squaredDiffs / (values.length - 1));
}

// ── Reducers ──────────────────────────────────────────────────────

const REDUCERS: Record<AggregationStatistic, (values: readonly number[]) => number> = {
    median,
    mean,
    min: values => (values.length === 0 ? 0 : Math.min(...values)),
    max: values => (values.length === 0 ? 0 : Math.max(...values))
};

export const AGGREGATION_STATISTICS: readonly AggregationStatistic[] = ['median', 'mean', 'min', 'max'];

export function isAggregationStatistic(value: unknown): value is AggregationStatistic {
    return AGGREGATION_STATISTICS.some(statistic => statistic === value);
}

export function aggregate(values: readonly number[], statistic: AggregationStatistic): number {
    return REDUCERS[statistic](values);
}

/** Divides, returning 0 instead of a non-finite result. */
export function safeDivide(numerator: number, denominator: number): number {
    if (denominator === 0) return 0;
    const result = numerator / denominator;
    return Number.isFinite(result) ? result : 0;
}
