import { describe, expect, it } from 'vitest';
import { aggregate, isAggregationStatistic, mean, median, safeDivide, sampleStdDev } from './stats';

describe('stats', () => {
    it('takes the middle value or the mean of the two middle values', () => {
        expect(median([3, 1, 2])).toBe(2);
        expect(median([4, 1, 3, 2])).toBe(2.5);
        expect(median([])).toBe(0);
    });

    it('computes the mean', () => {
        expect(mean([1, 2, 6])).toBe(3);
        expect(mean([])).toBe(0);
    });

    it('uses n - 1 for the standard deviation', () => {
        expect(sampleStdDev([2, 4])).toBeCloseTo(Math.SQRT2);
        expect(sampleStdDev([7])).toBe(0);
    });

    it('dispatches on the statistic name', () => {
        const values = [5, 1, 9];
        expect(aggregate(values, 'median')).toBe(5);
        expect(aggregate(values, 'mean')).toBe(5);
        expect(aggregate(values, 'min')).toBe(1);
        expect(aggregate(values, 'max')).toBe(9);
    });

    it('recognizes statistic names', () => {
        expect(isAggregationStatistic('mean')).toBe(true);
        expect(isAggregationStatistic('mode')).toBe(false);
        expect(isAggregationStatistic(3)).toBe(false);
    });

    it('returns 0 instead of dividing by zero', () => {
        expect(safeDivide(3, 0)).toBe(0);
        expect(safeDivide(0, 0)).toBe(0);
        expect(safeDivide(6, 3)).toBe(2);
    });
});
