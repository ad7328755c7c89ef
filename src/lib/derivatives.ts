import type { AggregationStatistic, DailyAggregate, DateInterval, WaterObservation } from '../types';
import { DEFAULT_STATISTIC } from '../config';
import { aggregate, safeDivide } from './stats';
import { isWithin, secondsBetween } from './dateUtils';

interface DailyHeight {
    date: Date;
    waterHeight: number;
}

/**
 * Reduces the observations inside `interval` (inclusive) to one height
 * per date, sorted ascending.
 */
export function aggregateDailyHeights(
    observations: readonly WaterObservation[],
    interval: DateInterval,
    statistic: AggregationStatistic = DEFAULT_STATISTIC
): DailyHeight[] {
    const groups = new Map<number, number[]>();

    for (const obs of observations) {
        if (!isWithin(obs.date, interval.start, interval.end)) continue;
        const key = obs.date.getTime();
        const bucket = groups.get(key);
        if (bucket) {
            bucket.push(obs.height);
        } else {
            groups.set(key, [obs.height]);
        }
    }

    return Array.from(groups.entries())
        .sort(([a], [b]) => a - b)
        .map(([time, heights]) => ({
            date: new Date(time),
            waterHeight: aggregate(heights, statistic)
        }));
}

/**
 * Rate of change and acceleration of the daily water height.
 *
 * Row 0 has no predecessor and carries zeros. Acceleration needs two real
 * velocities, so row 1 carries a zero acceleration as well. Every division
 * is guarded: a zero time step yields 0 rather than a non-finite value.
 * `normalizedAcceleration` is the acceleration over the largest absolute
 * acceleration of the series, or 0 throughout when the series is flat.
 */
export function computeDailyDerivatives(
    observations: readonly WaterObservation[],
    interval: DateInterval,
    statistic: AggregationStatistic = DEFAULT_STATISTIC
): DailyAggregate[] {
    const daily = aggregateDailyHeights(observations, interval, statistic);
    const rows: DailyAggregate[] = [];

    for (let i = 0; i < daily.length; i++) {
        const { date, waterHeight } = daily[i];

        if (i === 0) {
            rows.push({
                date,
                waterHeight,
                deltaHeight: 0,
                deltaTimeSeconds: 0,
                velocity: 0,
                acceleration: 0,
                normalizedAcceleration: 0
            });
            continue;
        }

        const previous = rows[i - 1];
        const deltaHeight = finiteOrZero(waterHeight - previous.waterHeight);
        const deltaTimeSeconds = finiteOrZero(secondsBetween(date, previous.date));
        const velocity = safeDivide(deltaHeight, deltaTimeSeconds);
        const acceleration = i >= 2
            ? safeDivide(velocity - previous.velocity, deltaTimeSeconds)
            : 0;

        rows.push({
            date,
            waterHeight,
            deltaHeight,
            deltaTimeSeconds,
            velocity,
            acceleration,
            normalizedAcceleration: 0
        });
    }

    return normalizeAcceleration(rows);
}

export function normalizeAcceleration(rows: DailyAggregate[]): DailyAggregate[] {
    const maxAbs = rows.reduce((max, row) => Math.max(max, Math.abs(row.acceleration)), 0);
    return rows.map(row => ({
        ...row,
        normalizedAcceleration: maxAbs > 0 ? clampUnit(row.acceleration / maxAbs) : 0
    }));
}

function finiteOrZero(value: number): number {
    return Number.isFinite(value) ? value : 0;
}

function clampUnit(value: number): number {
    return Math.max(-1, Math.min(1, value));
}
