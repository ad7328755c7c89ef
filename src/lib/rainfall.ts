import type { DateInterval, MissingDayPolicy, RainObservation, StationSummary } from '../types';
import { DEFAULT_MISSING_DAYS, DEFAULT_TOP_N, TOP_N_RANGE } from '../config';
import { isWithin } from './dateUtils';
import { sampleStdDev, sum } from './stats';

export interface RainfallAggregationOptions {
    topN?: number;
    missingDays?: MissingDayPolicy;
}

interface StationGroup {
    stationId: string;
    latitude: number;
    longitude: number;
    records: RainObservation[];
}

/** Rounds and clamps a requested station count into the allowed range. */
export function clampTopN(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return DEFAULT_TOP_N;
    const [min, max] = TOP_N_RANGE;
    return Math.min(max, Math.max(min, Math.round(value)));
}

export function filterRainfall(
    observations: readonly RainObservation[],
    interval: DateInterval
): RainObservation[] {
    return observations.filter(obs => isWithin(obs.date, interval.start, interval.end));
}

// Groups keep first-seen order so that ranking ties resolve the same way every run.
function groupByStation(observations: readonly RainObservation[]): StationGroup[] {
    const groups = new Map<string, StationGroup>();
    for (const obs of observations) {
        const key = `${obs.stationId}\u0000${obs.latitude}\u0000${obs.longitude}`;
        const group = groups.get(key);
        if (group) {
            group.records.push(obs);
        } else {
            groups.set(key, {
                stationId: obs.stationId,
                latitude: obs.latitude,
                longitude: obs.longitude,
                records: [obs]
            });
        }
    }
    return Array.from(groups.values());
}

function stationSamples(group: StationGroup, windowDays: readonly number[], policy: MissingDayPolicy): number[] {
    if (policy === 'observed') {
        return group.records.map(r => r.precipitation);
    }

    const daily = new Map<number, number>();
    for (const record of group.records) {
        const key = record.date.getTime();
        daily.set(key, (daily.get(key) ?? 0) + record.precipitation);
    }
    return windowDays.map(day => daily.get(day) ?? 0);
}

/**
 * Per-station rainfall statistics over `interval`, top N stations by total.
 *
 * Under 'zero-fill' each station gets one sample per date present anywhere
 * in the filtered window, 0 when it reported nothing that day. Totals do not
 * depend on the policy. `variationNorm` is scaled against the retained
 * stations only.
 */
export function aggregateRainfall(
    observations: readonly RainObservation[],
    interval: DateInterval,
    options: RainfallAggregationOptions = {}
): StationSummary[] {
    const topN = clampTopN(options.topN);
    const policy = options.missingDays ?? DEFAULT_MISSING_DAYS;

    const filtered = filterRainfall(observations, interval);
    if (filtered.length === 0) return [];

    const windowDays = Array.from(new Set(filtered.map(obs => obs.date.getTime()))).sort((a, b) => a - b);

    const summaries = groupByStation(filtered).map(group => {
        const samples = stationSamples(group, windowDays, policy);
        return {
            stationId: group.stationId,
            latitude: group.latitude,
            longitude: group.longitude,
            precipitationTotal: sum(group.records.map(r => r.precipitation)),
            precipitationVariability: sampleStdDev(samples),
            variationNorm: 0,
            sampleCount: samples.length
        };
    });

    // Array.prototype.sort is stable
    const retained = summaries
        .sort((a, b) => b.precipitationTotal - a.precipitationTotal)
        .slice(0, topN);

    const maxVariation = retained.reduce((max, s) => Math.max(max, s.precipitationVariability), 0);

    return retained.map(s => ({
        ...s,
        variationNorm: maxVariation > 0 ? s.precipitationVariability / maxVariation : 0
    }));
}
