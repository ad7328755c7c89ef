import type {
    AggregationStatistic,
    BrushSelection,
    DailyAggregate,
    DateInterval,
    MissingDayPolicy,
    RainObservation,
    StationSummary,
    WaterObservation
} from '../types';
import { DEFAULT_STATISTIC, DEFAULT_WINDOW_START, MAX_MARKER_RADIUS } from '../config';
import { computeDailyDerivatives } from './derivatives';
import { aggregateRainfall, clampTopN } from './rainfall';
import { resolveSelectionInterval } from './selection';
import { parseDate, toDayKey } from './dateUtils';
import { ACCELERATION_COLOR_SCALE, VARIATION_COLOR_SCALE, type ColorScale } from './colorScales';

export interface TrendView {
    points: DailyAggregate[];
    window: DateInterval;
    statistic: AggregationStatistic;
    colorScale: ColorScale;
    isEmpty: boolean;
}

export interface RainfallView {
    stations: StationSummary[];
    interval: DateInterval;
    topN: number;
    title: string;
    colorScale: ColorScale;
    isEmpty: boolean;
}

export interface RainfallViewOptions {
    topN?: number;
    missingDays?: MissingDayPolicy;
}

/** First and last observation dates, or null for an empty series. */
export function availableRange(water: readonly WaterObservation[]): DateInterval | null {
    if (water.length === 0) return null;
    let start = water[0].date;
    let end = water[0].date;
    for (const obs of water) {
        if (obs.date.getTime() < start.getTime()) start = obs.date;
        if (obs.date.getTime() > end.getTime()) end = obs.date;
    }
    return { start, end };
}

/**
 * The window the dashboard opens on: from 2000-01-01 (or the first
 * observation, if later) to the last observation.
 */
export function defaultWindow(water: readonly WaterObservation[]): DateInterval | null {
    const range = availableRange(water);
    if (!range) return null;

    const preferred = parseDate(DEFAULT_WINDOW_START);
    let start = preferred && preferred.getTime() > range.start.getTime() ? preferred : range.start;
    if (start.getTime() > range.end.getTime()) start = range.start;
    return { start, end: range.end };
}

export function formatWindowLabel(interval: DateInterval): string {
    return `${toDayKey(interval.start)} to ${toDayKey(interval.end)}`;
}

export function rainfallTitle(topN: number, interval: DateInterval): string {
    return `Top ${topN} Rainfall Stations (${formatWindowLabel(interval)})`;
}

export function buildTrendView(
    water: readonly WaterObservation[],
    window: DateInterval,
    statistic: AggregationStatistic = DEFAULT_STATISTIC
): TrendView {
    const points = computeDailyDerivatives(water, window, statistic);
    return {
        points,
        window,
        statistic,
        colorScale: ACCELERATION_COLOR_SCALE,
        isEmpty: points.length === 0
    };
}

export function buildRainfallView(
    rain: readonly RainObservation[],
    selection: BrushSelection | null | undefined,
    window: DateInterval,
    options: RainfallViewOptions = {}
): RainfallView {
    const topN = clampTopN(options.topN);
    const interval = resolveSelectionInterval(selection, window);
    const stations = aggregateRainfall(rain, interval, { topN, missingDays: options.missingDays });
    return {
        stations,
        interval,
        topN,
        title: rainfallTitle(topN, interval),
        colorScale: VARIATION_COLOR_SCALE,
        isEmpty: stations.length === 0
    };
}

const MIN_MARKER_RADIUS = 3;

/**
 * Marker radius for a station total. Area grows with the total, the
 * wettest station gets `maxRadius`.
 */
export function markerRadius(total: number, maxTotal: number, maxRadius: number = MAX_MARKER_RADIUS): number {
    if (maxTotal <= 0 || total <= 0) return MIN_MARKER_RADIUS;
    const scaled = maxRadius * Math.sqrt(Math.min(total, maxTotal) / maxTotal);
    return Math.max(MIN_MARKER_RADIUS, scaled);
}
