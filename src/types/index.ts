export interface WaterObservation {
    date: Date;
    height: number;
}

export interface RainObservation {
    stationId: string;
    latitude: number;
    longitude: number;
    date: Date;
    precipitation: number;
}

export interface DateInterval {
    start: Date;
    end: Date;
}

export type AggregationStatistic = 'median' | 'mean' | 'min' | 'max';

/**
 * How days without a record for a station count in its variability.
 * 'zero-fill' counts them as 0 mm; 'observed' only uses recorded values.
 */
export type MissingDayPolicy = 'zero-fill' | 'observed';

export interface DailyAggregate {
    date: Date;
    waterHeight: number;
    deltaHeight: number;
    deltaTimeSeconds: number;
    velocity: number; // height units per second
    acceleration: number; // height units per second²
    normalizedAcceleration: number; // [-1, 1]
}

export interface StationSummary {
    stationId: string;
    latitude: number;
    longitude: number;
    precipitationTotal: number;
    precipitationVariability: number; // sample std dev
    variationNorm: number; // [0, 1]
    sampleCount: number;
}

export type DateLike = Date | string | number;

export interface SelectionBox {
    x: readonly [DateLike, DateLike];
}

/**
 * Brush selection as emitted by the chart: zero or more x-ranges.
 * Only the first box is honored.
 */
export type BrushSelection = readonly SelectionBox[];

export * from './data-source';
