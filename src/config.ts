import type { AggregationStatistic, DatasetLocations, MissingDayPolicy } from './types';

/** Heights at or above this value are sensor faults. */
export const WATER_HEIGHT_CEILING = 10000;

export const DEFAULT_TOP_N = 50;
export const TOP_N_RANGE: readonly [number, number] = [1, 100];

export const DEFAULT_WINDOW_START = '2000-01-01';
export const DEFAULT_STATISTIC: AggregationStatistic = 'median';
export const DEFAULT_MISSING_DAYS: MissingDayPolicy = 'zero-fill';

export const HTTP_TIMEOUT_MS = 10000;

export const LOG_PREFIX = '[RiverRainExplorer]';

const dataBaseUrl = (): string => {
    const configured = import.meta.env.VITE_DATA_BASE_URL;
    const base = configured && configured.trim() ? configured.trim() : `${import.meta.env.BASE_URL}data/`;
    return base.endsWith('/') ? base : `${base}/`;
};

export function defaultDatasetLocations(): DatasetLocations {
    const base = dataBaseUrl();
    return {
        water: `${base}water_heights.json`,
        rain: `${base}rainfall.json`
    };
}

// Toulouse
export const MAP_CENTER: readonly [number, number] = [43.6047, 1.4442];
export const MAP_ZOOM = 8;
export const MAX_MARKER_RADIUS = 25;
