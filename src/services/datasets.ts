import type {
    DatasetKind,
    DatasetLocations,
    Datasets,
    JsonFetcher,
    RainObservation,
    RawRainRecord,
    RawWaterRecord,
    WaterObservation
} from '../types';
import { LOG_PREFIX, WATER_HEIGHT_CEILING } from '../config';
import { parseDate } from '../lib/dateUtils';
import { formatAxiosError, getJson } from './http';

// Column aliases, first match wins
const WATER_DATE_COLUMNS = ['date', 'date_observation'] as const;
const WATER_HEIGHT_COLUMNS = ['water_height', 'max(hauteur, na.rm = TRUE)', 'hauteur'] as const;
const RAIN_DATE_COLUMNS = ['date', 'date_observation'] as const;
const RAIN_STATION_COLUMNS = ['station_id', 'nom_usuel'] as const;

export class DatasetLoadError extends Error {
    readonly kind: DatasetKind;
    readonly location: string;

    constructor(kind: DatasetKind, location: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DatasetLoadError';
        this.kind = kind;
        this.location = location;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: Record<string, unknown>, columns: readonly string[]): unknown {
    for (const column of columns) {
        const value = record[column];
        if (value !== undefined && value !== null && value !== '') return value;
    }
    return undefined;
}

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}

export function normalizeWaterRecord(record: RawWaterRecord): WaterObservation | null {
    const date = parseDate(pick(record, WATER_DATE_COLUMNS));
    const height = toNumber(pick(record, WATER_HEIGHT_COLUMNS));
    if (!date || height === null) return null;
    if (height >= WATER_HEIGHT_CEILING) return null;
    return { date, height };
}

export function normalizeRainRecord(record: RawRainRecord): RainObservation | null {
    const rawStation = pick(record, RAIN_STATION_COLUMNS);
    const stationId = typeof rawStation === 'string' || typeof rawStation === 'number'
        ? String(rawStation).trim()
        : '';
    const date = parseDate(pick(record, RAIN_DATE_COLUMNS));
    const latitude = toNumber(record.latitude);
    const longitude = toNumber(record.longitude);
    const precipitation = toNumber(record.precipitation);

    if (!stationId || !date || latitude === null || longitude === null || precipitation === null) return null;
    if (precipitation < 0) return null;
    return { stationId, latitude, longitude, date, precipitation };
}

function normalizeAll<T>(
    kind: DatasetKind,
    location: string,
    payload: unknown,
    normalize: (record: Record<string, unknown>) => T | null
): T[] {
    if (!Array.isArray(payload)) {
        throw new DatasetLoadError(kind, location, `Dataset ${kind} at ${location} is not a list of records.`);
    }

    const rows: T[] = [];
    let discarded = 0;
    for (const item of payload) {
        const row = isRecord(item) ? normalize(item) : null;
        if (row) {
            rows.push(row);
        } else {
            discarded++;
        }
    }

    if (discarded > 0) {
        console.warn(`${LOG_PREFIX} Discarded ${discarded} invalid ${kind} record(s) from ${location}`);
    }
    return rows;
}

export class DatasetLoader {
    private readonly fetchJson: JsonFetcher;

    constructor(fetchJson: JsonFetcher = url => getJson(url)) {
        this.fetchJson = fetchJson;
    }

    private async fetchDataset(kind: DatasetKind, location: string): Promise<unknown> {
        try {
            return await this.fetchJson(location);
        } catch (error) {
            throw new DatasetLoadError(kind, location, formatAxiosError(error, `Could not load ${kind} dataset`), { cause: error });
        }
    }

    async load(locations: DatasetLocations): Promise<Datasets> {
        const [waterPayload, rainPayload] = await Promise.all([
            this.fetchDataset('water', locations.water),
            this.fetchDataset('rain', locations.rain)
        ]);

        const water = normalizeAll('water', locations.water, waterPayload, normalizeWaterRecord)
            .sort((a, b) => a.date.getTime() - b.date.getTime());
        const rain = normalizeAll('rain', locations.rain, rainPayload, normalizeRainRecord);

        console.log(`${LOG_PREFIX} Loaded ${water.length} water and ${rain.length} rain observations`);
        return { water: Object.freeze(water), rain: Object.freeze(rain) };
    }
}

/**
 * Memoizes dataset loads by location. A failed load is evicted so the
 * next call fetches again; nothing retries on its own.
 */
export class DatasetCache {
    private readonly entries = new Map<string, Promise<Datasets>>();
    private readonly loader: DatasetLoader;

    constructor(loader: DatasetLoader = new DatasetLoader()) {
        this.loader = loader;
    }

    static keyOf(locations: DatasetLocations): string {
        return `${locations.water}|${locations.rain}`;
    }

    has(locations: DatasetLocations): boolean {
        return this.entries.has(DatasetCache.keyOf(locations));
    }

    load(locations: DatasetLocations): Promise<Datasets> {
        const key = DatasetCache.keyOf(locations);
        const cached = this.entries.get(key);
        if (cached) return cached;

        const pending = this.loader.load(locations).catch((error: unknown) => {
            this.entries.delete(key);
            throw error;
        });
        this.entries.set(key, pending);
        return pending;
    }

    invalidate(locations?: DatasetLocations): void {
        if (locations) {
            this.entries.delete(DatasetCache.keyOf(locations));
        } else {
            this.entries.clear();
        }
    }
}
