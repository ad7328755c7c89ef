import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';
import type { DatasetLocations, JsonFetcher } from '../types';
import { computeDailyDerivatives } from '../lib/derivatives';
import { DatasetCache, DatasetLoadError, DatasetLoader, normalizeRainRecord, normalizeWaterRecord } from './datasets';

const LOCATIONS: DatasetLocations = { water: '/data/water.json', rain: '/data/rain.json' };

const WATER = [
    { date: '2024-05-02', water_height: 120 },
    { date_observation: '2024-05-01', 'max(hauteur, na.rm = TRUE)': '9999' },
    { date: '2024-05-03', water_height: 10000 },
    { date: 'yesterday', water_height: 1 }
];

const RAIN = [
    { station_id: 'Blagnac', latitude: 43.63, longitude: 1.37, date: '2024-05-01', precipitation: 2.5 },
    { nom_usuel: 'Muret', latitude: '43.45', longitude: '1.30', date_observation: '2024-05-01', precipitation: '0' },
    { station_id: 'Broken', latitude: 43.5, longitude: 1.4, date: '2024-05-01', precipitation: -1 }
];

const byLocation = (water: unknown, rain: unknown): JsonFetcher => async url => (url === LOCATIONS.water ? water : rain);

describe('DatasetLoader', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('normalizes both datasets and sorts water levels by date', async () => {
        const { water, rain } = await new DatasetLoader(byLocation(WATER, RAIN)).load(LOCATIONS);

        expect(water).toEqual([
            { date: new Date(Date.UTC(2024, 4, 1)), height: 9999 },
            { date: new Date(Date.UTC(2024, 4, 2)), height: 120 }
        ]);
        expect(rain.map(r => [r.stationId, r.latitude, r.precipitation])).toEqual([
            ['Blagnac', 43.63, 2.5],
            ['Muret', 43.45, 0]
        ]);
    });

    it('reports how many records were dropped', async () => {
        await new DatasetLoader(byLocation(WATER, RAIN)).load(LOCATIONS);

        expect(console.warn).toHaveBeenCalledWith('[RiverRainExplorer] Discarded 2 invalid water record(s) from /data/water.json');
        expect(console.warn).toHaveBeenCalledWith('[RiverRainExplorer] Discarded 1 invalid rain record(s) from /data/rain.json');
    });

    it('wraps fetch failures with the dataset they belong to', async () => {
        const loader = new DatasetLoader(async url => {
            if (url === LOCATIONS.water) throw new Error('boom');
            return [];
        });

        const error = await loader.load(LOCATIONS).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(DatasetLoadError);
        if (!(error instanceof DatasetLoadError)) return;
        expect(error.kind).toBe('water');
        expect(error.location).toBe('/data/water.json');
        expect(error.message).toBe('Could not load water dataset: boom');
    });

    it('rejects a payload that is not a list', async () => {
        const loader = new DatasetLoader(byLocation([], { rows: [] }));
        await expect(loader.load(LOCATIONS)).rejects.toThrow('Dataset rain at /data/rain.json is not a list of records.');
    });
});

describe('record normalization', () => {
    it('excludes heights at the fault ceiling', () => {
        expect(normalizeWaterRecord({ date: '2024-05-01', water_height: 10000 })).toBeNull();
        expect(normalizeWaterRecord({ date: '2024-05-01', hauteur: 9999.5 })?.height).toBe(9999.5);
    });

    it('spaces timestamps without an offset one day apart across a clock change', () => {
        const water = ['2024-03-30T00:00:00.000', '2024-03-31T00:00:00.000', '2024-04-01T00:00:00.000']
            .map((date, i) => normalizeWaterRecord({ date, water_height: 100 + i }))
            .filter((obs): obs is NonNullable<typeof obs> => obs !== null);
        const rows = computeDailyDerivatives(water, { start: new Date(Date.UTC(2024, 2, 1)), end: new Date(Date.UTC(2024, 3, 30)) });

        expect(rows.map(r => r.deltaTimeSeconds)).toEqual([0, 86400, 86400]);
    });

    it('groups a day written with and without a time into one row', () => {
        const water = [
            normalizeWaterRecord({ date: '2024-03-31', water_height: 10 }),
            normalizeWaterRecord({ date: '2024-03-31T00:00:00', water_height: 20 })
        ].filter((obs): obs is NonNullable<typeof obs> => obs !== null);
        const rows = computeDailyDerivatives(water, { start: new Date(Date.UTC(2024, 2, 1)), end: new Date(Date.UTC(2024, 3, 30)) });

        expect(rows.map(r => r.waterHeight)).toEqual([15]);
    });

    it('requires coordinates for rain records', () => {
        expect(normalizeRainRecord({ station_id: 'A', date: '2024-05-01', precipitation: 1, latitude: 43 })).toBeNull();
    });
});

describe('DatasetCache', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('loads each pair of locations once', async () => {
        const fetcher = vi.fn<JsonFetcher>(async () => []);
        const cache = new DatasetCache(new DatasetLoader(fetcher));

        const first = await cache.load(LOCATIONS);
        const second = await cache.load({ ...LOCATIONS });

        expect(second).toBe(first);
        expect(fetcher).toHaveBeenCalledTimes(2);
        expect(cache.has(LOCATIONS)).toBe(true);
    });

    it('fetches again after invalidation', async () => {
        const fetcher = vi.fn<JsonFetcher>(async () => []);
        const cache = new DatasetCache(new DatasetLoader(fetcher));

        await cache.load(LOCATIONS);
        cache.invalidate(LOCATIONS);
        expect(cache.has(LOCATIONS)).toBe(false);
        await cache.load(LOCATIONS);

        expect(fetcher).toHaveBeenCalledTimes(4);
    });

    it('forgets a failed load', async () => {
        const fetcher = vi.fn<JsonFetcher>()
            .mockRejectedValueOnce(new Error('offline'))
            .mockResolvedValue([]);
        const cache = new DatasetCache(new DatasetLoader(fetcher));

        await expect(cache.load(LOCATIONS)).rejects.toThrow(DatasetLoadError);
        expect(cache.has(LOCATIONS)).toBe(false);

        await expect(cache.load(LOCATIONS)).resolves.toEqual({ water: [], rain: [] });
    });
});
