import { describe, expect, it, vi, beforeEach } from 'vitest';
import type { DailyAggregate, StationSummary } from '../types';
import { downloadStationSummaryCSV, downloadTrendCSV, escapeCsvField } from './export';

const saveAsMock = vi.fn<(blob: Blob, filename: string) => void>();

vi.mock('file-saver', () => ({
    saveAs: (blob: Blob, filename: string) => saveAsMock(blob, filename)
}));

async function blobToUtf8(blob: Blob): Promise<string> {
    if (typeof blob.text === 'function') {
        return await blob.text();
    }

    return await new Promise((resolve, reject) => {
        const reader = new FileReader();
        reader.onload = () => resolve(String(reader.result ?? ''));
        reader.onerror = () => reject(reader.error);
        reader.readAsText(blob);
    });
}

const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`);

const may = { start: day('2024-05-01'), end: day('2024-05-10') };

describe('CSV exports', () => {
    beforeEach(() => {
        saveAsMock.mockReset();
    });

    it('writes the daily series with one row per day', async () => {
        const points: DailyAggregate[] = [{
            date: day('2024-05-02'),
            waterHeight: 120,
            deltaHeight: 4,
            deltaTimeSeconds: 86400,
            velocity: 0.5,
            acceleration: 0.25,
            normalizedAcceleration: 1
        }];

        downloadTrendCSV(points, may);

        expect(saveAsMock).toHaveBeenCalledTimes(1);
        const [blob, filename] = saveAsMock.mock.calls[0];
        expect(filename).toBe('water_height_trend_2024-05-01_2024-05-10.csv');

        const csv = (await blobToUtf8(blob)).replace(/^\uFEFF/, '');
        expect(csv.split('\n')).toEqual([
            'Date,WaterHeight,DeltaHeight,DeltaTimeSeconds,Velocity,Acceleration,NormalizedAcceleration',
            '2024-05-02,120,4,86400,0.5,0.25,1'
        ]);
    });

    it('escapes commas and quotes in station names', async () => {
        const stations: StationSummary[] = [{
            stationId: 'Station "Alpha", East',
            latitude: 43.5,
            longitude: 1.25,
            precipitationTotal: 12,
            precipitationVariability: 2,
            variationNorm: 1,
            sampleCount: 3
        }];

        downloadStationSummaryCSV(stations, may);

        const [blob, filename] = saveAsMock.mock.calls[0];
        expect(filename).toBe('rainfall_stations_2024-05-01_2024-05-10.csv');

        const lines = (await blobToUtf8(blob)).replace(/^\uFEFF/, '').split('\n');
        expect(lines[1]).toBe('"Station ""Alpha"", East",43.5,1.25,12,2,1,3');
    });
});

describe('escapeCsvField', () => {
    it('leaves plain values alone', () => {
        expect(escapeCsvField('Blagnac')).toBe('Blagnac');
        expect(escapeCsvField(1.5)).toBe('1.5');
    });

    it('quotes values with line breaks', () => {
        expect(escapeCsvField('a\nb')).toBe('"a\nb"');
    });
});
