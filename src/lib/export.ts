import { saveAs } from 'file-saver';
import type { DailyAggregate, DateInterval, StationSummary } from '../types';
import { toDayKey } from './dateUtils';

const BOM = '\uFEFF';

export function escapeCsvField(value: string | number): string {
    const text = String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

function toCsv(headers: string[], rows: (string | number)[][]): string {
    return [headers, ...rows].map(row => row.map(escapeCsvField).join(',')).join('\n');
}

function saveCsv(content: string, filename: string) {
    // Add BOM for Excel compatibility
    const blob = new Blob([BOM + content], { type: 'text/csv;charset=utf-8' });
    saveAs(blob, filename);
}

function intervalSuffix(interval: DateInterval): string {
    return `${toDayKey(interval.start)}_${toDayKey(interval.end)}`;
}

export function trendToCsv(points: readonly DailyAggregate[]): string {
    const headers = ['Date', 'WaterHeight', 'DeltaHeight', 'DeltaTimeSeconds', 'Velocity', 'Acceleration', 'NormalizedAcceleration'];
    const rows = points.map(p => [
        toDayKey(p.date),
        p.waterHeight,
        p.deltaHeight,
        p.deltaTimeSeconds,
        p.velocity,
        p.acceleration,
        p.normalizedAcceleration
    ]);
    return toCsv(headers, rows);
}

export function stationSummaryToCsv(stations: readonly StationSummary[]): string {
    const headers = ['Station', 'Latitude', 'Longitude', 'TotalPrecipitation', 'StdDev', 'VariationLevel', 'Samples'];
    const rows = stations.map(s => [
        s.stationId,
        s.latitude,
        s.longitude,
        s.precipitationTotal,
        s.precipitationVariability,
        s.variationNorm,
        s.sampleCount
    ]);
    return toCsv(headers, rows);
}

export function downloadTrendCSV(points: readonly DailyAggregate[], interval: DateInterval) {
    saveCsv(trendToCsv(points), `water_height_trend_${intervalSuffix(interval)}.csv`);
}

export function downloadStationSummaryCSV(stations: readonly StationSummary[], interval: DateInterval) {
    saveCsv(stationSummaryToCsv(stations), `rainfall_stations_${intervalSuffix(interval)}.csv`);
}
