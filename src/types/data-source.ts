import type { RainObservation, WaterObservation } from './index';

export type DatasetKind = 'water' | 'rain';

export interface DatasetLocations {
    water: string;
    rain: string;
}

export interface Datasets {
    readonly water: readonly WaterObservation[];
    readonly rain: readonly RainObservation[];
}

/**
 * Raw record shapes as published. Column labels vary between exports,
 * so every field is optional and resolved through the loader's aliases.
 */
export interface RawWaterRecord {
    date?: unknown;
    date_observation?: unknown;
    water_height?: unknown;
    hauteur?: unknown;
    'max(hauteur, na.rm = TRUE)'?: unknown;
    [column: string]: unknown;
}

export interface RawRainRecord {
    station_id?: unknown;
    nom_usuel?: unknown;
    latitude?: unknown;
    longitude?: unknown;
    date?: unknown;
    date_observation?: unknown;
    precipitation?: unknown;
    [column: string]: unknown;
}

export type JsonFetcher = (url: string) => Promise<unknown>;
