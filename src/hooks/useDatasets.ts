import { useEffect, useState } from 'react';
import type { DatasetLocations, Datasets } from '../types';
import type { DatasetCache } from '../services/datasets';
import { LOG_PREFIX } from '../config';

export type DatasetState =
    | { status: 'loading' }
    | { status: 'ready'; datasets: Datasets }
    | { status: 'error'; error: Error };

/**
 * Loads both datasets through the shared cache. `reloadToken` lets the
 * caller invalidate and fetch again after a failure.
 */
export function useDatasets(cache: DatasetCache, locations: DatasetLocations, reloadToken = 0): DatasetState {
    const [state, setState] = useState<DatasetState>({ status: 'loading' });
    const { water, rain } = locations;

    useEffect(() => {
        let cancelled = false;
        setState({ status: 'loading' });

        cache.load({ water, rain }).then(
            datasets => {
                if (!cancelled) setState({ status: 'ready', datasets });
            },
            (error: unknown) => {
                console.error(`${LOG_PREFIX} Dataset load failed`, error);
                if (!cancelled) {
                    setState({ status: 'error', error: error instanceof Error ? error : new Error(String(error)) });
                }
            }
        );

        return () => {
            cancelled = true;
        };
    }, [cache, water, rain, reloadToken]);

    return state;
}
