import { useMemo, useState } from 'react';
import type { AggregationStatistic, BrushSelection, DateInterval, MissingDayPolicy } from '../types';
import type { DatasetCache } from '../services/datasets';
import { defaultDatasetLocations } from '../config';
import { useDatasets } from '../hooks/useDatasets';
import { usePreferences } from '../hooks/usePreferences';
import { availableRange, buildRainfallView, buildTrendView, defaultWindow, formatWindowLabel } from '../lib/explorer';
import { downloadStationSummaryCSV, downloadTrendCSV } from '../lib/export';
import { FilterSidebar } from '../components/FilterSidebar';
import { WaterTrendChart } from '../components/WaterTrendChart';
import { RainfallStationMap } from '../components/RainfallStationMap';
import { DatasetStatus } from '../components/DatasetStatus';

interface DashboardProps {
    cache: DatasetCache;
}

export function Dashboard({ cache }: DashboardProps) {
    const { preferences, setTopN, setStatistic, setMissingDays, setTutorialSeen } = usePreferences();

    const locations = useMemo(() => defaultDatasetLocations(), []);
    const [reloadToken, setReloadToken] = useState(0);
    const datasetState = useDatasets(cache, locations, reloadToken);
    const datasets = datasetState.status === 'ready' ? datasetState.datasets : null;

    const range = useMemo(() => (datasets ? availableRange(datasets.water) : null), [datasets]);
    const initialWindow = useMemo(() => (datasets ? defaultWindow(datasets.water) : null), [datasets]);

    const [windowOverride, setWindowOverride] = useState<DateInterval | null>(null);
    const [selection, setSelection] = useState<BrushSelection | null>(null);
    // Bumped to remount the chart brush when the selection is cleared
    const [brushKey, setBrushKey] = useState(0);

    const activeWindow = windowOverride ?? initialWindow;

    const clearSelection = () => {
        setSelection(null);
        setBrushKey(k => k + 1);
    };

    const trendView = useMemo(
        () => (datasets && activeWindow ? buildTrendView(datasets.water, activeWindow, preferences.statistic) : null),
        [datasets, activeWindow, preferences.statistic]
    );

    const rainfallView = useMemo(
        () => (datasets && activeWindow
            ? buildRainfallView(datasets.rain, selection, activeWindow, {
                topN: preferences.topN,
                missingDays: preferences.missingDays
            })
            : null),
        [datasets, activeWindow, selection, preferences.topN, preferences.missingDays]
    );

    const handleWindowChange = (next: DateInterval) => {
        setWindowOverride(next);
        clearSelection();
    };

    const handleStatisticChange = (statistic: AggregationStatistic) => {
        setStatistic(statistic);
        clearSelection();
    };

    const handleRetry = () => {
        cache.invalidate(locations);
        setReloadToken(t => t + 1);
    };

    if (datasetState.status !== 'ready') {
        return <DatasetStatus state={datasetState} onRetry={handleRetry} />;
    }

    if (!range || !activeWindow || !trendView || !rainfallView) {
        return (
            <div className="container mx-auto p-8 text-center text-muted-foreground">
                The water level dataset holds no usable observations.
            </div>
        );
    }

    return (
        <div className="container mx-auto p-4 grid grid-cols-1 lg:grid-cols-[18rem_1fr] gap-4">
            <FilterSidebar
                range={range}
                dateWindow={activeWindow}
                topN={preferences.topN}
                statistic={preferences.statistic}
                missingDays={preferences.missingDays}
                onWindowChange={handleWindowChange}
                onTopNChange={setTopN}
                onStatisticChange={handleStatisticChange}
                onMissingDaysChange={(policy: MissingDayPolicy) => setMissingDays(policy)}
                onShowTutorial={() => setTutorialSeen(false)}
            />

            <div className="space-y-4 min-w-0">
                <p className="text-xs text-muted-foreground">
                    Window {formatWindowLabel(activeWindow)}
                    {selection ? `, rainfall for ${formatWindowLabel(rainfallView.interval)}` : ''}
                </p>

                <WaterTrendChart
                    points={trendView.points}
                    brushKey={brushKey}
                    hasSelection={selection !== null}
                    onSelectionChange={setSelection}
                    onResetSelection={clearSelection}
                    onExport={() => downloadTrendCSV(trendView.points, activeWindow)}
                />

                <RainfallStationMap
                    stations={rainfallView.stations}
                    title={rainfallView.title}
                    darkMode={preferences.darkMode}
                    onExport={() => downloadStationSummaryCSV(rainfallView.stations, rainfallView.interval)}
                />
            </div>
        </div>
    );
}
