import { SlidersHorizontal, BookOpen } from 'lucide-react';
import type { AggregationStatistic, DateInterval, MissingDayPolicy } from '../types';
import { TOP_N_RANGE } from '../config';
import { AGGREGATION_STATISTICS, isAggregationStatistic } from '../lib/stats';
import { parseDate, toDayKey } from '../lib/dateUtils';
import { normalizeInterval } from '../lib/selection';

interface FilterSidebarProps {
    range: DateInterval;
    dateWindow: DateInterval;
    topN: number;
    statistic: AggregationStatistic;
    missingDays: MissingDayPolicy;
    onWindowChange: (window: DateInterval) => void;
    onTopNChange: (topN: number) => void;
    onStatisticChange: (statistic: AggregationStatistic) => void;
    onMissingDaysChange: (policy: MissingDayPolicy) => void;
    onShowTutorial: () => void;
}

const STATISTIC_LABELS: Record<AggregationStatistic, string> = {
    median: 'Median',
    mean: 'Mean',
    min: 'Minimum',
    max: 'Maximum'
};

function clampToRange(date: Date, range: DateInterval): Date {
    const t = Math.min(range.end.getTime(), Math.max(range.start.getTime(), date.getTime()));
    return new Date(t);
}

export function FilterSidebar({
    range,
    dateWindow,
    topN,
    statistic,
    missingDays,
    onWindowChange,
    onTopNChange,
    onStatisticChange,
    onMissingDaysChange,
    onShowTutorial
}: FilterSidebarProps) {
    const [minTopN, maxTopN] = TOP_N_RANGE;

    const updateBound = (bound: 'start' | 'end', value: string) => {
        const parsed = parseDate(value);
        if (!parsed) return;
        const clamped = clampToRange(parsed, range);
        const next = bound === 'start'
            ? normalizeInterval(clamped, dateWindow.end)
            : normalizeInterval(dateWindow.start, clamped);
        onWindowChange(next);
    };

    return (
        <aside className="bg-card border border-border rounded-lg p-4 shadow-sm space-y-5 text-sm">
            <h2 className="font-semibold flex items-center gap-2">
                <SlidersHorizontal className="h-4 w-4" /> Filters
            </h2>

            <fieldset className="space-y-2">
                <legend className="font-medium mb-1">Observation date range</legend>
                <label className="flex flex-col gap-1">
                    <span className="text-muted-foreground text-xs">From</span>
                    <input
                        type="date"
                        className="bg-background border border-border rounded-md px-2 py-1"
                        min={toDayKey(range.start)}
                        max={toDayKey(range.end)}
                        value={toDayKey(dateWindow.start)}
                        onChange={e => updateBound('start', e.target.value)}
                    />
                </label>
                <label className="flex flex-col gap-1">
                    <span className="text-muted-foreground text-xs">To</span>
                    <input
                        type="date"
                        className="bg-background border border-border rounded-md px-2 py-1"
                        min={toDayKey(range.start)}
                        max={toDayKey(range.end)}
                        value={toDayKey(dateWindow.end)}
                        onChange={e => updateBound('end', e.target.value)}
                    />
                </label>
            </fieldset>

            <label className="flex flex-col gap-1">
                <span className="font-medium">Top N rainfall stations: {topN}</span>
                <input
                    type="range"
                    min={minTopN}
                    max={maxTopN}
                    step={1}
                    value={topN}
                    onChange={e => onTopNChange(Number(e.target.value))}
                />
            </label>

            <label className="flex flex-col gap-1">
                <span className="font-medium">Daily water height statistic</span>
                <select
                    className="bg-background border border-border rounded-md px-2 py-1"
                    value={statistic}
                    onChange={e => {
                        const value = e.target.value;
                        if (isAggregationStatistic(value)) onStatisticChange(value);
                    }}
                >
                    {AGGREGATION_STATISTICS.map(s => (
                        <option key={s} value={s}>{STATISTIC_LABELS[s]}</option>
                    ))}
                </select>
            </label>

            <label className="flex items-center gap-2">
                <input
                    type="checkbox"
                    checked={missingDays === 'zero-fill'}
                    onChange={e => onMissingDaysChange(e.target.checked ? 'zero-fill' : 'observed')}
                />
                <span>Count missing rainfall days as 0 mm</span>
            </label>

            <hr className="border-border" />

            <button
                onClick={onShowTutorial}
                className="flex items-center gap-2 text-sm font-medium hover:text-primary transition-colors"
            >
                <BookOpen className="h-4 w-4" /> Show tutorial again
            </button>
        </aside>
    );
}
