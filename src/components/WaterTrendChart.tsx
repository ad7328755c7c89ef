import { ResponsiveContainer, ComposedChart, Line, Scatter, Cell, XAxis, YAxis, CartesianGrid, Tooltip, Brush } from 'recharts';
import { useMemo } from 'react';
import { RotateCcw, Download } from 'lucide-react';
import type { BrushSelection, DailyAggregate } from '../types';
import { formatDate } from '../lib/dateUtils';
import { accelerationColor, ACCELERATION_COLOR_SCALE, ACCELERATION_DOMAIN, ACCELERATION_TICKS } from '../lib/colorScales';
import { selectionFromIndexRange } from '../lib/selection';
import { ColorLegend } from './ColorLegend';

interface WaterTrendChartProps {
    points: DailyAggregate[];
    /** Changing this remounts the brush back to the full extent. */
    brushKey: number;
    hasSelection: boolean;
    onSelectionChange: (selection: BrushSelection | null) => void;
    onResetSelection: () => void;
    onExport: () => void;
}

interface ChartPoint {
    time: number;
    waterHeight: number;
    normalizedAcceleration: number;
    color: string;
}

export function WaterTrendChart({ points, brushKey, hasSelection, onSelectionChange, onResetSelection, onExport }: WaterTrendChartProps) {
    const chartData = useMemo<ChartPoint[]>(() => points.map(p => ({
        time: p.date.getTime(),
        waterHeight: p.waterHeight,
        normalizedAcceleration: p.normalizedAcceleration,
        color: accelerationColor(p.normalizedAcceleration)
    })), [points]);

    const times = useMemo(() => chartData.map(p => p.time), [chartData]);
    const pointsByTime = useMemo(() => new Map<number, ChartPoint>(chartData.map(p => [p.time, p])), [chartData]);

    const handleBrushChange = ({ startIndex, endIndex }: { startIndex?: number; endIndex?: number }) => {
        // A brush spanning everything is no selection at all
        if (startIndex === 0 && endIndex === times.length - 1) {
            onSelectionChange(null);
            return;
        }
        onSelectionChange(selectionFromIndexRange(times, startIndex, endIndex));
    };

    if (points.length === 0) {
        return (
            <div className="h-64 flex items-center justify-center text-muted-foreground border border-dashed border-border rounded-lg bg-muted/10">
                No water level data for this window
            </div>
        );
    }

    return (
        <div className="bg-card border border-border rounded-lg p-4 shadow-sm">
            <div className="flex flex-wrap justify-between items-start gap-4 mb-2">
                <h3 className="text-lg font-semibold">Water Height Colored by Acceleration</h3>
                <div className="flex items-center gap-4">
                    <ColorLegend
                        title="Acceleration"
                        scale={ACCELERATION_COLOR_SCALE}
                        ticks={ACCELERATION_TICKS}
                        domain={ACCELERATION_DOMAIN}
                    />
                    <button
                        onClick={onResetSelection}
                        disabled={!hasSelection}
                        className="flex items-center gap-1 text-sm font-medium hover:text-primary transition-colors disabled:opacity-40"
                    >
                        <RotateCcw className="h-4 w-4" /> Reset selection
                    </button>
                    <button
                        onClick={onExport}
                        className="flex items-center gap-1 text-sm font-medium hover:text-primary transition-colors"
                        title="Download the daily series as CSV"
                    >
                        <Download className="h-4 w-4" /> CSV
                    </button>
                </div>
            </div>
            <div className="h-[360px] w-full">
                <ResponsiveContainer width="100%" height="100%">
                    <ComposedChart data={chartData} margin={{ top: 5, right: 10, bottom: 5, left: 0 }}>
                        <CartesianGrid strokeDasharray="3 3" opacity={0.2} />
                        <XAxis
                            dataKey="time"
                            type="number"
                            scale="time"
                            domain={['dataMin', 'dataMax']}
                            tick={{ fontSize: 12 }}
                            tickFormatter={(val: number) => formatDate(new Date(val))}
                            minTickGap={30}
                        />
                        <YAxis
                            tick={{ fontSize: 12 }}
                            width={50}
                            domain={['auto', 'auto']}
                            label={{ value: 'Water Height (mm)', angle: -90, position: 'insideLeft', fontSize: 12 }}
                        />
                        <Tooltip
                            contentStyle={{ backgroundColor: 'hsl(var(--popover))', borderColor: 'hsl(var(--border))', borderRadius: 'var(--radius)' }}
                            labelFormatter={(label) => `Date: ${formatDate(new Date(Number(label)))}`}
                            formatter={(value, _name, item) => {
                                const acceleration = pointsByTime.get(Number(item.payload?.time))?.normalizedAcceleration ?? 0;
                                return [`${Number(value).toFixed(0)} mm (acceleration ${acceleration.toFixed(4)})`, 'Water Height'];
                            }}
                        />
                        <Line
                            dataKey="waterHeight"
                            stroke="rgba(0,0,0,0.2)"
                            strokeWidth={4}
                            dot={false}
                            activeDot={false}
                            isAnimationActive={false}
                            tooltipType="none"
                        />
                        <Scatter dataKey="waterHeight" isAnimationActive={false}>
                            {chartData.map(p => (
                                <Cell key={p.time} fill={p.color} stroke={p.color} />
                            ))}
                        </Scatter>
                        <Brush
                            key={brushKey}
                            dataKey="time"
                            height={28}
                            stroke="#ef4444"
                            tickFormatter={(val: number) => formatDate(new Date(val))}
                            onChange={handleBrushChange}
                        />
                    </ComposedChart>
                </ResponsiveContainer>
            </div>
        </div>
    );
}
