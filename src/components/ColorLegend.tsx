import type { ColorScale } from '../lib/colorScales';

interface ColorLegendProps {
    title: string;
    scale: ColorScale;
    ticks: readonly { value: number; label: string }[];
    domain?: readonly [number, number];
}

export function ColorLegend({ title, scale, ticks, domain = [0, 1] }: ColorLegendProps) {
    const [min, max] = domain;
    const gradient = `linear-gradient(to right, ${scale.map(([pos, color]) => `${color} ${pos * 100}%`).join(', ')})`;

    return (
        <div className="text-xs text-muted-foreground w-56" aria-label={title}>
            <div className="font-medium text-foreground mb-1">{title}</div>
            <div className="h-3 rounded border border-border" style={{ background: gradient }} />
            <div className="relative h-4 mt-1">
                {ticks.map(tick => {
                    const left = max > min ? ((tick.value - min) / (max - min)) * 100 : 0;
                    return (
                        <span
                            key={tick.value}
                            className="absolute -translate-x-1/2 whitespace-nowrap"
                            style={{ left: `${left}%` }}
                        >
                            {tick.label}
                        </span>
                    );
                })}
            </div>
        </div>
    );
}
