import React from 'react';
import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { WaterTrendChart } from './WaterTrendChart';
import type { DailyAggregate } from '../types';

// Mock Recharts ResponsiveContainer
vi.mock('recharts', async () => {
    const OriginalModule = await vi.importActual('recharts');
    return {
        ...OriginalModule,
        ResponsiveContainer: ({ children }: { children: React.ReactElement }) => (
            <div style={{ width: 800, height: 400 }}>
                {React.cloneElement(children, { width: 800, height: 400 })}
            </div>
        ),
    };
});

const point = (iso: string, waterHeight: number, normalizedAcceleration: number): DailyAggregate => ({
    date: new Date(`${iso}T00:00:00.000Z`),
    waterHeight,
    deltaHeight: 0,
    deltaTimeSeconds: 0,
    velocity: 0,
    acceleration: 0,
    normalizedAcceleration
});

const handlers = () => ({
    onSelectionChange: vi.fn(),
    onResetSelection: vi.fn(),
    onExport: vi.fn()
});

describe('WaterTrendChart', () => {
    it('shows a placeholder for an empty window', () => {
        render(<WaterTrendChart points={[]} brushKey={0} hasSelection={false} {...handlers()} />);
        expect(screen.getByText('No water level data for this window')).toBeInTheDocument();
    });

    it('renders the series with its legend and controls', async () => {
        const callbacks = handlers();
        const points = [point('2024-05-01', 10, 0), point('2024-05-02', 12, 0), point('2024-05-03', 11, -1)];
        render(<WaterTrendChart points={points} brushKey={0} hasSelection={false} {...callbacks} />);

        expect(screen.getByText('Water Height Colored by Acceleration')).toBeInTheDocument();
        expect(screen.getByText('Strongest deceleration')).toBeInTheDocument();
        expect(screen.getByRole('button', { name: /reset selection/i })).toBeDisabled();

        await userEvent.click(screen.getByTitle('Download the daily series as CSV'));
        expect(callbacks.onExport).toHaveBeenCalledTimes(1);
    });

    it('enables the reset button while a selection is active', async () => {
        const callbacks = handlers();
        render(<WaterTrendChart points={[point('2024-05-01', 10, 0), point('2024-05-02', 12, 0)]} brushKey={1} hasSelection {...callbacks} />);

        await userEvent.click(screen.getByRole('button', { name: /reset selection/i }));
        expect(callbacks.onResetSelection).toHaveBeenCalledTimes(1);
    });
});
