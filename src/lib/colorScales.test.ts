import { describe, expect, it } from 'vitest';
import { accelerationColor, parseColor, sampleColorScale, variationColor } from './colorScales';

describe('accelerationColor', () => {
    it('hits the three anchor colors', () => {
        expect(accelerationColor(-1)).toBe('rgba(213,94,0,1)');
        expect(accelerationColor(0)).toBe('rgba(128,128,128,0.1)');
        expect(accelerationColor(1)).toBe('rgba(75,0,130,1)');
    });

    it('interpolates between anchors', () => {
        expect(accelerationColor(-0.5)).toBe('rgba(171,111,64,0.55)');
    });
});

describe('variationColor', () => {
    it('clamps out-of-range and non-finite positions', () => {
        expect(variationColor(2)).toBe('rgba(122,4,3,1)');
        expect(variationColor(-1)).toBe('rgba(48,18,59,1)');
        expect(variationColor(Number.NaN)).toBe('rgba(48,18,59,1)');
    });
});

describe('sampleColorScale', () => {
    it('rejects an empty scale', () => {
        expect(() => sampleColorScale([], 0.5)).toThrow('Color scale needs at least one stop');
    });

    it('rejects colors it cannot parse', () => {
        expect(() => sampleColorScale([[0, 'red'], [1, '#000000']], 0.2)).toThrow('Unsupported color in scale: red');
    });
});

describe('parseColor', () => {
    it('reads hex and rgba notations', () => {
        expect(parseColor('#4B0082')).toEqual({ r: 75, g: 0, b: 130, a: 1 });
        expect(parseColor('rgb(1, 2, 3)')).toEqual({ r: 1, g: 2, b: 3, a: 1 });
        expect(parseColor('hsl(0, 0%, 0%)')).toBeNull();
    });
});
