export type ColorStop = readonly [position: number, color: string];
export type ColorScale = readonly ColorStop[];

/** Burnt orange for strong deceleration, grey around zero, deep purple for strong acceleration. */
export const ACCELERATION_COLOR_SCALE: ColorScale = [
    [0.0, '#D55E00'],
    [0.5, 'rgba(128,128,128,0.1)'],
    [1.0, '#4B0082']
];

export const ACCELERATION_DOMAIN: readonly [number, number] = [-1, 1];

export const ACCELERATION_TICKS = [
    { value: -1, label: 'Strongest deceleration' },
    { value: 0, label: 'Usual' },
    { value: 1, label: 'Strongest acceleration' }
] as const;

// Turbo, sampled
export const VARIATION_COLOR_SCALE: ColorScale = [
    [0.0, '#30123B'],
    [0.1, '#4662D7'],
    [0.2, '#36AAF9'],
    [0.3, '#1AE4B6'],
    [0.4, '#72FE5E'],
    [0.5, '#C8EF34'],
    [0.6, '#FABA39'],
    [0.7, '#F66B19'],
    [0.8, '#CA2A04'],
    [0.9, '#A91601'],
    [1.0, '#7A0403']
];

export const VARIATION_TICKS = [
    { value: 0, label: 'Lowest' },
    { value: 0.5, label: 'Medium' },
    { value: 1, label: 'Highest' }
] as const;

interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}

const HEX = /^#([0-9a-f]{6})$/i;
const RGBA = /^rgba?\(\s*([\d.]+)\s*,\s*([\d.]+)\s*,\s*([\d.]+)\s*(?:,\s*([\d.]+)\s*)?\)$/i;

export function parseColor(color: string): Rgba | null {
    const hex = HEX.exec(color);
    if (hex) {
        const value = hex[1];
        return {
            r: parseInt(value.slice(0, 2), 16),
            g: parseInt(value.slice(2, 4), 16),
            b: parseInt(value.slice(4, 6), 16),
            a: 1
        };
    }
    const rgba = RGBA.exec(color);
    if (rgba) {
        return {
            r: Number(rgba[1]),
            g: Number(rgba[2]),
            b: Number(rgba[3]),
            a: rgba[4] === undefined ? 1 : Number(rgba[4])
        };
    }
    return null;
}

function formatRgba({ r, g, b, a }: Rgba): string {
    const round = (n: number) => Math.round(n * 1000) / 1000;
    return `rgba(${Math.round(r)},${Math.round(g)},${Math.round(b)},${round(a)})`;
}

/**
 * Linear interpolation along a color scale.
 * Positions outside [0, 1] are clamped; a non-finite position maps to 0.
 */
export function sampleColorScale(scale: ColorScale, position: number): string {
    if (scale.length === 0) {
        throw new Error('Color scale needs at least one stop');
    }
    const t = Number.isFinite(position) ? Math.max(0, Math.min(1, position)) : 0;

    let lower = scale[0];
    let upper = scale[scale.length - 1];
    for (let i = 0; i < scale.length - 1; i++) {
        if (t >= scale[i][0] && t <= scale[i + 1][0]) {
            lower = scale[i];
            upper = scale[i + 1];
            break;
        }
    }

    const from = parseColor(lower[1]);
    const to = parseColor(upper[1]);
    if (!from || !to) {
        throw new Error(`Unsupported color in scale: ${!from ? lower[1] : upper[1]}`);
    }

    const span = upper[0] - lower[0];
    const f = span > 0 ? (t - lower[0]) / span : 0;
    return formatRgba({
        r: from.r + (to.r - from.r) * f,
        g: from.g + (to.g - from.g) * f,
        b: from.b + (to.b - from.b) * f,
        a: from.a + (to.a - from.a) * f
    });
}

/** Maps a normalized acceleration in [-1, 1] onto the diverging scale. */
export function accelerationColor(normalizedAcceleration: number): string {
    const [min, max] = ACCELERATION_DOMAIN;
    return sampleColorScale(ACCELERATION_COLOR_SCALE, (normalizedAcceleration - min) / (max - min));
}

export function variationColor(variationNorm: number): string {
    return sampleColorScale(VARIATION_COLOR_SCALE, variationNorm);
}
