import { InvalidColorScaleError } from '../errors.js';
import type { Color, ColorScale, ColorStop } from '../adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Color Mapper — diverging red → white → green scale
//  Values are clipped to the domain, normalized to [0, 1] and
//  interpolated per channel between the bracketing stops.
// ══════════════════════════════════════════════════════════════

export const WHITE: Color = { r: 255, g: 255, b: 255 };
export const NO_DATA_COLOR: Color = WHITE;

export function parseHex(hex: string): Color {
    const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
    if (!m) throw new InvalidColorScaleError(`Invalid hex color: ${hex}`);
    return {
        r: parseInt(m[1], 16),
        g: parseInt(m[2], 16),
        b: parseInt(m[3], 16),
    };
}

export function toHex({ r, g, b }: Color): string {
    return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('');
}

export function sameColor(a: Color, b: Color): boolean {
    return a.r === b.r && a.g === b.g && a.b === b.b;
}

export const DEFAULT_STOPS: readonly ColorStop[] = [
    { position: 0.0, color: parseHex('#8B0000') },  // dark red at domain min
    { position: 0.4, color: parseHex('#FF6347') },
    { position: 0.5, color: WHITE },
    { position: 0.6, color: parseHex('#90EE90') },
    { position: 1.0, color: parseHex('#006400') },  // dark green at domain max
];

export const DEFAULT_DOMAIN_MIN = -5;
export const DEFAULT_DOMAIN_MAX = 5;

function interpolate(stops: readonly ColorStop[], t: number): Color {
    let i = 0;
    while (i < stops.length - 2 && t > stops[i + 1].position) i++;

    const lo = stops[i];
    const hi = stops[i + 1];
    const f = (t - lo.position) / (hi.position - lo.position);
    const lerp = (a: number, b: number) => Math.round(a + (b - a) * f);

    return {
        r: lerp(lo.color.r, hi.color.r),
        g: lerp(lo.color.g, hi.color.g),
        b: lerp(lo.color.b, hi.color.b),
    };
}

/**
 * Build a validated scale. Stops must start at 0, end at 1, increase
 * strictly, and resolve to white at the midpoint.
 */
export function createColorScale(partial: Partial<ColorScale> = {}): ColorScale {
    const domainMin = partial.domainMin ?? DEFAULT_DOMAIN_MIN;
    const domainMax = partial.domainMax ?? DEFAULT_DOMAIN_MAX;
    const stops = partial.stops ?? DEFAULT_STOPS;

    if (!Number.isFinite(domainMin) || !Number.isFinite(domainMax) || domainMin >= domainMax) {
        throw new InvalidColorScaleError(`Domain [${domainMin}, ${domainMax}] is empty or not finite`);
    }
    // Zero must normalize to 0.5 so it lands on the white stop.
    if (domainMin !== -domainMax) {
        throw new InvalidColorScaleError(`Domain [${domainMin}, ${domainMax}] must be centered on zero`);
    }
    if (stops.length < 2) {
        throw new InvalidColorScaleError('A color scale needs at least two stops');
    }
    if (stops[0].position !== 0 || stops[stops.length - 1].position !== 1) {
        throw new InvalidColorScaleError('Stops must start at position 0 and end at position 1');
    }
    for (let i = 1; i < stops.length; i++) {
        if (stops[i].position <= stops[i - 1].position) {
            throw new InvalidColorScaleError(`Stop positions must increase strictly (index ${i})`);
        }
    }
    if (!sameColor(interpolate(stops, 0.5), WHITE)) {
        throw new InvalidColorScaleError('Scale must resolve to white at position 0.5');
    }

    return { domainMin, domainMax, stops: [...stops] };
}

export class ColorMapper {
    constructor(readonly scale: ColorScale) { }

    clip(value: number): number {
        const { domainMin, domainMax } = this.scale;
        return Math.min(Math.max(value, domainMin), domainMax);
    }

    normalize(value: number): number {
        const { domainMin, domainMax } = this.scale;
        return (this.clip(value) - domainMin) / (domainMax - domainMin);
    }

    map(value: number): Color {
        return interpolate(this.scale.stops, this.normalize(value));
    }
}
