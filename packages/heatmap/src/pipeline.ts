import { logger } from './logger.js';
import { ColorMapper, createColorScale } from './engines/color.js';
import { buildMonthGrid, DEFAULT_GRID_OPTIONS, weekdayOf } from './engines/calendar.js';
import { composeHeatmap, DEFAULT_COLUMN_COUNT } from './engines/composer.js';
import { createReturnSeries, groupByMonth } from './engines/returns.js';
import { renderSvg, DEFAULT_PRESENTATION, type PresentationConfig } from './render/svg.js';
import { rasterize, type ImageFormat, type RenderedImage } from './render/raster.js';
import type { ColorScale, DailyValue, HeatmapLayout, IsoDate, ReturnSeries } from './adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Rendering Pass — series → month grids → layout → image
//  Every pass owns its scale, grids and layout; nothing is shared.
// ══════════════════════════════════════════════════════════════

export interface HeatmapOptions {
    scale: ColorScale;
    columnCount: number;
    weekStart: number;
    weekdayCount: number;
    presentation: PresentationConfig;
    format: ImageFormat;
    density: number;
}

export interface RenderRequest {
    subject: string;
    series: readonly DailyValue[];
    window?: { start: IsoDate; end: IsoDate };
    options?: Partial<HeatmapOptions>;
}

export interface HeatmapResult {
    layout: HeatmapLayout;
    svg: string;
    image: RenderedImage;
}

export function resolveOptions(options: Partial<HeatmapOptions> = {}): HeatmapOptions {
    return {
        scale: options.scale ?? createColorScale(),
        columnCount: options.columnCount ?? DEFAULT_COLUMN_COUNT,
        weekStart: options.weekStart ?? DEFAULT_GRID_OPTIONS.weekStart,
        weekdayCount: options.weekdayCount ?? DEFAULT_GRID_OPTIONS.weekdayCount,
        presentation: options.presentation ?? DEFAULT_PRESENTATION,
        format: options.format ?? 'png',
        density: options.density ?? 300,
    };
}

/** Dates whose weekday falls outside the kept columns. */
export function countHiddenDates(series: ReturnSeries, weekStart: number, weekdayCount: number): number {
    return series.filter(({ date }) => {
        const [y, m, d] = date.split('-').map(Number);
        return (weekdayOf(y, m, d) - weekStart + 7) % 7 >= weekdayCount;
    }).length;
}

/**
 * Synchronous core: validate the series, build one grid per month
 * present and lay them out. Throws EmptyInputError before any grid
 * is built when the series is empty.
 */
export function buildHeatmapLayout(values: readonly DailyValue[], options: Partial<HeatmapOptions> = {}): HeatmapLayout {
    const resolved = resolveOptions(options);
    const series = createReturnSeries(values);
    const mapper = new ColorMapper(resolved.scale);
    const gridOptions = { weekStart: resolved.weekStart, weekdayCount: resolved.weekdayCount };

    const hidden = countHiddenDates(series, resolved.weekStart, resolved.weekdayCount);
    if (hidden > 0) logger.debug({ hidden }, 'Skipping dates outside the weekday columns');

    const grids = groupByMonth(series).map(({ year, month, values }) =>
        buildMonthGrid(year, month, values, mapper, gridOptions),
    );

    return composeHeatmap(grids, { ...gridOptions, columnCount: resolved.columnCount, scale: resolved.scale });
}

export function heatmapHeading(subject: string, series: readonly DailyValue[], window?: { start: IsoDate; end: IsoDate }) {
    const start = window?.start ?? series[0]?.date;
    const end = window?.end ?? series[series.length - 1]?.date;
    return {
        title: `${subject} Daily Return Calendar Heatmap`,
        subtitle: start && end ? `(${start} to ${end})` : undefined,
    };
}

export async function renderCalendarHeatmap(request: RenderRequest): Promise<HeatmapResult> {
    const options = resolveOptions(request.options);
    const layout = buildHeatmapLayout(request.series, options);

    logger.info(
        { subject: request.subject, months: layout.panels.length, rows: layout.rowCount },
        'Rendering calendar heatmap',
    );

    const svg = renderSvg(layout, heatmapHeading(request.subject, request.series, request.window), options.presentation);
    const image = await rasterize(svg, options.format, options.density);
    return { layout, svg, image };
}
