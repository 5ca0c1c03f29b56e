import { UnorderedGridsError } from '../errors.js';
import { MONTH_NAMES, weekdayLabels } from './calendar.js';
import type { ColorScale, GridOptions, HeatmapLayout, Legend, LegendTick, MonthGrid, Panel } from '../adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Heatmap Composer — month panels in a fixed-column matrix
//  plus one legend shared by every panel
// ══════════════════════════════════════════════════════════════

export const DEFAULT_COLUMN_COUNT = 4;
export const LEGEND_LABEL = 'Daily Return %';

export interface ComposeOptions extends GridOptions {
    columnCount: number;
    scale: ColorScale;
}

export function monthAverage(grid: MonthGrid): number {
    let sum = 0;
    let count = 0;
    for (const week of grid.weeks) {
        for (const cell of week) {
            if (cell.kind !== 'value') continue;
            sum += cell.value;
            count++;
        }
    }
    return count === 0 ? NaN : sum / count;
}

export function formatAverage(average: number): string {
    return `Avg Daily Return:\n${average.toFixed(2)}%`;
}

export function legendTicks(domainMin: number, domainMax: number): LegendTick[] {
    const range = domainMax - domainMin;
    const step = range <= 10 ? 1 : Math.ceil(range / 10);
    const ticks: LegendTick[] = [];
    for (let v = Math.ceil(domainMin / step) * step; v <= domainMax; v += step) {
        ticks.push({ value: v, position: (v - domainMin) / range });
    }
    return ticks;
}

export function buildLegend(scale: ColorScale): Legend {
    return {
        label: LEGEND_LABEL,
        domainMin: scale.domainMin,
        domainMax: scale.domainMax,
        stops: scale.stops,
        ticks: legendTicks(scale.domainMin, scale.domainMax),
    };
}

function assertAscending(grids: readonly MonthGrid[]): void {
    for (let i = 1; i < grids.length; i++) {
        const prev = grids[i - 1];
        const cur = grids[i];
        if (cur.year * 12 + cur.month <= prev.year * 12 + prev.month) {
            throw new UnorderedGridsError(
                `Month ${cur.year}-${cur.month} at index ${i} does not follow ${prev.year}-${prev.month}`,
            );
        }
    }
}

/**
 * Lay month grids out row-major, `columnCount` per row. Grids must be
 * sorted ascending by (year, month); panel index follows that order.
 */
export function composeHeatmap(grids: readonly MonthGrid[], options: ComposeOptions): HeatmapLayout {
    const { columnCount, scale } = options;
    if (!Number.isInteger(columnCount) || columnCount < 1) {
        throw new RangeError(`Invalid column count: ${columnCount}`);
    }
    assertAscending(grids);

    const panels: Panel[] = grids.map((grid, index) => {
        const average = monthAverage(grid);
        return {
            index,
            row: Math.floor(index / columnCount),
            column: index % columnCount,
            title: `${MONTH_NAMES[grid.month - 1]} ${grid.year}`,
            grid,
            average,
            averageLabel: formatAverage(average),
        };
    });

    const rowCount = Math.ceil(grids.length / columnCount);
    const blankSlots: { row: number; column: number }[] = [];
    for (let i = grids.length; i < rowCount * columnCount; i++) {
        blankSlots.push({ row: Math.floor(i / columnCount), column: i % columnCount });
    }

    return {
        columnCount,
        rowCount,
        columnLabels: weekdayLabels(options.weekStart, options.weekdayCount),
        panels,
        blankSlots,
        legend: buildLegend(scale),
    };
}
