// ══════════════════════════════════════════════════════════════
//  Shared Data Schemas — series, grids, colors and layout
// ══════════════════════════════════════════════════════════════

/** Calendar date as `YYYY-MM-DD`. */
export type IsoDate = string;

// ── Input series ──────────────────────────────
export interface PriceBar {
    date: IsoDate;
    close: number;
}

export interface DailyValue {
    readonly date: IsoDate;
    readonly value: number;     // percent, e.g. 1.25 = +1.25%
}

/** Strictly increasing by date, no duplicates. */
export type ReturnSeries = readonly DailyValue[];

export interface MonthBucket {
    year: number;
    month: number;              // 1–12
    values: ReadonlyMap<IsoDate, number>;
}

// ── Colors ────────────────────────────────────
export interface Color {
    r: number;                  // 0–255
    g: number;
    b: number;
}

export interface ColorStop {
    position: number;           // 0–1
    color: Color;
}

export interface ColorScale {
    domainMin: number;
    domainMax: number;
    stops: readonly ColorStop[];   // ascending by position
}

// ── Calendar grid ─────────────────────────────
export interface PaddingCell {
    kind: 'padding';
    dayOfMonth: null;
    value: null;
    color: null;
    label: '';
}

export interface NoDataCell {
    kind: 'no-data';
    dayOfMonth: number;
    value: null;
    color: Color;
    label: '';
}

export interface ValueCell {
    kind: 'value';
    dayOfMonth: number;
    value: number;              // unclipped
    color: Color;
    label: string;
}

export type CalendarCell = PaddingCell | NoDataCell | ValueCell;

export type WeekRow = readonly CalendarCell[];

export interface MonthGrid {
    year: number;
    month: number;
    weeks: readonly WeekRow[];
}

export interface GridOptions {
    weekStart: number;          // 0 = Monday … 6 = Sunday
    weekdayCount: number;       // columns kept per week, from weekStart
}

// ── Composite layout ──────────────────────────
export interface Panel {
    index: number;
    row: number;
    column: number;
    title: string;
    grid: MonthGrid;
    average: number;            // NaN when the month has no values
    averageLabel: string;
}

export interface LegendTick {
    value: number;
    position: number;           // 0–1 along the strip
}

export interface Legend {
    label: string;
    domainMin: number;
    domainMax: number;
    stops: readonly ColorStop[];
    ticks: readonly LegendTick[];
}

export interface HeatmapLayout {
    columnCount: number;
    rowCount: number;
    columnLabels: readonly string[];
    panels: readonly Panel[];
    blankSlots: readonly { row: number; column: number }[];
    legend: Legend;
}

// ── Data source ───────────────────────────────
export interface DateWindow {
    start: Date;
    end: Date;
}

export interface SeriesSource {
    readonly name: string;
    fetchDailyCloses(symbol: string, window: DateWindow): Promise<PriceBar[]>;
}
