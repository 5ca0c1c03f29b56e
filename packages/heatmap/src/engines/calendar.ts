import type { ColorMapper } from './color.js';
import { NO_DATA_COLOR } from './color.js';
import type { CalendarCell, GridOptions, IsoDate, MonthGrid, PaddingCell } from '../adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Month Grid Builder — weekday calendar rows for one month
// ══════════════════════════════════════════════════════════════

export const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export const DEFAULT_GRID_OPTIONS: GridOptions = { weekStart: 0, weekdayCount: 5 };

const PADDING: PaddingCell = {
    kind: 'padding',
    dayOfMonth: null,
    value: null,
    color: null,
    label: '',
};

function assertMonth(year: number, month: number): void {
    if (!Number.isInteger(year) || year < 1) {
        throw new RangeError(`Invalid year: ${year}`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
        throw new RangeError(`Invalid month: ${month}`);
    }
}

function assertGridOptions({ weekStart, weekdayCount }: GridOptions): void {
    if (!Number.isInteger(weekStart) || weekStart < 0 || weekStart > 6) {
        throw new RangeError(`Invalid week start: ${weekStart}`);
    }
    if (!Number.isInteger(weekdayCount) || weekdayCount < 1 || weekdayCount > 7) {
        throw new RangeError(`Invalid weekday count: ${weekdayCount}`);
    }
}

export function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
    if (month === 2) return isLeapYear(year) ? 29 : 28;
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Day of week in the proleptic Gregorian calendar, 0 = Monday … 6 = Sunday.
 */
export function weekdayOf(year: number, month: number, day: number): number {
    // setUTCFullYear, not Date.UTC: the latter maps years 0–99 onto 1900–1999.
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    return (date.getUTCDay() + 6) % 7;
}

export function isoDate(year: number, month: number, day: number): IsoDate {
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Full 7-slot weeks covering the month, 0 marking days outside it.
 */
export function monthCalendar(year: number, month: number, weekStart = 0): number[][] {
    assertMonth(year, month);
    assertGridOptions({ weekStart, weekdayCount: 7 });

    const lead = (weekdayOf(year, month, 1) - weekStart + 7) % 7;
    const days = daysInMonth(year, month);
    const rows = Math.ceil((lead + days) / 7);

    const weeks: number[][] = [];
    for (let w = 0; w < rows; w++) {
        const week: number[] = [];
        for (let slot = 0; slot < 7; slot++) {
            const day = w * 7 + slot - lead + 1;
            week.push(day >= 1 && day <= days ? day : 0);
        }
        weeks.push(week);
    }
    return weeks;
}

export function weekdayLabels(weekStart = 0, weekdayCount = 5): string[] {
    assertGridOptions({ weekStart, weekdayCount });
    return Array.from({ length: weekdayCount }, (_, i) => WEEKDAY_NAMES[(weekStart + i) % 7]);
}

export function formatCellLabel(day: number, value: number): string {
    return `${day}\n${value.toFixed(2)}%`;
}

export function buildMonthGrid(
    year: number,
    month: number,
    values: ReadonlyMap<IsoDate, number>,
    mapper: ColorMapper,
    options: GridOptions = DEFAULT_GRID_OPTIONS,
): MonthGrid {
    assertGridOptions(options);

    const weeks = monthCalendar(year, month, options.weekStart).map((week) =>
        week.slice(0, options.weekdayCount).map((day): CalendarCell => {
            if (day === 0) return PADDING;

            const value = values.get(isoDate(year, month, day));
            if (value === undefined) {
                return { kind: 'no-data', dayOfMonth: day, value: null, color: NO_DATA_COLOR, label: '' };
            }
            return {
                kind: 'value',
                dayOfMonth: day,
                value,
                color: mapper.map(value),
                label: formatCellLabel(day, value),
            };
        }),
    );

    return { year, month, weeks };
}
