import { z } from 'zod';
import { EmptyInputError, InvalidSeriesError } from '../errors.js';
import { daysInMonth } from './calendar.js';
import type { DailyValue, IsoDate, MonthBucket, PriceBar, ReturnSeries } from '../adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Return Series — daily % change, validation, month buckets
// ══════════════════════════════════════════════════════════════

const isoDateSchema = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .refine((s) => {
        const [y, m, d] = s.split('-').map(Number);
        return y >= 1 && m >= 1 && m <= 12 && d >= 1 && d <= daysInMonth(y, m);
    }, 'not a calendar date');

const dailyValueSchema = z.object({
    date: isoDateSchema,
    value: z.number().finite(),
});

/**
 * Day-over-day percentage change of consecutive closes. The first bar
 * has no predecessor and produces no value.
 */
export function computeDailyReturns(bars: readonly PriceBar[]): DailyValue[] {
    const out: DailyValue[] = [];
    for (let i = 1; i < bars.length; i++) {
        const prev = bars[i - 1].close;
        if (prev === 0) continue;
        out.push({ date: bars[i].date, value: (bars[i].close / prev - 1) * 100 });
    }
    return out;
}

/**
 * Validate a caller-supplied series: calendar dates, finite values,
 * strictly increasing without duplicates.
 */
export function createReturnSeries(values: readonly DailyValue[]): ReturnSeries {
    if (values.length === 0) throw new EmptyInputError();

    const series: DailyValue[] = [];
    values.forEach((entry, i) => {
        const parsed = dailyValueSchema.safeParse(entry);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new InvalidSeriesError(`Entry ${i}: ${issue.path.join('.') || 'value'} ${issue.message}`);
        }
        const prev = series[series.length - 1];
        if (prev && parsed.data.date <= prev.date) {
            throw new InvalidSeriesError(
                `Entry ${i}: ${parsed.data.date} does not follow ${prev.date} (dates must strictly increase)`,
            );
        }
        series.push(Object.freeze({ date: parsed.data.date, value: parsed.data.value }));
    });

    return Object.freeze(series);
}

/**
 * Split a series into (year, month) buckets, ascending.
 */
export function groupByMonth(series: ReturnSeries): MonthBucket[] {
    const buckets = new Map<string, { year: number; month: number; values: Map<IsoDate, number> }>();

    for (const { date, value } of series) {
        const key = date.slice(0, 7);
        let bucket = buckets.get(key);
        if (!bucket) {
            bucket = { year: Number(date.slice(0, 4)), month: Number(date.slice(5, 7)), values: new Map() };
            buckets.set(key, bucket);
        }
        bucket.values.set(date, value);
    }

    return [...buckets.values()].sort((a, b) => a.year - b.year || a.month - b.month);
}
