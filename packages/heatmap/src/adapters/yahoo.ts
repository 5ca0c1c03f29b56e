import { z } from 'zod';
import { logger } from '../logger.js';
import { FetchFailedError, MissingRequiredFieldError } from '../errors.js';
import type { DateWindow, PriceBar, SeriesSource } from './types.js';

// ══════════════════════════════════════════════════════════════
//  Yahoo Adapter — daily closes via the public chart endpoint
// ══════════════════════════════════════════════════════════════

const DEFAULT_BASE = 'https://query1.finance.yahoo.com';

// Preferred first: adjusted closes match an auto-adjusted download.
const CLOSE_COLUMNS = ['adjclose', 'close'] as const;

const priceColumn = z.array(z.number().nullable());

const chartSchema = z.object({
    chart: z.object({
        result: z
            .array(
                z.object({
                    meta: z.object({ gmtoffset: z.number().default(0) }).passthrough(),
                    timestamp: z.array(z.number()).optional(),
                    indicators: z.object({
                        quote: z.array(z.object({ close: priceColumn.optional() }).passthrough()).default([]),
                        adjclose: z.array(z.object({ adjclose: priceColumn.optional() })).optional(),
                    }),
                }),
            )
            .nullable(),
        error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
    }),
});

export type ChartResponse = z.infer<typeof chartSchema>;

export class YahooChartAdapter implements SeriesSource {
    readonly name = 'yahoo';

    constructor(
        private readonly baseUrl: string = DEFAULT_BASE,
        private readonly fetchImpl: typeof fetch = (input, init) => fetch(input, init),
    ) { }

    /**
     * Fetch daily closes for `symbol` within the window, oldest first.
     * Returns an empty list when the provider has no rows.
     */
    async fetchDailyCloses(symbol: string, window: DateWindow): Promise<PriceBar[]> {
        const period1 = Math.floor(window.start.getTime() / 1000);
        const period2 = Math.floor(window.end.getTime() / 1000);
        const url =
            `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}` +
            `?period1=${period1}&period2=${period2}&interval=1d&events=history`;

        logger.debug({ symbol, url }, 'Fetching daily closes from Yahoo');

        let body: unknown;
        try {
            const res = await this.fetchImpl(url, { headers: { 'User-Agent': 'Mozilla/5.0' } });
            if (!res.ok) throw new FetchFailedError(`Yahoo chart request failed with HTTP ${res.status}`, res.status);
            body = await res.json();
        } catch (err) {
            logger.error({ err, symbol }, 'Yahoo chart fetch failed');
            if (err instanceof FetchFailedError) throw err;
            throw new FetchFailedError(`Yahoo chart request failed: ${err instanceof Error ? err.message : String(err)}`);
        }

        const parsed = chartSchema.safeParse(body);
        if (!parsed.success) {
            throw new FetchFailedError(`Unexpected Yahoo chart payload: ${parsed.error.issues[0].message}`);
        }
        return parseChart(parsed.data);
    }
}

/**
 * Pick the close column and pair it with exchange-local calendar dates.
 * Null closes are skipped; a repeated date keeps its last row.
 */
export function parseChart(payload: ChartResponse): PriceBar[] {
    const { result, error } = payload.chart;
    if (error) throw new FetchFailedError(`Yahoo chart error ${error.code}: ${error.description}`);

    const series = result?.[0];
    const timestamps = series?.timestamp ?? [];
    if (!series || timestamps.length === 0) return [];

    const columns: Record<(typeof CLOSE_COLUMNS)[number], (number | null)[] | undefined> = {
        adjclose: series.indicators.adjclose?.[0]?.adjclose,
        close: series.indicators.quote[0]?.close,
    };
    const column = CLOSE_COLUMNS.find((name) => columns[name] !== undefined);
    const closes = column === undefined ? undefined : columns[column];
    if (!closes) throw new MissingRequiredFieldError('Close');

    const byDate = new Map<string, number>();
    timestamps.forEach((ts, i) => {
        const close = closes[i];
        if (close === null || close === undefined) return;
        const date = new Date((ts + series.meta.gmtoffset) * 1000).toISOString().slice(0, 10);
        byDate.set(date, close);
    });

    return [...byDate.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, close]) => ({ date, close }));
}
