import { logger } from './logger.js';
import { computeDailyReturns } from './engines/returns.js';
import { isoDate } from './engines/calendar.js';
import { renderCalendarHeatmap, type HeatmapOptions } from './pipeline.js';
import { saveHeatmap } from './render/raster.js';
import { EmptyInputError } from './errors.js';
import type { SeriesSource } from './adapters/types.js';

// ══════════════════════════════════════════════════════════════
//  Heatmap Job — fetch → returns → render → save, for one subject
// ══════════════════════════════════════════════════════════════

const DAY_MS = 86_400_000;

export interface HeatmapJob {
    subject: string;
    source: SeriesSource;
    saveDir: string;
    lookbackDays: number;
    options: Partial<HeatmapOptions>;
    now?: Date;
}

export function normalizeSubject(raw: string): string {
    return raw.trim().toUpperCase();
}

/** Calendar date on the local clock, as the user reads "today". */
export function localIsoDate(date: Date): string {
    return isoDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export async function generateHeatmap(job: HeatmapJob): Promise<string> {
    const subject = normalizeSubject(job.subject);
    if (subject === '') throw new EmptyInputError('No ticker symbol entered.');

    const end = job.now ?? new Date();
    const start = new Date(end.getTime() - job.lookbackDays * DAY_MS);

    const bars = await job.source.fetchDailyCloses(subject, { start, end });
    logger.info({ subject, source: job.source.name, bars: bars.length }, 'Fetched daily closes');

    const series = computeDailyReturns(bars);
    if (series.length === 0) throw new EmptyInputError();

    const { image } = await renderCalendarHeatmap({
        subject,
        series,
        window: { start: localIsoDate(start), end: localIsoDate(end) },
        options: job.options,
    });

    return saveHeatmap(image, job.saveDir, subject);
}
