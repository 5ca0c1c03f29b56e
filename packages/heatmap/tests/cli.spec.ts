import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { generateHeatmap, localIsoDate, normalizeSubject } from '../src/cli.js';
import { EmptyInputError, MissingRequiredFieldError } from '../src/errors.js';
import type { DateWindow, PriceBar, SeriesSource } from '../src/adapters/types.js';

class FakeSource implements SeriesSource {
    readonly name = 'fake';
    readonly calls: { symbol: string; window: DateWindow }[] = [];

    constructor(private readonly bars: PriceBar[] | Error) { }

    async fetchDailyCloses(symbol: string, window: DateWindow): Promise<PriceBar[]> {
        this.calls.push({ symbol, window });
        if (this.bars instanceof Error) throw this.bars;
        return this.bars;
    }
}

const BARS: PriceBar[] = [
    { date: '2024-07-01', close: 100 },
    { date: '2024-07-02', close: 102 },
    { date: '2024-07-03', close: 96.9 },
    { date: '2024-07-05', close: 96.9 },
];

describe('generateHeatmap', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'heatmap-cli-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const job = (source: SeriesSource, subject = ' spy ') => ({
        subject,
        source,
        saveDir: dir,
        lookbackDays: 365,
        options: { format: 'svg' as const },
        now: new Date(2024, 6, 31, 12),
    });

    it('fetches the trailing window and writes the heatmap', async () => {
        const source = new FakeSource(BARS);
        const path = await generateHeatmap(job(source));

        expect(path).toBe(join(dir, 'SPY_calendar_heatmap.svg'));
        expect(source.calls).toHaveLength(1);
        expect(source.calls[0].symbol).toBe('SPY');
        expect(localIsoDate(source.calls[0].window.start)).toBe('2023-08-01');

        const svg = await readFile(path, 'utf8');
        expect(svg).toContain('>SPY Daily Return Calendar Heatmap</tspan>');
        expect(svg).toContain('>(2023-08-01 to 2024-07-31)</tspan>');
        expect(svg).toContain('>2.00%</tspan>');
        expect(svg).toContain('>-5.00%</tspan>');
        expect(svg).toContain('>0.00%</tspan>');
    });

    it('stops when the provider has no data', async () => {
        await expect(generateHeatmap(job(new FakeSource([])))).rejects.toBeInstanceOf(EmptyInputError);
    });

    it('stops when a single close yields no returns', async () => {
        await expect(generateHeatmap(job(new FakeSource(BARS.slice(0, 1))))).rejects.toBeInstanceOf(
            EmptyInputError,
        );
    });

    it('propagates a missing close column', async () => {
        const source = new FakeSource(new MissingRequiredFieldError('Close'));
        await expect(generateHeatmap(job(source))).rejects.toThrow('Close price column not found in response');
    });

    it('refuses a blank subject without fetching', async () => {
        const source = new FakeSource(BARS);
        await expect(generateHeatmap(job(source, '   '))).rejects.toBeInstanceOf(EmptyInputError);
        expect(source.calls).toHaveLength(0);
    });
});

describe('localIsoDate', () => {
    it('formats the local calendar date, not the UTC one', () => {
        expect(localIsoDate(new Date(2024, 0, 5, 23, 30))).toBe('2024-01-05');
        expect(localIsoDate(new Date(2024, 11, 31, 0, 15))).toBe('2024-12-31');
    });
});

describe('normalizeSubject', () => {
    it('trims and uppercases', () => {
        expect(normalizeSubject('  brk-b\n')).toBe('BRK-B');
    });
});
