import { EmptyInputError, InvalidSeriesError } from '../src/errors.js';
import { computeDailyReturns, createReturnSeries, groupByMonth } from '../src/engines/returns.js';

describe('computeDailyReturns', () => {
    it('computes day-over-day percentage change and drops the first bar', () => {
        const returns = computeDailyReturns([
            { date: '2024-07-01', close: 100 },
            { date: '2024-07-02', close: 110 },
            { date: '2024-07-03', close: 99 },
        ]);

        expect(returns.map((r) => r.date)).toEqual(['2024-07-02', '2024-07-03']);
        expect(returns[0].value).toBeCloseTo(10, 10);
        expect(returns[1].value).toBeCloseTo(-10, 10);
    });

    it('returns nothing for fewer than two bars', () => {
        expect(computeDailyReturns([])).toEqual([]);
        expect(computeDailyReturns([{ date: '2024-07-01', close: 100 }])).toEqual([]);
    });
});

describe('createReturnSeries', () => {
    it('accepts a strictly increasing series', () => {
        const series = createReturnSeries([
            { date: '2024-02-28', value: 1.5 },
            { date: '2024-02-29', value: -0.25 },
        ]);

        expect(series).toEqual([
            { date: '2024-02-28', value: 1.5 },
            { date: '2024-02-29', value: -0.25 },
        ]);
        expect(Object.isFrozen(series)).toBe(true);
        expect(Object.isFrozen(series[0])).toBe(true);
    });

    it('aborts on an empty series', () => {
        expect(() => createReturnSeries([])).toThrow(EmptyInputError);
    });

    it('rejects duplicate dates', () => {
        expect(() =>
            createReturnSeries([
                { date: '2024-01-02', value: 1 },
                { date: '2024-01-02', value: 2 },
            ]),
        ).toThrow('Entry 1: 2024-01-02 does not follow 2024-01-02 (dates must strictly increase)');
    });

    it('rejects dates out of order', () => {
        expect(() =>
            createReturnSeries([
                { date: '2024-01-03', value: 1 },
                { date: '2024-01-02', value: 2 },
            ]),
        ).toThrow(InvalidSeriesError);
    });

    it('rejects dates that do not exist', () => {
        expect(() => createReturnSeries([{ date: '2023-02-29', value: 1 }])).toThrow(
            'Entry 0: date not a calendar date',
        );
        expect(() => createReturnSeries([{ date: '2024/01/02', value: 1 }])).toThrow(InvalidSeriesError);
    });

    it('rejects year zero before any grid is built', () => {
        expect(() => createReturnSeries([{ date: '0000-03-01', value: 1 }])).toThrow(
            'Entry 0: date not a calendar date',
        );
    });

    it('rejects non-finite values', () => {
        expect(() => createReturnSeries([{ date: '2024-01-02', value: NaN }])).toThrow(InvalidSeriesError);
        expect(() => createReturnSeries([{ date: '2024-01-02', value: Infinity }])).toThrow(InvalidSeriesError);
    });
});

describe('groupByMonth', () => {
    it('buckets values by month in ascending order', () => {
        const buckets = groupByMonth(
            createReturnSeries([
                { date: '2023-12-29', value: 0.5 },
                { date: '2024-01-02', value: 1 },
                { date: '2024-01-06', value: -3 },
                { date: '2024-02-01', value: 2 },
            ]),
        );

        expect(buckets.map(({ year, month }) => [year, month])).toEqual([
            [2023, 12],
            [2024, 1],
            [2024, 2],
        ]);
        expect([...buckets[1].values.entries()]).toEqual([
            ['2024-01-02', 1],
            ['2024-01-06', -3],
        ]);
    });
});
