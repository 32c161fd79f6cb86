import { describe, test, expect } from 'vitest';
import { getDateRange } from '../DateRange.ts';

const d = (iso: string) => new Date(iso);

describe('getDateRange', () => {
    test('no rows → no range', () => {
        expect(getDateRange([])).toEqual({ start: null, end: null });
    });

    test('point rows → earliest and latest date', () => {
        const range = getDateRange([
            { date: d('2024-03-01T00:00:00Z') },
            { date: d('2023-01-01T00:00:00Z') },
            { date: d('2025-07-04T00:00:00Z') },
        ]);

        expect(range).toEqual({ start: d('2023-01-01T00:00:00Z'), end: d('2025-07-04T00:00:00Z') });
    });

    test('rows without a date are ignored', () => {
        const range = getDateRange([{ date: null }, { portid: 'a' }, { date: d('2024-01-01T00:00:00Z') }]);

        expect(range).toEqual({ start: d('2024-01-01T00:00:00Z'), end: d('2024-01-01T00:00:00Z') });
    });

    test('only null dates → no range', () => {
        expect(getDateRange([{ date: null }, { date: null }])).toEqual({ start: null, end: null });
    });

    test('interval rows → earliest fromdate and latest todate', () => {
        const range = getDateRange([
            { eventid: 1, fromdate: d('2024-02-01T00:00:00Z'), todate: d('2024-02-10T00:00:00Z') },
            { eventid: 2, fromdate: d('2024-01-15T00:00:00Z'), todate: d('2024-01-20T00:00:00Z') },
            { eventid: 3, fromdate: d('2024-03-01T00:00:00Z'), todate: d('2024-04-30T00:00:00Z') },
        ]);

        expect(range).toEqual({ start: d('2024-01-15T00:00:00Z'), end: d('2024-04-30T00:00:00Z') });
    });

    test('interval row with both ends null adds nothing, even with a date', () => {
        const range = getDateRange([
            { eventid: 1, fromdate: null, todate: null, date: d('2020-01-01T00:00:00Z') },
            { eventid: 2, fromdate: d('2024-01-01T00:00:00Z'), todate: d('2024-01-05T00:00:00Z') },
        ]);

        expect(range).toEqual({ start: d('2024-01-01T00:00:00Z'), end: d('2024-01-05T00:00:00Z') });
    });

    test('point and interval rows together', () => {
        const range = getDateRange([
            { date: d('2023-06-01T00:00:00Z') },
            { fromdate: d('2023-07-01T00:00:00Z'), todate: d('2023-12-31T00:00:00Z') },
        ]);

        expect(range).toEqual({ start: d('2023-06-01T00:00:00Z'), end: d('2023-12-31T00:00:00Z') });
    });

    test('start never after end for a single interval', () => {
        const { start, end } = getDateRange([
            { fromdate: d('2024-05-01T00:00:00Z'), todate: d('2024-05-01T00:00:00Z') },
        ]);

        expect(start).not.toBeNull();
        expect(end).not.toBeNull();
        expect(start?.getTime()).toBeLessThanOrEqual(end?.getTime() ?? Number.NEGATIVE_INFINITY);
    });
});
