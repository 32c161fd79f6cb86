import type { DateRange, Row, RowValue } from '../model/Models.ts';

function asDate(value: RowValue | undefined): Date | null {
    return value instanceof Date && !Number.isNaN(value.getTime()) ? value : null;
}

/**
 * Inclusive temporal extent of a row set.
 *
 * A row holding both `fromdate` and `todate` keys is an interval row: its
 * fromdate is a start candidate and its todate an end candidate. The shape
 * is decided by key presence, so an interval row with both values null adds
 * nothing, even if it also has a `date`. Any other row contributes its
 * `date` to both sides.
 */
export function getDateRange(rows: Row[]): DateRange {
    const starts: Date[] = [];
    const ends: Date[] = [];

    for (const row of rows) {
        if ('fromdate' in row && 'todate' in row) {
            const fromdate = asDate(row.fromdate);
            const todate = asDate(row.todate);
            if (fromdate) starts.push(fromdate);
            if (todate) ends.push(todate);
        } else {
            const date = asDate(row.date);
            if (date) {
                starts.push(date);
                ends.push(date);
            }
        }
    }

    if (starts.length === 0 || ends.length === 0) {
        return { start: null, end: null };
    }

    const start = starts.reduce((min, d) => (d.getTime() < min.getTime() ? d : min));
    const end = ends.reduce((max, d) => (d.getTime() > max.getTime() ? d : max));
    return { start, end };
}
