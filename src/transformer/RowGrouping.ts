import type { Row, RowValue } from '../model/Models.ts';

function usableDate(value: RowValue | undefined): Date | null {
    return value instanceof Date && !Number.isNaN(value.getTime()) ? value : null;
}

function parseYear(value: RowValue | undefined): number | null {
    if (typeof value === 'number') {
        return Number.isInteger(value) ? value : null;
    }
    if (typeof value === 'string' && /^\d{1,4}$/.test(value.trim())) {
        return Number(value.trim());
    }
    return null;
}

/**
 * Most recent first. The sort is stable; rows without a usable date keep
 * their relative order at the end.
 */
export function sortDescByDate(rows: Row[], field: string = 'date'): Row[] {
    return [...rows].sort((a, b) => {
        const dateA = usableDate(a[field]);
        const dateB = usableDate(b[field]);
        if (dateA && dateB) {
            return dateB.getTime() - dateA.getTime();
        }
        if (dateA) return -1;
        if (dateB) return 1;
        return 0;
    });
}

/**
 * Partitions rows by their `year` attribute. The map iterates years in
 * descending order; rows without a year are left out.
 */
export function groupByYear(rows: Row[], field: string = 'year'): Map<number, Row[]> {
    const groups = new Map<number, Row[]>();

    for (const row of rows) {
        const year = parseYear(row[field]);
        if (year === null) {
            continue;
        }
        const group = groups.get(year);
        if (group) {
            group.push(row);
        } else {
            groups.set(year, [row]);
        }
    }

    const years = [...groups.keys()].sort((a, b) => b - a);
    return new Map(years.map((year) => [year, groups.get(year) ?? []]));
}

/**
 * Distinct country codes found in the rows, upper-cased, ascending.
 */
export function extractCountryCodes(rows: Row[], field: string = 'ISO3'): string[] {
    const codes = new Set<string>();

    for (const row of rows) {
        const value = row[field];
        if (typeof value !== 'string') {
            continue;
        }
        const code = value.trim().toUpperCase();
        if (code) {
            codes.add(code);
        }
    }

    return [...codes].sort();
}
