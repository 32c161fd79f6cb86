import { createLogger } from '../utils/Logger.ts';

import type { Geometry } from 'geojson';
import type {
    AttributeValue,
    FeatureRecord,
    GeoSplitResult,
    Row,
    RowFeature,
    RowValue,
} from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Service-internal row identifier. ArcGIS field names are case-insensitive,
 * the services spell it 'ObjectId' in properties and 'OBJECTID' in attributes.
 */
const ROW_ID_FIELD = 'objectid';

const GEOMETRY_TYPES = new Set([
    'Point',
    'MultiPoint',
    'LineString',
    'MultiLineString',
    'Polygon',
    'MultiPolygon',
    'GeometryCollection',
]);

function isGeometry(value: unknown): value is Geometry {
    return (
        typeof value === 'object' &&
        value !== null &&
        'type' in value &&
        typeof value.type === 'string' &&
        GEOMETRY_TYPES.has(value.type)
    );
}

function stripRowId(attributes: Record<string, AttributeValue> | null | undefined): Row {
    const row: Row = {};
    for (const [key, value] of Object.entries(attributes ?? {})) {
        if (key.toLowerCase() !== ROW_ID_FIELD) {
            row[key] = value;
        }
    }
    return row;
}

/**
 * Converts an epoch-millisecond cell to a UTC Date. Null and missing stay null.
 * Anything else means the row was already converted (or is not a time series)
 * and is rejected.
 */
export function epochToUtcDate(value: RowValue | undefined, field: string): Date | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return new Date(value);
    }
    const shown = value instanceof Date ? value.toISOString() : String(value);
    throw new Error(`Field '${field}' is not an epoch millisecond value: ${shown}`);
}

/**
 * Flattens raw feature records into rows and GeoJSON, and converts
 * time-series date fields. Each fetch result goes through it exactly once.
 */
export class FeatureNormalizer {
    private logger: Logger;

    constructor() {
        this.logger = createLogger('FeatureNormalizer');
    }

    /**
     * Attribute rows of an Esri JSON (f=json) result, row id removed.
     */
    extractRows(features: FeatureRecord[]): Row[] {
        const rows = features.map((feature) => stripRowId(feature.attributes));
        this.logger.debug(`Extracted ${rows.length} attribute rows`);
        return rows;
    }

    /**
     * Splits a GeoJSON (f=geojson) result into tabular rows and a
     * FeatureCollection. Row i and feature i come from the same record.
     */
    splitGeoFeatures(features: FeatureRecord[]): GeoSplitResult {
        const rows: Row[] = [];
        const geoFeatures: RowFeature[] = [];
        let missingGeometry = 0;

        for (const feature of features) {
            const properties = stripRowId(feature.properties);
            const geometry = isGeometry(feature.geometry) ? feature.geometry : null;
            if (geometry === null) {
                missingGeometry++;
            }

            geoFeatures.push({
                type: 'Feature',
                properties: { ...properties },
                geometry,
            });
            rows.push(properties);
        }

        if (missingGeometry > 0) {
            this.logger.warn(`${missingGeometry} features without a usable geometry`);
        }

        return {
            rows,
            collection: {
                type: 'FeatureCollection',
                features: geoFeatures,
            },
        };
    }

    /**
     * Converts the point-in-time `date` field of every row.
     */
    convertPointDates(rows: Row[], field: string = 'date'): Row[] {
        return rows.map((row) => ({
            ...row,
            [field]: epochToUtcDate(row[field], field),
        }));
    }

    /**
     * Converts `fromdate`/`todate` of every row. A missing `todate` marks a
     * point-in-time event and is set to `fromdate`.
     */
    convertIntervalDates(rows: Row[]): Row[] {
        return rows.map((row) => {
            const fromdate = epochToUtcDate(row.fromdate, 'fromdate');
            const todate = row.todate === null || row.todate === undefined
                ? fromdate
                : epochToUtcDate(row.todate, 'todate');

            return { ...row, fromdate, todate };
        });
    }
}
