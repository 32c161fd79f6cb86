import type { Feature, FeatureCollection, Geometry } from 'geojson';

// ── Feature service models ──

/**
 * A single attribute value as delivered by the feature service
 */
export type AttributeValue = string | number | boolean | null;

/**
 * A cell of a normalized row. Dates appear only after epoch conversion.
 */
export type RowValue = AttributeValue | Date;

/**
 * Flat attribute map of one feature. Key order is the source's field order
 * and is kept, the first row's keys become the CSV header.
 */
export type Row = Record<string, RowValue>;

/**
 * Output format requested from the query endpoint.
 * 'json' returns Esri JSON (attributes), 'geojson' returns GeoJSON (properties).
 */
export type QueryFormat = 'json' | 'geojson';

/**
 * A feature record as received from a query page. Esri JSON carries
 * `attributes`, GeoJSON carries `properties`. Geometry is left unchecked
 * until a GeoJSON split needs it.
 */
export interface FeatureRecord {
    attributes?: Record<string, AttributeValue> | null;
    properties?: Record<string, AttributeValue> | null;
    geometry?: unknown;
}

/**
 * Options for a paginated query against a FeatureServer layer
 */
export interface FetchOptions {
    where?: string;            // Filter expression, '1=1' matches everything
    pageSize?: number;         // resultRecordCount per page
    format?: QueryFormat;
    /**
     * Re-issue a page request once when its body is not valid JSON,
     * logging status, content type and a body excerpt of the retry.
     */
    diagnosticRetry?: boolean;
}

/**
 * Rows and the GeoJSON collection built pairwise from the same features
 */
export interface GeoSplitResult {
    rows: Row[];
    collection: RowFeatureCollection;
}

export type RowFeature = Feature<Geometry | null, Row>;
export type RowFeatureCollection = FeatureCollection<Geometry | null, Row>;

/**
 * Inclusive temporal extent of a row set. Both ends are null when no row
 * carries a date.
 */
export interface DateRange {
    start: Date | null;
    end: Date | null;
}

// ── Dataset models ──

export type ResourceFormat = 'csv' | 'geojson';

/**
 * A file staged in the working directory, to be uploaded with its dataset
 */
export interface ResourceDefinition {
    name: string;              // File name, e.g. 'ports.csv'
    description: string;
    format: ResourceFormat;
    filePath: string;          // Absolute path of the staged file
}

/**
 * Geographic coverage of a dataset: either the whole world or one country
 */
export type DatasetLocation =
    | { type: 'world' }
    | { type: 'country'; iso3: string; name: string };

/**
 * Static metadata shared by every dataset the job publishes
 */
export interface DatasetMetadata {
    datasetSource: string;
    licenseId: string;
    licenseOther?: string;
    methodology: string;
    methodologyOther?: string;
    caveats?: string | null;
    notes?: string;
    packageCreator?: string;
    private: boolean;
}

/**
 * A dataset ready for publishing
 */
export interface DatasetDefinition {
    name: string;              // Slug, unique in the catalog
    title: string;
    timePeriod: { start: Date; end: Date };
    tags: string[];
    location: DatasetLocation;
    metadata: DatasetMetadata;
    resources: ResourceDefinition[];
}

/**
 * Result of publishing one dataset to the catalog
 */
export interface PublishResult {
    datasetId: number;
    resourcesStored: number;
}

// ── Pipeline run models ──

export type DatasetKind =
    | 'ports'
    | 'chokepoints'
    | 'daily-chokepoints'
    | 'disruptions'
    | 'daily-ports';

export const DATASET_KINDS: readonly DatasetKind[] = [
    'ports',
    'chokepoints',
    'daily-chokepoints',
    'disruptions',
    'daily-ports',
];

export type DatasetOutcome =
    | { status: 'published'; datasetName: string; resources: number }
    | { status: 'built'; datasetName: string; resources: number }   // dry run
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; error: string };

/**
 * Outcome of one pipeline step, keyed by dataset kind (and country for
 * per-country datasets)
 */
export interface RunEntry {
    kind: DatasetKind;
    country?: string;
    outcome: DatasetOutcome;
}

export interface RunSummary {
    entries: RunEntry[];
    failed: number;
}
