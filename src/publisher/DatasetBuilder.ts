import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { stringify } from 'csv-stringify/sync';
import slugify from 'slugify';

import { createLogger } from '../utils/Logger.ts';

import type {
    DatasetDefinition,
    DatasetLocation,
    DatasetMetadata,
    ResourceDefinition,
    Row,
    RowFeatureCollection,
} from '../model/Models.ts';
import type { Logger } from 'pino';

export interface DatasetInfo {
    title: string;
    tags: string[];
    timePeriod: { start: Date; end: Date };
    location: DatasetLocation;
}

export interface ResourceInfo {
    name: string;
    description: string;
}

export function toSlug(title: string): string {
    return slugify(title, { lower: true, strict: true });
}

/**
 * Renders rows as CSV. Headers are the first row's keys in their order,
 * dates are written as ISO-8601 UTC and nulls as empty cells.
 */
export function rowsToCsv(rows: Row[]): string {
    if (rows.length === 0) {
        return '';
    }
    const headers = Object.keys(rows[0]);
    return stringify(rows, {
        header: true,
        columns: headers,
        cast: {
            date: (value) => value.toISOString(),
            boolean: (value) => String(value),
        },
    });
}

/**
 * Builds dataset definitions and stages their resource files in the
 * run's working directory.
 */
export class DatasetBuilder {
    readonly outputDir: string;
    private defaults: DatasetMetadata;
    private logger: Logger;

    constructor(outputDir: string, defaults: DatasetMetadata) {
        this.outputDir = outputDir;
        this.defaults = defaults;
        this.logger = createLogger('DatasetBuilder');
    }

    createDataset(info: DatasetInfo): DatasetDefinition {
        const name = toSlug(info.title);
        this.logger.info(`Building dataset '${name}'`);

        return {
            name,
            title: info.title,
            timePeriod: info.timePeriod,
            tags: [...info.tags],
            location: info.location,
            metadata: { ...this.defaults },
            resources: [],
        };
    }

    async addCsvResource(
        dataset: DatasetDefinition,
        rows: Row[],
        info: ResourceInfo
    ): Promise<ResourceDefinition> {
        if (rows.length === 0) {
            throw new Error(`Cannot create CSV resource '${info.name}' from zero rows`);
        }

        const filePath = join(this.outputDir, info.name);
        await writeFile(filePath, rowsToCsv(rows), 'utf-8');
        this.logger.info(`Wrote ${rows.length} rows to ${filePath}`);

        return this.addResource(dataset, { ...info, format: 'csv', filePath });
    }

    async addGeoJsonResource(
        dataset: DatasetDefinition,
        collection: RowFeatureCollection,
        info: ResourceInfo
    ): Promise<ResourceDefinition> {
        const filePath = join(this.outputDir, info.name);
        await writeFile(filePath, JSON.stringify(collection), 'utf-8');
        this.logger.info(`Wrote ${collection.features.length} features to ${filePath}`);

        return this.addResource(dataset, { ...info, format: 'geojson', filePath });
    }

    private addResource(dataset: DatasetDefinition, resource: ResourceDefinition): ResourceDefinition {
        const existing = dataset.resources.findIndex((r) => r.name === resource.name);
        if (existing === -1) {
            dataset.resources.push(resource);
        } else {
            dataset.resources[existing] = resource;
        }
        return resource;
    }
}
