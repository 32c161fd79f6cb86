import { readFile } from 'node:fs/promises';

import { createLogger } from '../utils/Logger.ts';

import type { DatasetDefinition, PublishResult, ResourceFormat } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Sink the pipeline publishes finished datasets into
 */
export interface DatasetCatalog {
    publish(dataset: DatasetDefinition): Promise<PublishResult>;
    close(): Promise<void>;
}

/**
 * Resource row as stored in the catalog, file content included
 */
export interface StoredResource {
    name: string;
    description: string;
    format: ResourceFormat;
    position: number;
    sizeBytes: number;
    content: string;
}

/**
 * Statements of one publish, all run in the same transaction
 */
export interface CatalogTransaction {
    /** Inserts or updates the dataset row by name and returns its id */
    upsertDataset(dataset: DatasetDefinition): Promise<number>;
    upsertResource(datasetId: number, resource: StoredResource): Promise<void>;
    /** Removes the dataset's resources whose names are not listed */
    deleteResourcesExcept(datasetId: number, names: string[]): Promise<void>;
}

/**
 * Storage behind the catalog. A transaction whose work rejects leaves the
 * stored catalog unchanged.
 */
export interface CatalogStore {
    ensureSchema(): Promise<void>;
    transaction(work: (tx: CatalogTransaction) => Promise<PublishResult>): Promise<PublishResult>;
    close(): Promise<void>;
}

/**
 * Publishes dataset definitions: one dataset row, one row per resource
 * holding the staged file content. Resources the dataset no longer lists
 * are removed.
 */
export class CatalogClient implements DatasetCatalog {
    private store: CatalogStore;
    private logger: Logger;

    constructor(store: CatalogStore) {
        this.store = store;
        this.logger = createLogger('CatalogClient');
    }

    /**
     * Creates the catalog tables if they do not exist yet.
     */
    async ensureSchema(): Promise<void> {
        await this.store.ensureSchema();
        this.logger.info('Catalog schema ready');
    }

    async publish(dataset: DatasetDefinition): Promise<PublishResult> {
        this.logger.info(`Publishing dataset '${dataset.name}' with ${dataset.resources.length} resources`);

        const resources: StoredResource[] = [];
        for (const [position, resource] of dataset.resources.entries()) {
            const content = await readFile(resource.filePath, 'utf-8');
            resources.push({
                name: resource.name,
                description: resource.description,
                format: resource.format,
                position,
                sizeBytes: Buffer.byteLength(content, 'utf-8'),
                content,
            });
        }

        const result = await this.store.transaction(async (tx) => {
            const datasetId = await tx.upsertDataset(dataset);
            for (const resource of resources) {
                await tx.upsertResource(datasetId, resource);
            }
            await tx.deleteResourcesExcept(datasetId, resources.map((r) => r.name));
            return { datasetId, resourcesStored: resources.length };
        });

        this.logger.info(`Dataset '${dataset.name}' → id ${result.datasetId}, ${result.resourcesStored} resources stored`);
        return result;
    }

    async close(): Promise<void> {
        await this.store.close();
    }
}
