import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import postgres from 'postgres';

import { createLogger } from '../utils/Logger.ts';

import type { CatalogStore, CatalogTransaction, StoredResource } from './CatalogClient.ts';
import type { DatasetDefinition, PublishResult } from '../model/Models.ts';
import type { Logger } from 'pino';

const SCHEMA_FILE = fileURLToPath(new URL('../../db/schema.sql', import.meta.url));

const UPSERT_DATASET = `
    INSERT INTO catalog_dataset (name, title, time_start, time_end, tags, location_type, location_code, metadata, last_published)
    VALUES ($1, $2, $3, $4, $5::text[], $6, $7, $8::jsonb, NOW())
    ON CONFLICT (name) DO UPDATE SET
        title = EXCLUDED.title,
        time_start = EXCLUDED.time_start,
        time_end = EXCLUDED.time_end,
        tags = EXCLUDED.tags,
        location_type = EXCLUDED.location_type,
        location_code = EXCLUDED.location_code,
        metadata = EXCLUDED.metadata,
        last_published = NOW()
    RETURNING id
`;

const UPSERT_RESOURCE = `
    INSERT INTO catalog_resource (dataset_id, name, description, format, position, size_bytes, content, updated_at)
    VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
    ON CONFLICT (dataset_id, name) DO UPDATE SET
        description = EXCLUDED.description,
        format = EXCLUDED.format,
        position = EXCLUDED.position,
        size_bytes = EXCLUDED.size_bytes,
        content = EXCLUDED.content,
        updated_at = NOW()
`;

const DELETE_STALE_RESOURCES = `
    DELETE FROM catalog_resource
    WHERE dataset_id = $1
      AND NOT (name = ANY($2::text[]))
`;

class PostgresTransaction implements CatalogTransaction {
    private tx: postgres.TransactionSql;

    constructor(tx: postgres.TransactionSql) {
        this.tx = tx;
    }

    async upsertDataset(dataset: DatasetDefinition): Promise<number> {
        const locationCode = dataset.location.type === 'country' ? dataset.location.iso3 : null;
        const rows = await this.tx.unsafe<{ id: number }[]>(UPSERT_DATASET, [
            dataset.name,
            dataset.title,
            dataset.timePeriod.start,
            dataset.timePeriod.end,
            dataset.tags,
            dataset.location.type,
            locationCode,
            JSON.stringify(dataset.metadata),
        ]);

        const [row] = rows;
        if (!row) {
            throw new Error(`Catalog did not return an id for dataset '${dataset.name}'`);
        }
        return row.id;
    }

    async upsertResource(datasetId: number, resource: StoredResource): Promise<void> {
        await this.tx.unsafe(UPSERT_RESOURCE, [
            datasetId,
            resource.name,
            resource.description,
            resource.format,
            resource.position,
            resource.sizeBytes,
            resource.content,
        ]);
    }

    async deleteResourcesExcept(datasetId: number, names: string[]): Promise<void> {
        await this.tx.unsafe(DELETE_STALE_RESOURCES, [datasetId, names]);
    }
}

/**
 * Catalog tables in PostgreSQL, one transaction per publish.
 * Uses the 'postgres' (porsager/postgres) driver.
 */
export class PostgresCatalogStore implements CatalogStore {
    private sql: postgres.Sql;
    private logger: Logger;

    constructor(connectionUrl?: string) {
        this.logger = createLogger('PostgresCatalogStore');
        const url = connectionUrl ?? process.env.DATABASE_URL;
        if (!url) {
            throw new Error(
                'DATABASE_URL not set. Provide it as env var or constructor arg, or run with --dry-run.'
            );
        }
        this.sql = postgres(url);
    }

    async ensureSchema(): Promise<void> {
        const schema = await readFile(SCHEMA_FILE, 'utf-8');
        await this.sql.unsafe(schema);
    }

    async transaction(work: (tx: CatalogTransaction) => Promise<PublishResult>): Promise<PublishResult> {
        return this.sql.begin((tx) => work(new PostgresTransaction(tx)));
    }

    /**
     * Close the database connection pool.
     */
    async close(): Promise<void> {
        await this.sql.end();
        this.logger.info('Database connection closed');
    }
}
