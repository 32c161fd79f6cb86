import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DatasetBuilder, rowsToCsv, toSlug } from '../DatasetBuilder.ts';
import type { DatasetInfo } from '../DatasetBuilder.ts';
import type { DatasetMetadata, RowFeatureCollection } from '../../model/Models.ts';

// ── Test helpers ──

const DEFAULTS: DatasetMetadata = {
    datasetSource: 'Test Source',
    licenseId: 'cc-by',
    methodology: 'Registry',
    caveats: null,
    private: false,
};

const WORLD_INFO: DatasetInfo = {
    title: 'Ports',
    tags: ['ports', 'trade'],
    timePeriod: { start: new Date('2023-08-29T04:08:45Z'), end: new Date('2025-01-01T00:00:00Z') },
    location: { type: 'world' },
};

let outputDir: string;
let builder: DatasetBuilder;

beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'dataset-builder-test-'));
    builder = new DatasetBuilder(outputDir, DEFAULTS);
});

afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
});

// ── Tests ──

describe('toSlug', () => {
    test('country dataset title', () => {
        expect(toSlug('Aruba: Daily Port Activity Data and Shipment Estimates')).toBe(
            'aruba-daily-port-activity-data-and-shipment-estimates'
        );
    });

    test('single word', () => {
        expect(toSlug('Chokepoints')).toBe('chokepoints');
    });
});

describe('rowsToCsv', () => {
    test('header from first row, ISO dates, quoted commas, null as empty cell', () => {
        const csv = rowsToCsv([
            {
                date: new Date('2025-01-02T00:00:00Z'),
                portname: 'Oranjestad, Aruba',
                calls: 3,
                flag: true,
                note: null,
            },
        ]);

        expect(csv).toBe('date,portname,calls,flag,note\n2025-01-02T00:00:00.000Z,"Oranjestad, Aruba",3,true,\n');
    });

    test('missing keys in later rows → empty cells', () => {
        const csv = rowsToCsv([
            { portid: 'port1', calls: 1 },
            { portid: 'port2' },
        ]);

        expect(csv).toBe('portid,calls\nport1,1\nport2,\n');
    });

    test('no rows → empty string', () => {
        expect(rowsToCsv([])).toBe('');
    });
});

describe('DatasetBuilder', () => {
    test('createDataset: slug name, copied tags, default metadata', () => {
        const dataset = builder.createDataset(WORLD_INFO);

        expect(dataset.name).toBe('ports');
        expect(dataset.title).toBe('Ports');
        expect(dataset.tags).toEqual(['ports', 'trade']);
        expect(dataset.tags).not.toBe(WORLD_INFO.tags);
        expect(dataset.location).toEqual({ type: 'world' });
        expect(dataset.metadata).toEqual(DEFAULTS);
        expect(dataset.resources).toEqual([]);
    });

    test('addCsvResource writes the file and registers it', async () => {
        const dataset = builder.createDataset(WORLD_INFO);

        const resource = await builder.addCsvResource(dataset, [{ portid: 'port1', portname: 'Port 1' }], {
            name: 'ports.csv',
            description: 'Ports list',
        });

        expect(resource).toEqual({
            name: 'ports.csv',
            description: 'Ports list',
            format: 'csv',
            filePath: join(outputDir, 'ports.csv'),
        });
        expect(dataset.resources).toEqual([resource]);
        expect(await readFile(resource.filePath, 'utf-8')).toBe('portid,portname\nport1,Port 1\n');
    });

    test('addCsvResource with zero rows → rejects', async () => {
        const dataset = builder.createDataset(WORLD_INFO);

        await expect(
            builder.addCsvResource(dataset, [], { name: 'empty.csv', description: 'Nothing' })
        ).rejects.toThrow("Cannot create CSV resource 'empty.csv' from zero rows");
        expect(dataset.resources).toEqual([]);
    });

    test('addGeoJsonResource writes the collection as JSON', async () => {
        const dataset = builder.createDataset(WORLD_INFO);
        const collection: RowFeatureCollection = {
            type: 'FeatureCollection',
            features: [
                { type: 'Feature', properties: { portid: 'port1' }, geometry: { type: 'Point', coordinates: [10, 12.5] } },
            ],
        };

        const resource = await builder.addGeoJsonResource(dataset, collection, {
            name: 'ports.geojson',
            description: 'Ports geometry',
        });

        expect(resource.format).toBe('geojson');
        expect(JSON.parse(await readFile(resource.filePath, 'utf-8'))).toEqual(collection);
    });

    test('a resource with the same name replaces the earlier one', async () => {
        const dataset = builder.createDataset(WORLD_INFO);

        await builder.addCsvResource(dataset, [{ portid: 'port1' }], { name: 'ports.csv', description: 'First' });
        await builder.addCsvResource(dataset, [{ portid: 'port2' }], { name: 'ports.csv', description: 'Second' });

        expect(dataset.resources).toHaveLength(1);
        expect(dataset.resources[0].description).toBe('Second');
        expect(await readFile(join(outputDir, 'ports.csv'), 'utf-8')).toBe('portid\nport2\n');
    });
});
