import { describe, test, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { buildAppConfig, loadConfig, parseEnv, parseProjectConfig } from '../Config.ts';

const PROJECT_FILE = fileURLToPath(new URL('../../../config/project_configuration.json', import.meta.url));

function minimalProject(overrides: Record<string, unknown> = {}) {
    return {
        base_url: 'https://features.test/arcgis/rest/services/',
        endpoints: {
            ports: 'ports_db',
            chokepoints: 'chokepoints_db',
            daily_chokepoints: 'daily_chokepoints_db',
            daily_trade: 'daily_trade_db',
            disruptions: 'disruptions_db',
        },
        tags: ['ports'],
        disruptions_tags: ['flooding'],
        static_start_dates: { ports: '2023-08-29T04:08:45Z', chokepoints: '2023-09-08T06:00:02Z' },
        dataset_defaults: {
            dataset_source: 'Test Source',
            license_id: 'cc-by',
            methodology: 'Registry',
        },
        ...overrides,
    };
}

describe('parseEnv', () => {
    test('empty environment → defaults', () => {
        expect(parseEnv({})).toEqual({
            LOG_LEVEL: 'info',
            USER_AGENT: 'maritime-trade-etl',
            PAGE_SIZE: 1000,
            PROJECT_CONFIG: 'config/project_configuration.json',
        });
    });

    test('PAGE_SIZE is coerced to a number', () => {
        expect(parseEnv({ PAGE_SIZE: '250' }).PAGE_SIZE).toBe(250);
    });

    test('invalid PAGE_SIZE → error naming the key', () => {
        expect(() => parseEnv({ PAGE_SIZE: '0' })).toThrow(/^Invalid environment configuration: PAGE_SIZE: /);
        expect(() => parseEnv({ PAGE_SIZE: 'many' })).toThrow(/^Invalid environment configuration: PAGE_SIZE: /);
    });

    test('unknown log level → error', () => {
        expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL: /);
    });
});

describe('parseProjectConfig', () => {
    test('shipped project configuration is valid', async () => {
        const project = parseProjectConfig(JSON.parse(await readFile(PROJECT_FILE, 'utf-8')));

        expect(project.endpoints.daily_trade).toBe('Daily_Trade_Data');
        expect(project.static_start_dates.ports).toEqual(new Date('2023-08-29T04:08:45Z'));
        expect(project.daily_chokepoints_split_by_year).toBe(false);
    });

    test('missing base_url → error naming the key', () => {
        const withoutBase: Record<string, unknown> = minimalProject();
        delete withoutBase.base_url;

        expect(() => parseProjectConfig(withoutBase)).toThrow(/^Invalid project configuration: base_url: /);
    });

    test('empty tags → error', () => {
        expect(() => parseProjectConfig(minimalProject({ tags: [] }))).toThrow(/tags: /);
    });
});

describe('buildAppConfig', () => {
    test('strips the trailing slash and maps dataset defaults', () => {
        const config = buildAppConfig(parseEnv({}), parseProjectConfig(minimalProject()));

        expect(config.baseUrl).toBe('https://features.test/arcgis/rest/services');
        expect(config.pageSize).toBe(1000);
        expect(config.dailyChokepointsSplitByYear).toBe(false);
        expect(config.staticStartDates.chokepoints).toEqual(new Date('2023-09-08T06:00:02Z'));
        expect(config.datasetDefaults).toEqual({
            datasetSource: 'Test Source',
            licenseId: 'cc-by',
            licenseOther: undefined,
            methodology: 'Registry',
            methodologyOther: undefined,
            caveats: null,
            notes: undefined,
            packageCreator: undefined,
            private: false,
        });
    });
});

describe('loadConfig', () => {
    test('reads the project file named in the environment', async () => {
        const config = await loadConfig({ PROJECT_CONFIG: PROJECT_FILE, PAGE_SIZE: '500' });

        expect(config.pageSize).toBe(500);
        expect(config.endpoints.ports).toBe('PortWatch_ports_database');
        expect(config.tags).toEqual(['ports', 'trade']);
    });
});
