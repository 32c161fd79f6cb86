import { createLogger } from '../utils/Logger.ts';
import { DATASET_KINDS } from '../model/Models.ts';
import { CountryLookup } from '../publisher/CountryLookup.ts';
import { FeatureNormalizer } from '../transformer/FeatureNormalizer.ts';
import { getDateRange } from '../transformer/DateRange.ts';
import { extractCountryCodes, groupByYear, sortDescByDate } from '../transformer/RowGrouping.ts';

import type { AppConfig } from '../config/Config.ts';
import type { DatasetCatalog } from '../db/CatalogClient.ts';
import type {
    DatasetDefinition,
    DatasetKind,
    DatasetOutcome,
    GeoSplitResult,
    Row,
    RunEntry,
    RunSummary,
} from '../model/Models.ts';
import type { DatasetBuilder } from '../publisher/DatasetBuilder.ts';
import type { FeatureServiceSource } from '../source/FeatureServiceSource.ts';
import type { Logger } from 'pino';

const ABOUT_PORTS = 'https://portwatch.imf.org/datasets/acc668d199d1472abaaf2467133d4ca4/about';
const ABOUT_CHOKEPOINTS = 'https://portwatch.imf.org/datasets/fa9a5800b0ee4855af8b2944ab1e07af/about';
const ABOUT_DAILY_CHOKEPOINTS = 'https://portwatch.imf.org/datasets/42132aa4e2fc4d41bdaf9a445f688931/about';
const ABOUT_DAILY_PORTS = 'https://portwatch.imf.org/datasets/959214444157458aad969389b3ebe1a0_0/about';
const ABOUT_DISRUPTIONS = 'https://portwatch.imf.org/datasets/d9b37bf4b2104c85aebdcc0c1d8a2ab7_0/about';

const DAILY_CHOKEPOINTS_TITLE = 'Daily Chokepoint Transit Calls and Shipment Volume Estimates';

function isIso3Code(code: string): boolean {
    return /^[A-Z]{3}$/.test(code);
}

export interface PipelineDependencies {
    config: AppConfig;
    source: FeatureServiceSource;
    builder: DatasetBuilder;
    normalizer?: FeatureNormalizer;
    countryLookup?: CountryLookup;
    now?: () => Date;
}

export interface RunOptions {
    datasets?: DatasetKind[];
    /** ISO3 codes to publish daily port data for; all port countries when absent */
    countries?: string[];
    /** Publishing sink; datasets are only built when absent (dry run) */
    catalog?: DatasetCatalog;
}

/**
 * Fetch → normalize → build → publish, once per dataset.
 *
 * Each get* method fetches and normalizes a source exactly once, each
 * generate* method returns null when there is nothing to publish.
 */
export class Pipeline {
    private config: AppConfig;
    private source: FeatureServiceSource;
    private builder: DatasetBuilder;
    private normalizer: FeatureNormalizer;
    private countryLookup: CountryLookup;
    private now: () => Date;
    private logger: Logger;

    constructor(deps: PipelineDependencies) {
        this.config = deps.config;
        this.source = deps.source;
        this.builder = deps.builder;
        this.normalizer = deps.normalizer ?? new FeatureNormalizer();
        this.countryLookup = deps.countryLookup ?? new CountryLookup();
        this.now = deps.now ?? (() => new Date());
        this.logger = createLogger('Pipeline');
    }

    // ── Ports ──

    async getPorts(): Promise<GeoSplitResult> {
        const features = await this.source.fetchAll(this.config.endpoints.ports, {
            format: 'geojson',
            pageSize: this.config.pageSize,
        });
        return this.normalizer.splitGeoFeatures(features);
    }

    async generatePortsDataset(ports: GeoSplitResult): Promise<DatasetDefinition | null> {
        if (ports.rows.length === 0) {
            this.logger.warn('No ports data, skipping dataset creation');
            return null;
        }

        const dataset = this.builder.createDataset({
            title: 'Ports',
            tags: this.config.tags,
            timePeriod: { start: this.config.staticStartDates.ports, end: this.now() },
            location: { type: 'world' },
        });

        await this.builder.addCsvResource(dataset, ports.rows, {
            name: `${dataset.name}.csv`,
            description: `Global ports in CSV format. See variable descriptions [here](${ABOUT_PORTS})`,
        });
        await this.builder.addGeoJsonResource(dataset, ports.collection, {
            name: `${dataset.name}.geojson`,
            description: `Global ports in GeoJSON format. See variable descriptions [here](${ABOUT_PORTS})`,
        });

        return dataset;
    }

    /**
     * Countries that have at least one port, ascending
     */
    getPortCountries(portRows: Row[]): string[] {
        return extractCountryCodes(portRows, 'ISO3');
    }

    // ── Chokepoints ──

    async getChokepoints(): Promise<GeoSplitResult> {
        const features = await this.source.fetchAll(this.config.endpoints.chokepoints, {
            format: 'geojson',
            pageSize: this.config.pageSize,
        });
        return this.normalizer.splitGeoFeatures(features);
    }

    async generateChokepointsDataset(chokepoints: GeoSplitResult): Promise<DatasetDefinition | null> {
        if (chokepoints.rows.length === 0) {
            this.logger.warn('No chokepoints data, skipping dataset creation');
            return null;
        }

        const dataset = this.builder.createDataset({
            title: 'Chokepoints',
            tags: this.config.tags,
            timePeriod: { start: this.config.staticStartDates.chokepoints, end: this.now() },
            location: { type: 'world' },
        });

        await this.builder.addCsvResource(dataset, chokepoints.rows, {
            name: `${dataset.name}.csv`,
            description: `Global chokepoints in CSV format. See variable descriptions [here](${ABOUT_CHOKEPOINTS})`,
        });
        await this.builder.addGeoJsonResource(dataset, chokepoints.collection, {
            name: `${dataset.name}.geojson`,
            description: `Global chokepoints in GeoJSON format. See variable descriptions [here](${ABOUT_CHOKEPOINTS})`,
        });

        return dataset;
    }

    // ── Daily chokepoint transits ──

    async getDailyChokepoints(): Promise<Row[]> {
        const features = await this.source.fetchAll(this.config.endpoints.daily_chokepoints, {
            format: 'json',
            pageSize: this.config.pageSize,
        });
        const rows = this.normalizer.convertPointDates(this.normalizer.extractRows(features));
        return sortDescByDate(rows);
    }

    async generateDailyChokepointsDataset(rows: Row[]): Promise<DatasetDefinition | null> {
        if (rows.length === 0) {
            this.logger.warn('No daily chokepoints data, skipping dataset creation');
            return null;
        }

        const { start, end } = getDateRange(rows);
        if (start === null || end === null) {
            this.logger.warn('Daily chokepoints data has no dates, skipping dataset creation');
            return null;
        }

        const dataset = this.builder.createDataset({
            title: DAILY_CHOKEPOINTS_TITLE,
            tags: this.config.tags,
            timePeriod: { start, end },
            location: { type: 'world' },
        });

        const description =
            'Daily chokepoint transit calls and preliminary transit shipment volume estimates ' +
            `for 28 major chokepoints worldwide. See variable descriptions [here](${ABOUT_DAILY_CHOKEPOINTS})`;

        if (!this.config.dailyChokepointsSplitByYear) {
            await this.builder.addCsvResource(dataset, rows, {
                name: `${dataset.name}.csv`,
                description,
            });
            return dataset;
        }

        const byYear = groupByYear(rows);
        const grouped = [...byYear.values()].reduce((n, group) => n + group.length, 0);
        if (grouped < rows.length) {
            this.logger.warn(`${rows.length - grouped} daily chokepoint rows have no year and are left out`);
        }
        for (const [year, yearRows] of byYear) {
            await this.builder.addCsvResource(dataset, yearRows, {
                name: `${dataset.name}-${year}.csv`,
                description: `${year}: ${description}`,
            });
        }

        return dataset.resources.length > 0 ? dataset : null;
    }

    // ── Daily port activity by country ──

    async getDailyPorts(iso3: string): Promise<Row[]> {
        const code = iso3.trim().toUpperCase();
        if (!isIso3Code(code)) {
            throw new Error(`Invalid ISO3 country code: '${iso3}'`);
        }

        const features = await this.source.fetchAll(this.config.endpoints.daily_trade, {
            where: `ISO3='${code}'`,
            format: 'json',
            pageSize: this.config.pageSize,
            diagnosticRetry: true,
        });
        const rows = this.normalizer.convertPointDates(this.normalizer.extractRows(features));
        return sortDescByDate(rows);
    }

    async generateDailyPortsDataset(iso3: string, rows: Row[]): Promise<DatasetDefinition | null> {
        if (rows.length === 0) {
            this.logger.warn(`No daily ports data for country ${iso3}, skipping dataset creation`);
            return null;
        }

        const countryName = this.countryLookup.getName(iso3);
        if (countryName === null) {
            this.logger.error(`Couldn't find country ${iso3}, skipping`);
            return null;
        }

        const { start, end } = getDateRange(rows);
        if (start === null || end === null) {
            this.logger.warn(`Daily ports data for ${iso3} has no dates, skipping dataset creation`);
            return null;
        }

        const dataset = this.builder.createDataset({
            title: `${countryName}: Daily Port Activity Data and Shipment Estimates`,
            tags: this.config.tags,
            timePeriod: { start, end },
            location: { type: 'country', iso3: iso3.toUpperCase(), name: countryName },
        });

        await this.builder.addCsvResource(dataset, rows, {
            name: `${dataset.name}.csv`,
            description:
                'Daily port activity and preliminary shipment volume estimates ' +
                `for ${countryName}. See variable descriptions [here](${ABOUT_DAILY_PORTS})`,
        });

        return dataset;
    }

    // ── Disruptions ──

    /**
     * Disruption rows carry fromdate/todate intervals. Rows are converted,
     * the collection keeps the service's epoch values.
     */
    async getDisruptions(): Promise<GeoSplitResult> {
        const features = await this.source.fetchAll(this.config.endpoints.disruptions, {
            format: 'geojson',
            pageSize: this.config.pageSize,
        });
        const { rows, collection } = this.normalizer.splitGeoFeatures(features);
        return { rows: this.normalizer.convertIntervalDates(rows), collection };
    }

    async generateDisruptionsDataset(disruptions: GeoSplitResult): Promise<DatasetDefinition | null> {
        if (disruptions.rows.length === 0) {
            this.logger.warn('No disruptions data, skipping dataset creation');
            return null;
        }

        const { start, end } = getDateRange(disruptions.rows);
        if (start === null || end === null) {
            this.logger.warn('Disruptions data has no dates, skipping dataset creation');
            return null;
        }

        const dataset = this.builder.createDataset({
            title: 'Disruptions',
            tags: this.config.disruptionsTags,
            timePeriod: { start, end },
            location: { type: 'world' },
        });

        await this.builder.addCsvResource(dataset, disruptions.rows, {
            name: `${dataset.name}.csv`,
            description:
                'Dataset identifying ports and chokepoints at risk by intersecting GDACS data. ' +
                `See variable descriptions [here](${ABOUT_DISRUPTIONS})`,
        });
        await this.builder.addGeoJsonResource(dataset, disruptions.collection, {
            name: `${dataset.name}.geojson`,
            description:
                'Dataset in GeoJSON format identifying ports and chokepoints at risk by intersecting GDACS data. ' +
                `See variable descriptions [here](${ABOUT_DISRUPTIONS})`,
        });

        return dataset;
    }

    // ── Run ──

    /**
     * Runs the selected datasets in order. A failing dataset or country is
     * recorded and the run continues with the next one.
     */
    async run(options: RunOptions = {}): Promise<RunSummary> {
        const selected = new Set<DatasetKind>(options.datasets ?? DATASET_KINDS);
        const catalog = options.catalog;
        const entries: RunEntry[] = [];
        const fetched: { portRows?: Row[] } = {};

        if (selected.has('ports')) {
            entries.push(await this.runStep('ports', undefined, catalog, async () => {
                const ports = await this.getPorts();
                fetched.portRows = ports.rows;
                return this.generatePortsDataset(ports);
            }));
        }

        if (selected.has('chokepoints')) {
            entries.push(await this.runStep('chokepoints', undefined, catalog, async () =>
                this.generateChokepointsDataset(await this.getChokepoints())
            ));
        }

        if (selected.has('daily-chokepoints')) {
            entries.push(await this.runStep('daily-chokepoints', undefined, catalog, async () =>
                this.generateDailyChokepointsDataset(await this.getDailyChokepoints())
            ));
        }

        if (selected.has('disruptions')) {
            entries.push(await this.runStep('disruptions', undefined, catalog, async () =>
                this.generateDisruptionsDataset(await this.getDisruptions())
            ));
        }

        if (selected.has('daily-ports')) {
            const countries = await this.resolveCountries(options.countries, fetched, entries);
            if (countries !== null) {
                this.logger.info(`Publishing daily port data for ${countries.length} countries`);
                for (const iso3 of countries) {
                    if (!isIso3Code(iso3)) {
                        this.logger.warn(`Invalid ISO3 country code '${iso3}', skipping`);
                        entries.push({
                            kind: 'daily-ports',
                            country: iso3,
                            outcome: { status: 'skipped', reason: 'invalid ISO3 country code' },
                        });
                        continue;
                    }
                    entries.push(await this.runStep('daily-ports', iso3, catalog, async () =>
                        this.generateDailyPortsDataset(iso3, await this.getDailyPorts(iso3))
                    ));
                }
            }
        }

        const failed = entries.filter((e) => e.outcome.status === 'failed').length;
        this.logger.info(`Run complete: ${entries.length} steps, ${failed} failed`);
        return { entries, failed };
    }

    /**
     * Explicit country codes win; otherwise the port countries, fetching the
     * ports layer if the ports dataset did not run. Returns null when the
     * country list could not be obtained (recorded as a failed entry).
     */
    private async resolveCountries(
        requested: string[] | undefined,
        fetched: { portRows?: Row[] },
        entries: RunEntry[]
    ): Promise<string[] | null> {
        if (requested && requested.length > 0) {
            return [...new Set(requested.map((c) => c.trim().toUpperCase()).filter(Boolean))].sort();
        }
        if (fetched.portRows) {
            return this.getPortCountries(fetched.portRows);
        }
        try {
            const ports = await this.getPorts();
            return this.getPortCountries(ports.rows);
        } catch (err) {
            this.logger.error({ err }, 'Could not fetch ports for the country list');
            entries.push({ kind: 'daily-ports', outcome: { status: 'failed', error: errorMessage(err) } });
            return null;
        }
    }

    private async runStep(
        kind: DatasetKind,
        country: string | undefined,
        catalog: DatasetCatalog | undefined,
        produce: () => Promise<DatasetDefinition | null>
    ): Promise<RunEntry> {
        let outcome: DatasetOutcome;
        try {
            const dataset = await produce();
            if (dataset === null) {
                outcome = { status: 'skipped', reason: 'no dataset produced' };
            } else if (!catalog) {
                outcome = { status: 'built', datasetName: dataset.name, resources: dataset.resources.length };
            } else {
                const result = await catalog.publish(dataset);
                outcome = { status: 'published', datasetName: dataset.name, resources: result.resourcesStored };
            }
        } catch (err) {
            this.logger.error({ err, kind, country }, 'Dataset run failed');
            outcome = { status: 'failed', error: errorMessage(err) };
        }

        return country === undefined ? { kind, outcome } : { kind, country, outcome };
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
