// src/index.ts

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { Command, Option } from 'commander';

import { loadConfig } from './config/Config.ts';
import { CatalogClient } from './db/CatalogClient.ts';
import { PostgresCatalogStore } from './db/PostgresCatalogStore.ts';
import { DATASET_KINDS } from './model/Models.ts';
import { Pipeline } from './pipeline/Pipeline.ts';
import { DatasetBuilder } from './publisher/DatasetBuilder.ts';
import { FeatureServiceSource } from './source/FeatureServiceSource.ts';
import { createLogger } from './utils/Logger.ts';
import type { DatasetKind, RunSummary } from './model/Models.ts';

//central logger init
const logger = createLogger('app');

interface CliOptions {
  readonly datasets?: string[];
  readonly countries?: string[];
  readonly outputDir?: string;
  readonly dryRun: boolean;
  readonly initSchema: boolean;
}

function isDatasetKind(value: string): value is DatasetKind {
  return DATASET_KINDS.some((kind) => kind === value);
}

async function prepareOutputDir(outputDir?: string): Promise<{ dir: string; temporary: boolean }> {
  if (outputDir) {
    const dir = resolve(outputDir);
    await mkdir(dir, { recursive: true });
    return { dir, temporary: false };
  }
  return { dir: await mkdtemp(join(tmpdir(), 'maritime-trade-')), temporary: true };
}

function logSummary(summary: RunSummary) {
  for (const entry of summary.entries) {
    const label = entry.country ? `${entry.kind}/${entry.country}` : entry.kind;
    const { outcome } = entry;
    switch (outcome.status) {
      case 'published':
      case 'built':
        logger.info(`${label}: ${outcome.status} '${outcome.datasetName}' (${outcome.resources} resources)`);
        break;
      case 'skipped':
        logger.warn(`${label}: skipped, ${outcome.reason}`);
        break;
      case 'failed':
        logger.error(`${label}: failed, ${outcome.error}`);
        break;
    }
  }
}

async function main(options: CliOptions) {
  logger.info('Maritime trade ETL starting...');

  const config = await loadConfig();
  const datasets = options.datasets?.filter(isDatasetKind);
  const output = await prepareOutputDir(options.outputDir);
  logger.info(`Working directory: ${output.dir}`);

  const source = new FeatureServiceSource(config.baseUrl, { userAgent: config.userAgent });
  const builder = new DatasetBuilder(output.dir, config.datasetDefaults);
  const pipeline = new Pipeline({ config, source, builder });

  const catalog = options.dryRun
    ? undefined
    : new CatalogClient(new PostgresCatalogStore(config.databaseUrl));

  let summary: RunSummary;
  try {
    if (catalog && options.initSchema) {
      await catalog.ensureSchema();
    }
    summary = await pipeline.run({ datasets, countries: options.countries, catalog });
  } finally {
    await catalog?.close();
  }

  logSummary(summary);

  if (options.dryRun) {
    logger.info(`Dry run, files kept in ${output.dir}`);
  } else if (output.temporary && summary.failed === 0) {
    await rm(output.dir, { recursive: true, force: true });
  }

  process.exitCode = summary.failed > 0 ? 1 : 0;
}

const program = new Command()
  .name('maritime-trade-etl')
  .description('Publish port, chokepoint, disruption and daily trade datasets to the catalog')
  .addOption(
    new Option('-d, --datasets <names...>', 'datasets to run (default: all)').choices(DATASET_KINDS)
  )
  .option('-c, --countries <iso3...>', 'ISO3 codes for daily port data (default: every country with a port)')
  .option('-o, --output-dir <dir>', 'where resource files are staged (default: a fresh temp dir)')
  .option('--dry-run', 'build dataset files without publishing', false)
  .option('--init-schema', 'create the catalog tables before publishing', false)
  .action(async (options: CliOptions) => {
    try {
      await main(options);
    } catch (err) {
      logger.error({ err }, 'Run failed');
      process.exitCode = 1;
    }
  });

await program.parseAsync();
