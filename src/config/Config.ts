import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import dotenv from 'dotenv';
import { z } from 'zod';

import type { DatasetMetadata } from '../model/Models.ts';

/**
 * Environment variables used by the job
 */
const EnvSchema = z.object({
    DATABASE_URL: z.string().min(1).optional(),
    // read by the root logger in utils/Logger.ts
    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),
    NODE_ENV: z.string().optional(),
    USER_AGENT: z.string().min(1).default('maritime-trade-etl'),
    PAGE_SIZE: z.coerce.number().int().positive().default(1000),
    PROJECT_CONFIG: z.string().min(1).default('config/project_configuration.json'),
});

const EndpointsSchema = z.object({
    ports: z.string().min(1),
    chokepoints: z.string().min(1),
    daily_chokepoints: z.string().min(1),
    daily_trade: z.string().min(1),
    disruptions: z.string().min(1),
});

const DatasetDefaultsSchema = z.object({
    dataset_source: z.string(),
    license_id: z.string(),
    license_other: z.string().optional(),
    methodology: z.string(),
    methodology_other: z.string().optional(),
    caveats: z.string().nullable().optional(),
    notes: z.string().optional(),
    package_creator: z.string().optional(),
    private: z.boolean().default(false),
});

/**
 * Project configuration file (config/project_configuration.json)
 */
const ProjectConfigSchema = z.object({
    base_url: z.string().url(),
    endpoints: EndpointsSchema,
    tags: z.array(z.string()).min(1),
    disruptions_tags: z.array(z.string()).min(1),
    static_start_dates: z.object({
        ports: z.coerce.date(),
        chokepoints: z.coerce.date(),
    }),
    daily_chokepoints_split_by_year: z.boolean().default(false),
    dataset_defaults: DatasetDefaultsSchema,
});

export type EnvConfig = z.infer<typeof EnvSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type Endpoints = z.infer<typeof EndpointsSchema>;

export interface AppConfig {
    databaseUrl?: string;
    userAgent: string;
    pageSize: number;
    baseUrl: string;
    endpoints: Endpoints;
    tags: string[];
    disruptionsTags: string[];
    staticStartDates: { ports: Date; chokepoints: Date };
    dailyChokepointsSplitByYear: boolean;
    datasetDefaults: DatasetMetadata;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validates environment variables
 * @throws Error listing every invalid key
 */
export function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new Error(`Invalid environment configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Validates the parsed project configuration file
 * @throws Error listing every invalid key
 */
export function parseProjectConfig(raw: unknown): ProjectConfig {
    const result = ProjectConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new Error(`Invalid project configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

export function buildAppConfig(env: EnvConfig, project: ProjectConfig): AppConfig {
    const defaults = project.dataset_defaults;
    return {
        databaseUrl: env.DATABASE_URL,
        userAgent: env.USER_AGENT,
        pageSize: env.PAGE_SIZE,
        baseUrl: project.base_url.replace(/\/$/, ''),
        endpoints: project.endpoints,
        tags: project.tags,
        disruptionsTags: project.disruptions_tags,
        staticStartDates: project.static_start_dates,
        dailyChokepointsSplitByYear: project.daily_chokepoints_split_by_year,
        datasetDefaults: {
            datasetSource: defaults.dataset_source,
            licenseId: defaults.license_id,
            licenseOther: defaults.license_other,
            methodology: defaults.methodology,
            methodologyOther: defaults.methodology_other,
            caveats: defaults.caveats ?? null,
            notes: defaults.notes,
            packageCreator: defaults.package_creator,
            private: defaults.private,
        },
    };
}

/**
 * Loads .env, validates the environment and reads the project configuration file.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
    dotenv.config();
    const envConfig = parseEnv(env);

    const configPath = resolve(envConfig.PROJECT_CONFIG);
    const body = await readFile(configPath, 'utf-8');
    const project = parseProjectConfig(JSON.parse(body));

    return buildAppConfig(envConfig, project);
}
