import { z } from 'zod';

import { createLogger } from '../utils/Logger.ts';

import type { FeatureRecord, FetchOptions, QueryFormat } from '../model/Models.ts';
import type { Logger } from 'pino';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_PAGE_SIZE = 1000;
export const MATCH_ALL = '1=1';
const ORDER_BY_FIELD = 'OBJECTID';
const BODY_PREVIEW_LENGTH = 1000;

const AttributeMapSchema = z.record(
    z.union([z.string(), z.number(), z.boolean(), z.null()])
);

const FeatureRecordSchema = z.object({
    attributes: AttributeMapSchema.nullish(),
    properties: AttributeMapSchema.nullish(),
    geometry: z.unknown().optional(),
});

/**
 * Body of a FeatureServer query. ArcGIS reports query errors with HTTP 200
 * and an `error` object instead of features.
 */
const QueryResponseSchema = z.object({
    features: z.array(FeatureRecordSchema).optional(),
    error: z
        .object({
            code: z.number().optional(),
            message: z.string().optional(),
            details: z.array(z.string()).optional(),
        })
        .optional(),
});

export interface PageRequest {
    endpoint: string;
    where: string;
    format: QueryFormat;
    offset: number;
    limit: number;
}

export interface FeatureServiceSourceOptions {
    userAgent?: string;
    fetchFn?: FetchFn;
    logger?: Logger;
}

/**
 * Reads every feature of an ArcGIS FeatureServer layer using offset pagination.
 *
 * Pages are requested ordered by OBJECTID, starting at offset 0. Paging stops
 * on the first empty page, or on a page shorter than the page size, so a
 * short last page costs no extra round-trip.
 */
export class FeatureServiceSource {
    readonly baseUrl: string;
    private userAgent: string;
    private fetchFn: FetchFn;
    private logger: Logger;

    constructor(baseUrl: string, options: FeatureServiceSourceOptions = {}) {
        this.baseUrl = baseUrl.replace(/\/$/, '');
        this.userAgent = options.userAgent ?? 'maritime-trade-etl';
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
        this.logger = options.logger ?? createLogger('FeatureServiceSource');
    }

    /**
     * Fetches all pages of a layer and returns the features in source order.
     * @param endpoint Feature service name, e.g. 'Daily_Trade_Data'
     */
    async fetchAll(endpoint: string, options: FetchOptions = {}): Promise<FeatureRecord[]> {
        const where = options.where ?? MATCH_ALL;
        const limit = options.pageSize ?? DEFAULT_PAGE_SIZE;
        const format = options.format ?? 'json';

        if (!Number.isInteger(limit) || limit <= 0) {
            throw new Error(`Page size must be a positive integer, got ${limit}`);
        }

        this.logger.info(`Fetching ${endpoint} (where: ${where}, page size: ${limit})`);

        const features: FeatureRecord[] = [];
        let offset = 0;

        while (true) {
            const page = await this.fetchPage(
                { endpoint, where, format, offset, limit },
                options.diagnosticRetry ?? false
            );

            if (page.length === 0) {
                break;
            }

            features.push(...page);
            this.logger.debug(`${endpoint}: offset ${offset} returned ${page.length} features`);

            if (page.length < limit) {
                break;
            }

            offset += limit;
        }

        this.logger.info(`Fetched ${features.length} features from ${endpoint}`);
        return features;
    }

    /**
     * Builds the query URL for one page
     */
    buildQueryUrl(request: PageRequest): string {
        const url = new URL(`${this.baseUrl}/${request.endpoint}/FeatureServer/0/query`);
        url.searchParams.set('where', request.where);
        url.searchParams.set('outFields', '*');
        url.searchParams.set('outSR', '4326');
        url.searchParams.set('f', request.format);
        url.searchParams.set('orderByFields', ORDER_BY_FIELD);
        url.searchParams.set('resultOffset', String(request.offset));
        url.searchParams.set('resultRecordCount', String(request.limit));
        return url.toString();
    }

    private async fetchPage(request: PageRequest, diagnosticRetry: boolean): Promise<FeatureRecord[]> {
        const url = this.buildQueryUrl(request);
        const response = await this.fetchFn(url, { headers: this.headers() });

        if (!response.ok) {
            const err = `Feature service request failed for ${request.endpoint}. Status code: ${response.status}`;
            this.logger.error(err);
            throw new Error(err);
        }

        const body = await response.text();

        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch (parseError) {
            if (!diagnosticRetry) {
                throw parseError;
            }
            json = await this.refetchForDiagnostics(url, request, parseError);
        }

        return this.readFeatures(json, request.endpoint);
    }

    /**
     * Single re-fetch after a JSON parse failure. Logs what the service actually
     * returned; if the re-fetch fails or its body does not parse either, the
     * original parse error is rethrown.
     */
    private async refetchForDiagnostics(
        url: string,
        request: PageRequest,
        originalError: unknown
    ): Promise<unknown> {
        const context = {
            endpoint: request.endpoint,
            where: request.where,
            offset: request.offset,
            limit: request.limit,
        };
        this.logger.error({ ...context, err: originalError }, 'Invalid JSON from feature service, re-fetching once');

        let response: Response;
        let body: string;
        try {
            response = await this.fetchFn(url, { headers: this.headers() });
            body = await response.text();
        } catch (refetchError) {
            this.logger.error({ ...context, err: refetchError }, 'Diagnostic re-fetch failed, giving up');
            throw originalError;
        }

        this.logger.error(
            {
                ...context,
                status: response.status,
                contentType: response.headers.get('content-type'),
                bodyPreview: body.slice(0, BODY_PREVIEW_LENGTH),
            },
            'Diagnostic re-fetch response'
        );

        try {
            return JSON.parse(body);
        } catch (secondError) {
            this.logger.error(
                { ...context, err: secondError },
                'Second JSON parse attempt also failed, giving up'
            );
            throw originalError;
        }
    }

    private readFeatures(json: unknown, endpoint: string): FeatureRecord[] {
        const parsed = QueryResponseSchema.safeParse(json);
        if (!parsed.success) {
            const err = `Unexpected response shape from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`;
            this.logger.error(err);
            throw new Error(err);
        }

        const { features, error } = parsed.data;
        if (error) {
            const err = `Feature service error from ${endpoint} (code ${error.code ?? 'n/a'}): ${error.message ?? 'no message'}`;
            this.logger.error({ details: error.details }, err);
            throw new Error(err);
        }

        return features ?? [];
    }

    private headers(): Record<string, string> {
        return {
            'Accept': 'application/json',
            'User-Agent': this.userAgent,
        };
    }
}
