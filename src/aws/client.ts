/**
 * AWS Price List API Client
 * Paged GetProducts queries with a record budget
 */

import {
    PricingClient,
    GetProductsCommand,
    type GetProductsCommandInput,
    type GetProductsCommandOutput,
} from '@aws-sdk/client-pricing';
import { config, PAGE_SIZE_LIMIT } from '../config/index.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { ApiFilter, PricingRecord } from '../types/pricing.js';

/**
 * One page of GetProducts. Implemented over the SDK client; tests supply fakes.
 */
export interface ProductSource {
    getProducts(input: GetProductsCommandInput): Promise<GetProductsCommandOutput>;
}

export class PricingProductSource implements ProductSource {
    private client: PricingClient;

    constructor(client?: PricingClient) {
        this.client =
            client ??
            new PricingClient({
                region: config.aws.pricingRegion,
                maxAttempts: config.aws.maxAttempts,
            });
    }

    async getProducts(input: GetProductsCommandInput): Promise<GetProductsCommandOutput> {
        return this.client.send(new GetProductsCommand(input));
    }
}

export interface FetchProductsOptions {
    serviceCode: string;
    filters: ApiFilter[];
    location: string;
    /** Stop once this many records have been collected */
    limit: number;
    log?: Logger;
}

/**
 * Fetch products page by page until the source runs out or `limit` records are
 * collected. Entries that are not JSON objects are skipped.
 */
export async function fetchProducts(source: ProductSource, options: FetchProductsOptions): Promise<PricingRecord[]> {
    const { serviceCode, filters, location, limit } = options;
    const log = options.log ?? rootLogger;
    const records: PricingRecord[] = [];
    let nextToken: string | undefined;
    let page = 0;

    while (records.length < limit) {
        const remaining = limit - records.length;

        const response = await source.getProducts({
            ServiceCode: serviceCode,
            Filters: filters,
            MaxResults: Math.min(remaining, PAGE_SIZE_LIMIT),
            NextToken: nextToken,
        });
        page++;

        for (const item of response.PriceList ?? []) {
            if (records.length >= limit) break;

            const parsed = parsePriceListItem(String(item));
            if (!parsed) {
                log.warn({ location, page }, 'Skipping unparseable price list entry');
                continue;
            }

            records.push({ ...parsed, queryRegion: location });
        }

        log.debug({ location, page, collected: records.length }, 'Fetched price list page');

        nextToken = response.NextToken;
        if (!nextToken) break;
    }

    return records;
}

function parsePriceListItem(raw: string): Record<string, unknown> | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    return isRecord(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
