/**
 * Pricing Query Agent
 * Validate -> normalize filters -> fetch per region under a global cap -> write file -> summarize
 */

import { fetchProducts, type ProductSource } from '../aws/client.js';
import { regionToLocation } from '../aws/regions.js';
import { buildApiFilters, normalizeFilters } from '../filters/filter-normalizer.js';
import { createQueryLogger, type Logger } from '../utils/logger.js';
import { resolveResultFilePath, writeResultFile } from '../utils/storage.js';
import { parseQueryRequest } from './schema.js';
import { UpstreamError, describeError } from './errors.js';
import type { PricingRecord, QueryResult } from '../types/pricing.js';

export interface PricingAgentDeps {
    source: ProductSource;
    /** Directory for generated result file paths */
    workingDirectory?: string;
    executionId?: string;
    log?: Logger;
}

/**
 * Run one pricing query. Any failure aborts the whole query; there are no partial results.
 */
export async function runPricingQuery(args: unknown, deps: PricingAgentDeps): Promise<QueryResult> {
    const request = parseQueryRequest(args);
    const { service_code: serviceCode, regions, max_records: maxRecords } = request;
    const log = deps.log ?? createQueryLogger(serviceCode, deps.executionId);

    log.info({ regions, maxRecords, filters: request.filters }, 'Starting pricing query');

    const filtersApplied = normalizeFilters(request.filters, log);
    if (Object.hasOwn(filtersApplied, 'location')) {
        log.warn({ location: filtersApplied.location }, 'location filter is replaced by each queried region');
    }

    // Resolve every region before the first API call
    const locations = regions.map((region) => {
        const location = regionToLocation(region);
        if (!location) {
            throw new UpstreamError(`Unknown region: ${region}`, { serviceCode, region });
        }
        return { region, location };
    });

    const pricingRecords: PricingRecord[] = [];

    for (const { region, location } of locations) {
        const remaining = maxRecords - pricingRecords.length;
        if (remaining <= 0) {
            log.debug({ region }, 'Record cap reached, skipping region');
            continue;
        }

        let regionRecords: PricingRecord[];
        try {
            regionRecords = await fetchProducts(deps.source, {
                serviceCode,
                filters: buildApiFilters(filtersApplied, location),
                location,
                limit: remaining,
                log,
            });
        } catch (error) {
            const { message } = describeError(error);
            throw new UpstreamError(
                `Price List query failed for ${serviceCode} in ${region}: ${message}`,
                { serviceCode, region },
                error
            );
        }

        pricingRecords.push(...regionRecords);
        log.info({ region, location, recordCount: regionRecords.length }, 'Fetched region pricing');
    }

    const resultFilePath = resolveResultFilePath(serviceCode, request.result_file_path, deps.workingDirectory);

    await writeResultFile(resultFilePath, {
        service_code: serviceCode,
        regions_queried: regions,
        filters_applied: filtersApplied,
        record_count: pricingRecords.length,
        pricing_records: pricingRecords,
        generated_at: new Date().toISOString(),
    });

    log.info({ recordCount: pricingRecords.length, resultFilePath }, 'Pricing query complete');

    return {
        pricing_records: pricingRecords,
        result_file_path: resultFilePath,
        service_code: serviceCode,
        regions_queried: regions,
        record_count: pricingRecords.length,
        filters_applied: filtersApplied,
    };
}
