/**
 * Filter Normalizer
 * Translates friendly (snake_case) filter names into Price List attribute names
 * and builds the TERM_MATCH filters sent to GetProducts.
 */

import type { ApiFilter, FilterMap } from '../types/pricing.js';
import type { Logger } from '../utils/logger.js';
import { InvalidArgumentError } from '../agent/errors.js';

/**
 * Friendly name -> Price List attribute name. Keys not listed here are sent as given.
 */
export const FRIENDLY_FILTER_FIELDS: Readonly<Record<string, string>> = Object.freeze({
    // Common
    product_family: 'productFamily',
    location: 'location',
    location_type: 'locationType',
    usage_type: 'usagetype',
    operation: 'operation',
    service_code: 'servicecode',
    region_code: 'regionCode',
    group: 'group',

    // Compute
    instance_type: 'instanceType',
    instance_family: 'instanceFamily',
    operating_system: 'operatingSystem',
    tenancy: 'tenancy',
    pre_installed_sw: 'preInstalledSw',
    capacity_status: 'capacitystatus',
    license_model: 'licenseModel',
    vcpu: 'vcpu',
    memory: 'memory',
    processor_architecture: 'processorArchitecture',
    current_generation: 'currentGeneration',

    // Databases
    database_engine: 'databaseEngine',
    database_edition: 'databaseEdition',
    deployment_option: 'deploymentOption',
    cache_engine: 'cacheEngine',

    // Storage
    storage_class: 'storageClass',
    volume_type: 'volumeType',
    volume_api_name: 'volumeApiName',
    storage_media: 'storageMedia',

    // Lambda
    architecture: 'architecture',
});

/**
 * Map friendly filter names to API field names, passing unknown keys through
 */
export function normalizeFilters(filters: FilterMap, log?: Logger): FilterMap {
    const normalized: FilterMap = {};

    for (const [key, value] of Object.entries(filters)) {
        const field = Object.hasOwn(FRIENDLY_FILTER_FIELDS, key) ? FRIENDLY_FILTER_FIELDS[key] : key;

        if (Object.hasOwn(normalized, field)) {
            log?.warn({ field, key, replaced: normalized[field], value }, 'Duplicate filter field, later value wins');
        }

        normalized[field] = value;
    }

    return normalized;
}

/**
 * Build TERM_MATCH filters for one region. The region's location replaces any
 * location given in the filters.
 */
export function buildApiFilters(filters: FilterMap, location: string): ApiFilter[] {
    const apiFilters: ApiFilter[] = [];

    for (const [field, value] of Object.entries(filters)) {
        if (field === 'location') continue;
        apiFilters.push({ Type: 'TERM_MATCH', Field: field, Value: value });
    }

    apiFilters.push({ Type: 'TERM_MATCH', Field: 'location', Value: location });

    return apiFilters;
}

export function listFriendlyFilters(): Array<{ name: string; field: string }> {
    return Object.entries(FRIENDLY_FILTER_FIELDS).map(([name, field]) => ({ name, field }));
}

/**
 * Parse repeated `key=value` CLI options into a filter map
 */
export function parseFilterPairs(pairs: string[] = []): FilterMap {
    const filters: FilterMap = {};

    for (const pair of pairs) {
        const separator = pair.indexOf('=');
        if (separator <= 0) {
            throw new InvalidArgumentError(`Malformed filter "${pair}", expected key=value`, [pair]);
        }
        filters[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }

    return filters;
}
