import { describe, it, expect } from 'vitest';
import {
    FRIENDLY_FILTER_FIELDS,
    buildApiFilters,
    listFriendlyFilters,
    normalizeFilters,
    parseFilterPairs,
} from '../../filters/filter-normalizer.js';
import { InvalidArgumentError } from '../../agent/errors.js';

describe('normalizeFilters', () => {
    it('maps friendly names to Price List fields', () => {
        expect(
            normalizeFilters({
                instance_type: 'm5.large',
                operating_system: 'Linux',
                capacity_status: 'Used',
                pre_installed_sw: 'NA',
            })
        ).toEqual({
            instanceType: 'm5.large',
            operatingSystem: 'Linux',
            capacitystatus: 'Used',
            preInstalledSw: 'NA',
        });
    });

    it('passes unknown keys through unchanged', () => {
        expect(normalizeFilters({ marketoption: 'OnDemand', instanceType: 't3.micro' })).toEqual({
            marketoption: 'OnDemand',
            instanceType: 't3.micro',
        });
    });

    it('keeps the input key order', () => {
        const normalized = normalizeFilters({ tenancy: 'Shared', instance_type: 'm5.large', zeta: 'z' });
        expect(Object.keys(normalized)).toEqual(['tenancy', 'instanceType', 'zeta']);
    });

    it('lets the later value win when two keys map to the same field', () => {
        expect(normalizeFilters({ instance_type: 'm5.large', instanceType: 'c5.xlarge' })).toEqual({
            instanceType: 'c5.xlarge',
        });
    });

    it('does not resolve inherited object properties as friendly names', () => {
        expect(normalizeFilters({ toString: 'x' })).toEqual({ toString: 'x' });
    });

    it('returns an empty map for no filters', () => {
        expect(normalizeFilters({})).toEqual({});
    });

    it('cannot be modified at runtime', () => {
        expect(Object.isFrozen(FRIENDLY_FILTER_FIELDS)).toBe(true);
    });
});

describe('buildApiFilters', () => {
    it('builds TERM_MATCH filters with location last', () => {
        expect(buildApiFilters({ instanceType: 'm5.large' }, 'US East (Ohio)')).toEqual([
            { Type: 'TERM_MATCH', Field: 'instanceType', Value: 'm5.large' },
            { Type: 'TERM_MATCH', Field: 'location', Value: 'US East (Ohio)' },
        ]);
    });

    it('replaces a location filter with the queried location', () => {
        expect(buildApiFilters({ location: 'Europe (Paris)' }, 'US West (Oregon)')).toEqual([
            { Type: 'TERM_MATCH', Field: 'location', Value: 'US West (Oregon)' },
        ]);
    });
});

describe('parseFilterPairs', () => {
    it('splits on the first equals sign', () => {
        expect(parseFilterPairs(['instance_type=m5.large', 'usage_type=BoxUsage:m5.large=x'])).toEqual({
            instance_type: 'm5.large',
            usage_type: 'BoxUsage:m5.large=x',
        });
    });

    it('returns an empty map when no pairs are given', () => {
        expect(parseFilterPairs()).toEqual({});
    });

    it('rejects a pair without a key', () => {
        expect(() => parseFilterPairs(['=m5.large'])).toThrow(InvalidArgumentError);
        expect(() => parseFilterPairs(['instance_type'])).toThrow('Malformed filter "instance_type", expected key=value');
    });
});

describe('listFriendlyFilters', () => {
    it('lists every table entry', () => {
        const entries = listFriendlyFilters();
        expect(entries).toHaveLength(Object.keys(FRIENDLY_FILTER_FIELDS).length);
        expect(entries).toContainEqual({ name: 'instance_type', field: 'instanceType' });
    });
});
