/**
 * Pricing Query Types
 */

// ============================================================================
// Price List API Types
// ============================================================================

/**
 * Single filter sent to GetProducts. Only TERM_MATCH is used by the agent.
 */
export interface ApiFilter {
    Type: 'TERM_MATCH';
    Field: string;
    Value: string;
}

/**
 * A product entry from the PriceList array, parsed from its JSON string and tagged
 * with the location it was queried for
 */
export type PricingRecord = Readonly<Record<string, unknown>> & {
    readonly queryRegion: string;
};

// ============================================================================
// Agent Request / Response
// ============================================================================

export type FilterMap = Record<string, string>;

export interface QueryResult {
    pricing_records: PricingRecord[];
    result_file_path: string;
    service_code: string;
    regions_queried: string[];
    record_count: number;
    filters_applied: FilterMap;
}

/**
 * Document persisted to the result file
 */
export interface ResultDocument {
    service_code: string;
    regions_queried: string[];
    filters_applied: FilterMap;
    record_count: number;
    pricing_records: PricingRecord[];
    generated_at: string;
}
