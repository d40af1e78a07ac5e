export { runPricingQuery, type PricingAgentDeps } from './agent/pricing-agent.js';
export { parseQueryRequest, queryRequestSchema, type QueryRequest, type QueryRequestInput } from './agent/schema.js';
export {
    PricingAgentError,
    InvalidArgumentError,
    UpstreamError,
    ResultFileError,
    type PricingAgentErrorCode,
} from './agent/errors.js';
export { PricingProductSource, fetchProducts, type ProductSource } from './aws/client.js';
export { REGION_LOCATIONS, regionToLocation, listRegions } from './aws/regions.js';
export {
    FRIENDLY_FILTER_FIELDS,
    normalizeFilters,
    buildApiFilters,
    listFriendlyFilters,
    parseFilterPairs,
} from './filters/filter-normalizer.js';
export {
    EventBridgeExecutionEmitter,
    LoggingExecutionEmitter,
    createExecutionEmitter,
    type ExecutionEvent,
    type ExecutionEventEmitter,
} from './events/execution-events.js';
export { createHandler, executionEventSchema, type ExecutionResponse, type HandlerDeps } from './execution-handler.js';
export type { PricingRecord, QueryResult, ResultDocument, ApiFilter, FilterMap } from './types/pricing.js';
