/**
 * Typed agent errors. Every error is terminal for the invocation.
 */

export type PricingAgentErrorCode = 'INVALID_ARGUMENT' | 'UPSTREAM_ERROR' | 'IO_ERROR';

export class PricingAgentError extends Error {
    constructor(
        message: string,
        public readonly code: PricingAgentErrorCode,
        public readonly details: Record<string, unknown> = {},
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

/**
 * Bad arguments: out-of-range max_records, malformed filters, missing service code
 */
export class InvalidArgumentError extends PricingAgentError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'INVALID_ARGUMENT', { issues });
    }
}

/**
 * Price List API rejection, auth or network failure, unknown service or region
 */
export class UpstreamError extends PricingAgentError {
    constructor(message: string, details: { serviceCode: string; region?: string }, cause?: unknown) {
        super(message, 'UPSTREAM_ERROR', details, { cause });
    }
}

/**
 * Result file could not be written
 */
export class ResultFileError extends PricingAgentError {
    constructor(filePath: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to write result file ${filePath}: ${reason}`, 'IO_ERROR', { filePath }, { cause });
    }
}

export function describeError(error: unknown): { name: string; message: string } {
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { name: 'Error', message: String(error) };
}
