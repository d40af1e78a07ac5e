/**
 * Execution handler for the agent framework
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { PricingProductSource, type ProductSource } from './aws/client.js';
import { runPricingQuery } from './agent/pricing-agent.js';
import { InvalidArgumentError, describeError } from './agent/errors.js';
import { PRICING_EXECUTION_EVENT_TYPE } from './config/index.js';
import {
    createExecutionEmitter,
    createExecutionEvent,
    emitSafely,
    type ExecutionEventEmitter,
} from './events/execution-events.js';
import { createQueryLogger } from './utils/logger.js';
import type { QueryResult } from './types/pricing.js';

export const executionEventSchema = z.object({
    event_type: z.literal(PRICING_EXECUTION_EVENT_TYPE).optional(),
    execution_id: z.string().min(1).optional(),
    arguments: z.record(z.string(), z.unknown()),
    working_directory: z.string().min(1).optional(),
});

export type ExecutionRequest = z.infer<typeof executionEventSchema>;

// Read just the id from an envelope that may not pass the full schema
const executionIdSchema = z.object({ execution_id: z.string().min(1) });

export interface ExecutionResponse {
    status: 'success';
    execution_id: string;
    response: QueryResult;
}

export interface HandlerDeps {
    source?: ProductSource;
    emitter?: ExecutionEventEmitter;
}

export function createHandler(deps: HandlerDeps = {}) {
    const source = deps.source ?? new PricingProductSource();
    const emitter = deps.emitter ?? createExecutionEmitter();

    return async function handler(event: unknown): Promise<ExecutionResponse> {
        const parsed = executionEventSchema.safeParse(event);
        if (!parsed.success) {
            const idResult = executionIdSchema.safeParse(event);
            const executionId = idResult.success ? idResult.data.execution_id : randomUUID();
            const log = createQueryLogger('unknown', executionId);
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            const error = new InvalidArgumentError(`Invalid execution event: ${issues.join('; ')}`, issues);

            log.error({ issues }, 'Rejected execution event');
            await emitSafely(
                emitter,
                createExecutionEvent('failed', executionId, undefined, { error: error.name, message: error.message }),
                log
            );
            throw error;
        }

        const request = parsed.data;
        const executionId = request.execution_id ?? randomUUID();
        const serviceCode =
            typeof request.arguments.service_code === 'string' ? request.arguments.service_code : undefined;
        const log = createQueryLogger(serviceCode ?? 'unknown', executionId);

        await emitSafely(emitter, createExecutionEvent('started', executionId, serviceCode), log);

        try {
            const response = await runPricingQuery(request.arguments, {
                source,
                workingDirectory: request.working_directory,
                executionId,
                log,
            });

            await emitSafely(
                emitter,
                createExecutionEvent('succeeded', executionId, serviceCode, {
                    record_count: response.record_count,
                    result_file_path: response.result_file_path,
                }),
                log
            );

            return { status: 'success', execution_id: executionId, response };
        } catch (error) {
            const { name, message } = describeError(error);
            log.error({ err: error }, 'Pricing query failed');
            await emitSafely(emitter, createExecutionEvent('failed', executionId, serviceCode, { error: name, message }), log);
            throw error;
        }
    };
}
