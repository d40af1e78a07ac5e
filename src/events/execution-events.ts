/**
 * Execution telemetry for the pricing agent
 */

import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { config, PRICING_EXECUTION_EVENT_TYPE } from '../config/index.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type ExecutionStatus = 'started' | 'succeeded' | 'failed';

export interface ExecutionEvent {
    eventType: typeof PRICING_EXECUTION_EVENT_TYPE;
    status: ExecutionStatus;
    executionId: string;
    serviceCode?: string;
    timestamp: string;
    detail: Record<string, unknown>;
}

export interface ExecutionEventEmitter {
    emit(event: ExecutionEvent): Promise<void>;
}

export function createExecutionEvent(
    status: ExecutionStatus,
    executionId: string,
    serviceCode: string | undefined,
    detail: Record<string, unknown> = {}
): ExecutionEvent {
    return {
        eventType: PRICING_EXECUTION_EVENT_TYPE,
        status,
        executionId,
        ...(serviceCode ? { serviceCode } : {}),
        timestamp: new Date().toISOString(),
        detail,
    };
}

/**
 * Publish execution events to EventBridge
 */
export class EventBridgeExecutionEmitter implements ExecutionEventEmitter {
    private client: EventBridgeClient;

    constructor(
        private readonly eventBusName: string,
        private readonly source: string = config.events.source,
        client?: EventBridgeClient,
        private readonly log: Logger = rootLogger
    ) {
        this.client = client ?? new EventBridgeClient({ maxAttempts: config.aws.maxAttempts });
    }

    async emit(event: ExecutionEvent): Promise<void> {
        const result = await this.client.send(
            new PutEventsCommand({
                Entries: [
                    {
                        Source: this.source,
                        DetailType: event.eventType,
                        Detail: JSON.stringify(event),
                        EventBusName: this.eventBusName,
                    },
                ],
            })
        );

        if (result.FailedEntryCount && result.FailedEntryCount > 0) {
            const error = result.Entries?.[0]?.ErrorMessage ?? 'Unknown error';
            throw new Error(`Failed to publish execution event: ${error}`);
        }

        this.log.debug({ status: event.status, executionId: event.executionId }, 'Execution event published');
    }
}

/**
 * Used when no event bus is configured
 */
export class LoggingExecutionEmitter implements ExecutionEventEmitter {
    constructor(private readonly log: Logger = rootLogger) {}

    async emit(event: ExecutionEvent): Promise<void> {
        this.log.info({ executionEvent: event }, 'Execution event');
    }
}

export function createExecutionEmitter(eventBusName: string = config.events.eventBusName): ExecutionEventEmitter {
    return eventBusName ? new EventBridgeExecutionEmitter(eventBusName) : new LoggingExecutionEmitter();
}

/**
 * Emit without letting a telemetry failure change the invocation outcome
 */
export async function emitSafely(emitter: ExecutionEventEmitter, event: ExecutionEvent, log: Logger): Promise<void> {
    try {
        await emitter.emit(event);
    } catch (error) {
        log.warn(
            { status: event.status, error: error instanceof Error ? error.message : String(error) },
            'Failed to emit execution event'
        );
    }
}
