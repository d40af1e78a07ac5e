import { describe, it, expect, vi } from 'vitest';
import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { pino } from 'pino';
import {
    EventBridgeExecutionEmitter,
    LoggingExecutionEmitter,
    createExecutionEmitter,
    createExecutionEvent,
    emitSafely,
    type ExecutionEventEmitter,
} from '../../events/execution-events.js';

const silent = pino({ level: 'silent' });

function clientReturning(output: { FailedEntryCount: number; Entries: Array<{ ErrorMessage?: string }> }) {
    const client = new EventBridgeClient({ region: 'us-east-1' });
    const sent: unknown[] = [];
    vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
        sent.push(command);
        return { $metadata: {}, ...output };
    });
    return { client, sent };
}

describe('createExecutionEvent', () => {
    it('builds an envelope on the pricing execution channel', () => {
        const event = createExecutionEvent('started', 'exec-1', 'AmazonEC2');

        expect(event).toMatchObject({
            eventType: 'ratio::agent::aws::pricing::execution',
            status: 'started',
            executionId: 'exec-1',
            serviceCode: 'AmazonEC2',
            detail: {},
        });
        expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    });

    it('omits an unknown service code', () => {
        expect(createExecutionEvent('failed', 'exec-2', undefined)).not.toHaveProperty('serviceCode');
    });
});

describe('EventBridgeExecutionEmitter', () => {
    it('publishes one PutEvents entry', async () => {
        const { client, sent } = clientReturning({ FailedEntryCount: 0, Entries: [{}] });
        const emitter = new EventBridgeExecutionEmitter('agents-bus', 'pricing-agent', client, silent);
        const event = createExecutionEvent('succeeded', 'exec-1', 'AmazonEC2', { record_count: 3 });

        await emitter.emit(event);

        expect(sent).toHaveLength(1);
        const command = sent[0];
        expect(command).toBeInstanceOf(PutEventsCommand);
        if (command instanceof PutEventsCommand) {
            expect(command.input.Entries).toEqual([
                {
                    Source: 'pricing-agent',
                    DetailType: 'ratio::agent::aws::pricing::execution',
                    Detail: JSON.stringify(event),
                    EventBusName: 'agents-bus',
                },
            ]);
        }
    });

    it('throws when the entry is rejected', async () => {
        const { client } = clientReturning({ FailedEntryCount: 1, Entries: [{ ErrorMessage: 'bus not found' }] });
        const emitter = new EventBridgeExecutionEmitter('missing-bus', 'pricing-agent', client, silent);

        await expect(emitter.emit(createExecutionEvent('started', 'exec-1', 'AmazonEC2'))).rejects.toThrow(
            'Failed to publish execution event: bus not found'
        );
    });
});

describe('createExecutionEmitter', () => {
    it('logs events when no bus is configured', () => {
        expect(createExecutionEmitter('')).toBeInstanceOf(LoggingExecutionEmitter);
    });

    it('publishes to EventBridge when a bus is configured', () => {
        expect(createExecutionEmitter('agents-bus')).toBeInstanceOf(EventBridgeExecutionEmitter);
    });
});

describe('emitSafely', () => {
    it('swallows emitter failures after logging them', async () => {
        const emitter: ExecutionEventEmitter = { emit: vi.fn().mockRejectedValue(new Error('throttled')) };
        const log = pino({ level: 'silent' });
        const warn = vi.spyOn(log, 'warn');

        await expect(emitSafely(emitter, createExecutionEvent('started', 'exec-1', 'AmazonEC2'), log)).resolves.toBeUndefined();
        expect(warn).toHaveBeenCalledWith({ status: 'started', error: 'throttled' }, 'Failed to emit execution event');
    });
});
