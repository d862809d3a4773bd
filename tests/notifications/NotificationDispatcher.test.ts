import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DispatcherState } from '../../src/src/notifications/dispatcher/DispatcherState.js';
import {
    NotificationDispatcher,
    type NotificationDispatcherOptions,
    type RecordCallback,
} from '../../src/src/notifications/dispatcher/NotificationDispatcher.js';
import {
    ConnectError,
    FrameCountError,
    TransportError,
} from '../../src/src/notifications/errors/NotificationErrors.js';
import type { GapDetected } from '../../src/src/notifications/interfaces/GapDetected.js';
import type { NotificationRecord } from '../../src/src/notifications/interfaces/NotificationRecord.js';
import type { RawMultipartMessage } from '../../src/src/notifications/interfaces/RawMultipartMessage.js';
import { RenderMode } from '../../src/src/notifications/renderer/RenderMode.js';
import type { ITransport } from '../../src/src/notifications/transport/ITransport.js';
import { fakeHash, notificationFrames } from './mocks/frames.js';
import {
    flushPromises,
    ScriptedConnector,
    ScriptedTransport,
    type TransportStep,
} from './mocks/ScriptedTransport.js';

const ENDPOINT = 'tcp://127.0.0.1:28332';

describe('NotificationDispatcher', () => {
    let decodeErrors: Array<[string | undefined, Error]>;
    let gaps: GapDetected[];
    let controller: AbortController;

    beforeEach(() => {
        decodeErrors = [];
        gaps = [];
        controller = new AbortController();
    });

    function createDispatcher(options: NotificationDispatcherOptions = {}): NotificationDispatcher {
        return new NotificationDispatcher({
            onDecodeError: (topicHint, error) => decodeErrors.push([topicHint, error]),
            onGap: (gap) => gaps.push(gap),
            ...options,
        });
    }

    /**
     * Collects records and aborts the run once `stopAfter` records were delivered.
     */
    function collector(stopAfter: number): { records: NotificationRecord[]; onRecord: RecordCallback } {
        const records: NotificationRecord[] = [];

        return {
            records,
            onRecord: (record) => {
                records.push(record);

                if (records.length === stopAfter) {
                    controller.abort();
                }
            },
        };
    }

    function run(
        dispatcher: NotificationDispatcher,
        steps: TransportStep[],
        onRecord: RecordCallback,
    ): { transport: ScriptedTransport; connector: ScriptedConnector; done: Promise<void> } {
        const transport = new ScriptedTransport(steps);
        const connector = ScriptedConnector.single(ENDPOINT, transport);
        const done = dispatcher.run({
            connector,
            endpoint: ENDPOINT,
            topicFilter: 'hashtx',
            onRecord,
            signal: controller.signal,
        });

        return { transport, connector, done };
    }

    describe('receive loop', () => {
        it('should connect with the endpoint and topic filter', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(1);
            const { connector, done } = run(
                dispatcher,
                [notificationFrames('hashtx', fakeHash(1), 1)],
                onRecord,
            );

            await done;

            expect(connector.connections).toEqual([{ endpoint: ENDPOINT, topicFilter: 'hashtx' }]);
            expect(records).toHaveLength(1);
        });

        it('should deliver records in receipt order with their rendered view', async () => {
            const dispatcher = createDispatcher();
            const views: string[] = [];
            const { done } = run(
                dispatcher,
                [
                    notificationFrames('hashtx', Uint8Array.from([0x01, 0x02]), 1),
                    notificationFrames('hashtx', Uint8Array.from([0x03, 0x04]), 2),
                ],
                (record, view) => {
                    views.push(`${record.topic}:${record.sequence}:${view.text}`);

                    if (views.length === 2) controller.abort();
                },
            );

            await done;

            expect(views).toEqual(['hashtx:1:0102', 'hashtx:2:0304']);
        });

        it('should render with the configured mode', async () => {
            const dispatcher = createDispatcher({ renderMode: RenderMode.Utf8IfPrintable });
            let text = '';
            const { done } = run(
                dispatcher,
                [notificationFrames('rawtx', Buffer.from('abc'), 1)],
                (_record, view) => {
                    text = view.text;
                    controller.abort();
                },
            );

            await done;

            expect(text).toBe('abc');
        });

        it('should wait for an async consumer before receiving the next message', async () => {
            const dispatcher = createDispatcher();
            let releaseConsumer: () => void = () => undefined;
            const { transport, done } = run(
                dispatcher,
                [
                    notificationFrames('hashtx', fakeHash(1), 1),
                    notificationFrames('hashtx', fakeHash(2), 2),
                ],
                () =>
                    new Promise<void>((resolve) => {
                        releaseConsumer = resolve;
                    }),
            );

            await flushPromises();

            expect(transport.receiveCalls).toBe(1);
            expect(dispatcher.state).toBe(DispatcherState.Decoding);

            controller.abort();
            releaseConsumer();
            await done;

            expect(transport.receiveCalls).toBe(1);
        });
    });

    describe('malformed messages', () => {
        it('should drop a message with two frames and keep going', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(2);
            const { transport, done } = run(
                dispatcher,
                [
                    notificationFrames('hashtx', fakeHash(1), 1),
                    notificationFrames('hashtx', fakeHash(2), 2).slice(0, 2),
                    notificationFrames('hashtx', fakeHash(3), 3),
                ],
                onRecord,
            );

            await done;

            expect(records.map((record) => record.payload[0])).toEqual([1, 3]);
            expect(decodeErrors).toHaveLength(1);
            expect(decodeErrors[0][0]).toBe('hashtx');
            expect(decodeErrors[0][1]).toBeInstanceOf(FrameCountError);
            expect(dispatcher.stats).toEqual({
                received: 3,
                delivered: 2,
                decodeErrors: 1,
                gaps: 1,
            });
            expect(transport.receiveCalls).toBe(3);
        });

        it('should report decode errors without a topic hint when the topic is unreadable', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(1);
            const { done } = run(
                dispatcher,
                [
                    [Buffer.from([0x00]), fakeHash(1), Buffer.alloc(4)],
                    notificationFrames('hashtx', fakeHash(2), 1),
                ],
                onRecord,
            );

            await done;

            expect(records).toHaveLength(1);
            expect(decodeErrors.map(([hint, error]) => [hint, error.name])).toEqual([
                [undefined, 'EncodingError'],
            ]);
        });
    });

    describe('sequence gaps', () => {
        it('should report one gap for 5, 6, 8 without stopping', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(3);
            const { done } = run(
                dispatcher,
                [5, 6, 8].map((sequence) => notificationFrames('hashblock', fakeHash(sequence), sequence)),
                onRecord,
            );

            await done;

            expect(records).toHaveLength(3);
            expect(gaps).toEqual([{ topic: 'hashblock', expected: 7, actual: 8 }]);
        });

        it('should not report gaps for 5, 6, 7', async () => {
            const dispatcher = createDispatcher();
            const { onRecord } = collector(3);
            const { done } = run(
                dispatcher,
                [5, 6, 7].map((sequence) => notificationFrames('hashblock', fakeHash(sequence), sequence)),
                onRecord,
            );

            await done;

            expect(gaps).toEqual([]);
        });

        it('should not track sequences when gap detection is disabled', async () => {
            const dispatcher = createDispatcher({ gapDetection: false });
            const { onRecord } = collector(2);
            const { done } = run(
                dispatcher,
                [1, 9].map((sequence) => notificationFrames('hashtx', fakeHash(sequence), sequence)),
                onRecord,
            );

            await done;

            expect(gaps).toEqual([]);
            expect(dispatcher.stats.gaps).toBe(0);
        });

        it('should forget sequences between runs when resetOnReconnect is set', async () => {
            const dispatcher = createDispatcher();

            await run(dispatcher, [notificationFrames('hashtx', fakeHash(1), 5)], collector(1).onRecord)
                .done;

            controller = new AbortController();
            await run(dispatcher, [notificationFrames('hashtx', fakeHash(1), 9)], collector(1).onRecord)
                .done;

            expect(gaps).toEqual([]);
        });

        it('should keep sequences between runs when resetOnReconnect is disabled', async () => {
            const dispatcher = createDispatcher({ resetOnReconnect: false });

            await run(dispatcher, [notificationFrames('hashtx', fakeHash(1), 5)], collector(1).onRecord)
                .done;

            controller = new AbortController();
            await run(dispatcher, [notificationFrames('hashtx', fakeHash(1), 9)], collector(1).onRecord)
                .done;

            expect(gaps).toEqual([{ topic: 'hashtx', expected: 6, actual: 9 }]);
        });
    });

    describe('cancellation', () => {
        it('should return without receiving again when stopped between messages', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(1);
            const { transport, done } = run(
                dispatcher,
                [
                    notificationFrames('hashtx', fakeHash(1), 1),
                    notificationFrames('hashtx', fakeHash(2), 2),
                ],
                onRecord,
            );

            await expect(done).resolves.toBeUndefined();

            expect(records).toHaveLength(1);
            expect(transport.receiveCalls).toBe(1);
            expect(transport.closed).toBe(true);
            expect(dispatcher.state).toBe(DispatcherState.Closed);
        });

        it('should cancel a pending receive on stop()', async () => {
            const dispatcher = createDispatcher();
            const { records, onRecord } = collector(10);
            const { transport, done } = run(
                dispatcher,
                [notificationFrames('hashtx', fakeHash(1), 1)],
                onRecord,
            );

            await flushPromises();

            expect(records).toHaveLength(1);
            expect(transport.receiveCalls).toBe(2);
            expect(dispatcher.state).toBe(DispatcherState.Receiving);

            dispatcher.stop();

            await expect(done).resolves.toBeUndefined();
            expect(transport.closed).toBe(true);
        });

        it('should not connect at all when the signal is already aborted', async () => {
            const dispatcher = createDispatcher();
            controller.abort();

            const { transport, connector, done } = run(
                dispatcher,
                [notificationFrames('hashtx', fakeHash(1), 1)],
                collector(1).onRecord,
            );

            await expect(done).resolves.toBeUndefined();

            expect(connector.connections).toEqual([]);
            expect(transport.receiveCalls).toBe(0);
            expect(transport.closeCalls).toBe(0);
            expect(dispatcher.state).toBe(DispatcherState.Closed);
        });

        it('should discard a message that arrives after stop on a transport that ignores the signal', async () => {
            const dispatcher = createDispatcher();
            const onRecord = vi.fn();
            const late: { deliver: (message: RawMultipartMessage) => void } = { deliver: () => undefined };
            let receiveCalls = 0;

            const transport: ITransport = {
                receive: () => {
                    receiveCalls++;
                    if (receiveCalls === 1) {
                        return Promise.resolve(notificationFrames('hashtx', fakeHash(1), 1));
                    }

                    return new Promise<RawMultipartMessage | null>((resolve) => {
                        late.deliver = resolve;
                    });
                },
                close: vi.fn(),
            };

            const done = dispatcher.run({
                connector: { connect: () => Promise.resolve(transport) },
                endpoint: ENDPOINT,
                topicFilter: 'hashtx',
                onRecord,
            });

            await flushPromises();

            expect(onRecord).toHaveBeenCalledTimes(1);
            expect(receiveCalls).toBe(2);
            expect(dispatcher.stats.received).toBe(1);

            dispatcher.stop();
            late.deliver(notificationFrames('hashtx', fakeHash(2), 2));

            await expect(done).resolves.toBeUndefined();

            expect(onRecord).toHaveBeenCalledTimes(1);
            expect(dispatcher.stats.received).toBe(1);
            expect(dispatcher.stats.delivered).toBe(1);
            expect(receiveCalls).toBe(2);
            expect(transport.close).toHaveBeenCalledTimes(1);
        });

        it('should reject a second concurrent run', async () => {
            const dispatcher = createDispatcher();
            const { done } = run(dispatcher, [], collector(1).onRecord);

            await expect(
                dispatcher.run({
                    connector: ScriptedConnector.single(ENDPOINT, new ScriptedTransport()),
                    endpoint: ENDPOINT,
                    topicFilter: '',
                    onRecord: () => undefined,
                }),
            ).rejects.toThrow('NotificationDispatcher is already running');

            controller.abort();
            await done;
        });
    });

    describe('connection failures', () => {
        it('should return the transport error after exactly one record', async () => {
            const dispatcher = createDispatcher();
            const failure = new TransportError('connection lost');
            const onRecord = vi.fn();
            const { transport, done } = run(
                dispatcher,
                [notificationFrames('hashtx', fakeHash(1), 1), failure],
                onRecord,
            );

            await expect(done).rejects.toBe(failure);

            expect(onRecord).toHaveBeenCalledTimes(1);
            expect(transport.receiveCalls).toBe(2);
            expect(transport.closeCalls).toBe(1);
            expect(dispatcher.state).toBe(DispatcherState.Closed);
        });

        it('should wrap other receive failures in a TransportError', async () => {
            const dispatcher = createDispatcher();
            const cause = new Error('EPIPE');
            const { done } = run(dispatcher, [cause], vi.fn());

            const error = await done.catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TransportError);
            expect(error).toMatchObject({
                message: 'Receive failed: EPIPE',
                code: 'TRANSPORT_FAILED',
                cause,
            });
        });

        it('should surface connect failures as ConnectError', async () => {
            const dispatcher = createDispatcher();
            const onRecord = vi.fn();

            const error = await dispatcher
                .run({
                    connector: ScriptedConnector.single(ENDPOINT, new Error('connection refused')),
                    endpoint: ENDPOINT,
                    topicFilter: 'hashtx',
                    onRecord,
                })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ConnectError);
            expect(error).toMatchObject({
                message: 'Unable to connect: connection refused',
                endpoint: ENDPOINT,
            });
            expect(onRecord).not.toHaveBeenCalled();
            expect(dispatcher.state).toBe(DispatcherState.Closed);
        });

        it('should close the transport when the consumer throws', async () => {
            const dispatcher = createDispatcher();
            const { transport, done } = run(
                dispatcher,
                [notificationFrames('hashtx', fakeHash(1), 1)],
                () => {
                    throw new Error('consumer failed');
                },
            );

            await expect(done).rejects.toThrow('consumer failed');
            expect(transport.closed).toBe(true);
        });
    });
});
