import { Logger } from '../../logger/Logger.js';
import { FrameClassifier } from '../classifier/FrameClassifier.js';
import { ConnectError, type DecodeError, TransportError } from '../errors/NotificationErrors.js';
import type { GapDetected } from '../interfaces/GapDetected.js';
import type { NotificationRecord } from '../interfaces/NotificationRecord.js';
import type { RawMultipartMessage } from '../interfaces/RawMultipartMessage.js';
import { PayloadRenderer, type RenderedView } from '../renderer/PayloadRenderer.js';
import { RenderMode } from '../renderer/RenderMode.js';
import type { ITransport, ITransportConnector } from '../transport/ITransport.js';
import { DispatcherState } from './DispatcherState.js';
import { type SequencePolicy, SequenceTracker } from './SequenceTracker.js';

export type RecordCallback = (
    record: NotificationRecord,
    view: RenderedView,
) => void | Promise<void>;

export type DecodeErrorCallback = (topicHint: string | undefined, error: DecodeError) => void;

export type GapCallback = (gap: GapDetected) => void;

export interface NotificationDispatcherOptions {
    readonly renderMode?: RenderMode;

    readonly gapDetection?: boolean;
    readonly sequencePolicy?: SequencePolicy;

    /** Forget the last seen sequences every time `run` opens a new connection. */
    readonly resetOnReconnect?: boolean;

    readonly onDecodeError?: DecodeErrorCallback;
    readonly onGap?: GapCallback;
}

export interface DispatchRunOptions {
    readonly connector: ITransportConnector;
    readonly endpoint: string;
    readonly topicFilter: string;
    readonly onRecord: RecordCallback;
    readonly signal?: AbortSignal;
}

export interface DispatcherStats {
    readonly received: number;
    readonly delivered: number;
    readonly decodeErrors: number;
    readonly gaps: number;
}

/**
 * Receives one multipart message at a time, classifies and renders it, then hands it to the consumer.
 * Malformed messages are dropped and reported; connection failures end `run`.
 */
export class NotificationDispatcher extends Logger {
    public readonly logColor: string = '#afeeee';

    private readonly classifier: FrameClassifier = new FrameClassifier();
    private readonly renderer: PayloadRenderer = new PayloadRenderer();
    private readonly tracker: SequenceTracker;

    private readonly renderMode: RenderMode;
    private readonly gapDetection: boolean;
    private readonly resetOnReconnect: boolean;

    private currentState: DispatcherState = DispatcherState.Idle;
    private controller: AbortController | null = null;

    private received: number = 0;
    private delivered: number = 0;
    private decodeErrors: number = 0;
    private gaps: number = 0;

    constructor(private readonly options: NotificationDispatcherOptions = {}) {
        super();

        this.renderMode = options.renderMode ?? RenderMode.Hex;
        this.gapDetection = options.gapDetection ?? true;
        this.resetOnReconnect = options.resetOnReconnect ?? true;
        this.tracker = new SequenceTracker(options.sequencePolicy);
    }

    public get state(): DispatcherState {
        return this.currentState;
    }

    public get stats(): DispatcherStats {
        return {
            received: this.received,
            delivered: this.delivered,
            decodeErrors: this.decodeErrors,
            gaps: this.gaps,
        };
    }

    /**
     * Runs until `stop()` is called or `signal` aborts, then resolves.
     * Rejects with a ConnectError or TransportError on connection failures.
     */
    public async run(options: DispatchRunOptions): Promise<void> {
        if (this.controller) {
            throw new Error('NotificationDispatcher is already running');
        }

        const controller = new AbortController();
        const forwardAbort = (): void => controller.abort();

        this.controller = controller;
        this.currentState = DispatcherState.Idle;

        if (options.signal?.aborted) {
            controller.abort();
        } else {
            options.signal?.addEventListener('abort', forwardAbort, { once: true });
        }

        let transport: ITransport | null = null;
        try {
            if (controller.signal.aborted) {
                this.debug(`Stopped before connecting to ${options.endpoint}`);
                return;
            }

            if (this.resetOnReconnect) {
                this.tracker.reset();
            }

            transport = await this.connect(options.connector, options.endpoint, options.topicFilter);
            this.currentState = DispatcherState.Connected;
            this.debug(`Subscribed to ${options.endpoint} (filter "${options.topicFilter}")`);

            await this.receiveLoop(transport, options.onRecord, controller.signal);

            this.log(`Stopped listening to ${options.endpoint}`);
        } catch (e: unknown) {
            if (e instanceof TransportError || e instanceof ConnectError) {
                this.error(`${options.endpoint}: ${e.message}`);
            }

            throw e;
        } finally {
            options.signal?.removeEventListener('abort', forwardAbort);
            transport?.close();

            this.controller = null;
            this.currentState = DispatcherState.Closed;
        }
    }

    /**
     * Requests the running loop to end. A pending receive is cancelled when the transport supports it.
     */
    public stop(): void {
        this.controller?.abort();
    }

    private async receiveLoop(
        transport: ITransport,
        onRecord: RecordCallback,
        signal: AbortSignal,
    ): Promise<void> {
        while (!signal.aborted) {
            this.currentState = DispatcherState.Receiving;

            const raw = await this.receive(transport, signal);
            if (signal.aborted) {
                return;
            }

            if (raw === null) {
                throw new TransportError('Transport returned no message');
            }

            this.currentState = DispatcherState.Decoding;
            await this.dispatch(raw, onRecord);
        }
    }

    private async dispatch(raw: RawMultipartMessage, onRecord: RecordCallback): Promise<void> {
        this.received++;

        const result = this.classifier.classify(raw);
        if (!result.ok) {
            this.reportDecodeError(this.classifier.topicHint(raw), result.error);
            return;
        }

        const record = result.record;
        if (this.gapDetection) {
            const gap = this.tracker.observe(record.topic, record.sequence);

            if (gap) {
                this.reportGap(gap);
            }
        }

        const view = this.renderer.render(record, this.renderMode);

        this.delivered++;
        await onRecord(record, view);
    }

    private async connect(
        connector: ITransportConnector,
        endpoint: string,
        topicFilter: string,
    ): Promise<ITransport> {
        try {
            return await connector.connect(endpoint, topicFilter);
        } catch (e: unknown) {
            if (e instanceof ConnectError) {
                throw e;
            }

            throw new ConnectError(`Unable to connect: ${describe(e)}`, endpoint, { cause: e });
        }
    }

    private async receive(
        transport: ITransport,
        signal: AbortSignal,
    ): Promise<RawMultipartMessage | null> {
        try {
            return await transport.receive(signal);
        } catch (e: unknown) {
            if (signal.aborted) {
                return null;
            }

            if (e instanceof TransportError) {
                throw e;
            }

            throw new TransportError(`Receive failed: ${describe(e)}`, { cause: e });
        }
    }

    private reportDecodeError(topicHint: string | undefined, error: DecodeError): void {
        this.decodeErrors++;
        this.warn(`Dropped malformed message (topic: ${topicHint ?? 'unknown'}): ${error.message}`);

        this.options.onDecodeError?.(topicHint, error);
    }

    private reportGap(gap: GapDetected): void {
        this.gaps++;
        this.warn(
            `Sequence gap on ${gap.topic}: expected ${gap.expected}, received ${gap.actual}`,
        );

        this.options.onGap?.(gap);
    }
}

function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
