import * as zmq from 'zeromq';
import { Logger } from '../logger/Logger.js';
import { ConnectError, TransportError } from '../notifications/errors/NotificationErrors.js';
import type { RawMultipartMessage } from '../notifications/interfaces/RawMultipartMessage.js';
import type { ITransport, ITransportConnector } from '../notifications/transport/ITransport.js';
import { isZeroMQEndpoint, SUPPORTED_SCHEMES } from './ZeroMQEndpoint.js';

export interface ZeroMQTransportOptions {
    /** Messages queued by libzmq before the publisher starts dropping them. */
    readonly receiveHighWaterMark?: number;
}

/**
 * Subscriber socket owned by exactly one dispatcher.
 *
 * libzmq reconnects on its own and never fails a pending receive when the
 * publisher goes away, so the socket's `disconnect` and `end` events are
 * turned into a {@link TransportError} here.
 */
export class ZeroMQTransport extends Logger implements ITransport {
    public readonly logColor: string = '#bc00fa';

    private lost: TransportError | null = null;
    private closing: boolean = false;

    constructor(
        private readonly socket: zmq.Subscriber,
        public readonly endpoint: string,
    ) {
        super();

        this.socket.events.on('disconnect', () => this.onConnectionLost('disconnected'));
        this.socket.events.on('end', () => this.onConnectionLost('socket ended'));
    }

    public async receive(signal?: AbortSignal): Promise<RawMultipartMessage | null> {
        if (signal?.aborted) {
            return null;
        }

        if (this.lost) {
            throw this.lost;
        }

        if (this.socket.closed) {
            throw new TransportError(`Socket to ${this.endpoint} is closed`);
        }

        // libzmq has no cancellable receive; closing the socket rejects the pending one
        const onAbort = (): void => this.close();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            return await this.socket.receive();
        } catch (e: unknown) {
            if (signal?.aborted) {
                return null;
            }

            if (this.lost) {
                throw this.lost;
            }

            const reason = e instanceof Error ? e.message : String(e);
            throw new TransportError(`Receive from ${this.endpoint} failed: ${reason}`, {
                cause: e,
            });
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }
    }

    public close(): void {
        if (this.closing || this.socket.closed) {
            return;
        }

        this.closing = true;
        this.socket.close();
        this.debug(`ZeroMQ connection to ${this.endpoint} closed`);
    }

    private onConnectionLost(reason: string): void {
        if (this.closing || this.lost) {
            return;
        }

        this.lost = new TransportError(`Connection to ${this.endpoint} lost: ${reason}`);
        this.warn(this.lost.message);
        this.close();
    }
}

export class ZeroMQConnector extends Logger implements ITransportConnector {
    public readonly logColor: string = '#bc00fa';

    constructor(private readonly options: ZeroMQTransportOptions = {}) {
        super();
    }

    public async connect(endpoint: string, topicFilter: string): Promise<ZeroMQTransport> {
        if (!isZeroMQEndpoint(endpoint)) {
            throw new ConnectError(
                `Unsupported endpoint, expected one of ${SUPPORTED_SCHEMES.join(', ')}`,
                endpoint,
            );
        }

        const socket = new zmq.Subscriber();
        try {
            if (this.options.receiveHighWaterMark !== undefined) {
                socket.receiveHighWaterMark = this.options.receiveHighWaterMark;
            }

            socket.connect(endpoint);
            socket.subscribe(topicFilter);
        } catch (e: unknown) {
            socket.close();

            const reason = e instanceof Error ? e.message : String(e);
            throw new ConnectError(`Unable to subscribe to ${endpoint}: ${reason}`, endpoint, {
                cause: e,
            });
        }

        this.debug(`ZeroMQ connection established with ${endpoint}`);

        return new ZeroMQTransport(socket, endpoint);
    }
}
