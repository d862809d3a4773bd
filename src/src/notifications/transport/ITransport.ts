import type { RawMultipartMessage } from '../interfaces/RawMultipartMessage.js';

export interface ITransport {
    /**
     * Waits for the next multipart message.
     *
     * Resolves with `null` only when `signal` aborted the wait.
     * Rejects with a TransportError when the connection is lost.
     */
    receive(signal?: AbortSignal): Promise<RawMultipartMessage | null>;

    close(): void;
}

export interface ITransportConnector {
    /** Rejects with a ConnectError when the subscriber cannot be set up. */
    connect(endpoint: string, topicFilter: string): Promise<ITransport>;
}
