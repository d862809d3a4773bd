export type NotificationErrorCode =
    | 'CONNECT_FAILED'
    | 'TRANSPORT_FAILED'
    | 'FRAME_COUNT'
    | 'TOPIC_ENCODING'
    | 'SEQUENCE_LENGTH';

/**
 * Base class of every error raised while listening to a notification feed
 */
export abstract class NotificationError extends Error {
    public abstract readonly code: NotificationErrorCode;

    protected constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The subscriber connection could not be established
 */
export class ConnectError extends NotificationError {
    public readonly code = 'CONNECT_FAILED';

    constructor(
        message: string,
        public readonly endpoint: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

/**
 * The connection failed or was closed while receiving
 */
export class TransportError extends NotificationError {
    public readonly code = 'TRANSPORT_FAILED';

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/**
 * A single multipart message does not follow the three frame layout.
 * Always recovered locally: the message is dropped and the feed keeps going.
 */
export abstract class DecodeError extends NotificationError {
    public abstract readonly code: 'FRAME_COUNT' | 'TOPIC_ENCODING' | 'SEQUENCE_LENGTH';
}

export class FrameCountError extends DecodeError {
    public readonly code = 'FRAME_COUNT';

    constructor(public readonly frameCount: number) {
        super(`Expected 3 frames, received ${frameCount}`);
    }
}

export class EncodingError extends DecodeError {
    public readonly code = 'TOPIC_ENCODING';

    constructor(reason: string) {
        super(`Invalid topic frame: ${reason}`);
    }
}

export class SequenceLengthError extends DecodeError {
    public readonly code = 'SEQUENCE_LENGTH';

    constructor(public readonly length: number) {
        super(`Sequence frame must be 4 bytes, received ${length}`);
    }
}
