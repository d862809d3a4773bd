import {
    type DecodeError,
    EncodingError,
    FrameCountError,
    SequenceLengthError,
} from '../errors/NotificationErrors.js';
import { createNotificationRecord, type NotificationRecord } from '../interfaces/NotificationRecord.js';
import type { RawMultipartMessage } from '../interfaces/RawMultipartMessage.js';

export const NOTIFICATION_FRAME_COUNT = 3;
export const SEQUENCE_FRAME_LENGTH = 4;
export const MAX_TOPIC_LENGTH = 32;

export type ClassificationResult =
    | { readonly ok: true; readonly record: NotificationRecord }
    | { readonly ok: false; readonly error: DecodeError };

/**
 * Turns a `[topic, payload, sequence]` multipart message into a NotificationRecord.
 * The wire layout is the same for every topic, so there is no per-topic branching here.
 */
export class FrameClassifier {
    constructor(private readonly maxTopicLength: number = MAX_TOPIC_LENGTH) {}

    public classify(raw: RawMultipartMessage): ClassificationResult {
        if (raw.length !== NOTIFICATION_FRAME_COUNT) {
            return this.fail(new FrameCountError(raw.length));
        }

        const [topicFrame, payload, sequenceFrame] = raw;

        const topicProblem = this.findTopicProblem(topicFrame);
        if (topicProblem) {
            return this.fail(new EncodingError(topicProblem));
        }

        if (sequenceFrame.byteLength !== SEQUENCE_FRAME_LENGTH) {
            return this.fail(new SequenceLengthError(sequenceFrame.byteLength));
        }

        return {
            ok: true,
            record: createNotificationRecord(
                this.decodeTopic(topicFrame),
                payload,
                this.decodeSequence(sequenceFrame),
            ),
        };
    }

    /**
     * Readable topic of a message that may have failed classification.
     */
    public topicHint(raw: RawMultipartMessage): string | undefined {
        const topicFrame = raw[0];
        if (!topicFrame || this.findTopicProblem(topicFrame)) {
            return undefined;
        }

        return this.decodeTopic(topicFrame);
    }

    private findTopicProblem(frame: Uint8Array): string | null {
        if (frame.byteLength === 0) {
            return 'topic is empty';
        }

        if (frame.byteLength > this.maxTopicLength) {
            return `topic is ${frame.byteLength} bytes, limit is ${this.maxTopicLength}`;
        }

        // printable ASCII only, which is also valid UTF-8
        const offset = frame.findIndex((byte) => byte < 0x21 || byte > 0x7e);
        if (offset !== -1) {
            const byte = frame[offset].toString(16).padStart(2, '0');

            return `non printable byte 0x${byte} at offset ${offset}`;
        }

        return null;
    }

    private decodeTopic(frame: Uint8Array): string {
        return Buffer.from(frame.buffer, frame.byteOffset, frame.byteLength).toString('ascii');
    }

    private decodeSequence(frame: Uint8Array): number {
        return new DataView(frame.buffer, frame.byteOffset, frame.byteLength).getUint32(0, true);
    }

    private fail(error: DecodeError): ClassificationResult {
        return { ok: false, error };
    }
}
