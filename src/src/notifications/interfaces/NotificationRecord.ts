export interface NotificationRecord {
    readonly topic: string;
    readonly payload: Uint8Array;

    /** Unsigned 32-bit per-topic counter set by the publisher. */
    readonly sequence: number;
}

export function createNotificationRecord(
    topic: string,
    payload: Uint8Array,
    sequence: number,
): NotificationRecord {
    return Object.freeze({
        topic,
        payload: Uint8Array.from(payload),
        sequence,
    });
}
