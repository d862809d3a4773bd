import type { NotificationRecord } from '../interfaces/NotificationRecord.js';
import { RenderMode } from './RenderMode.js';

export interface RenderedView {
    readonly topic: string;
    readonly sequence: number;

    /** Mode actually used; `hex` when printable text was asked for but not possible. */
    readonly mode: RenderMode;

    readonly text: string;
    readonly bytes: Uint8Array;
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// control characters other than tab, LF and CR, DEL and the C1 range
const NON_PRINTABLE = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/u;

export class PayloadRenderer {
    public render(record: NotificationRecord, mode: RenderMode): RenderedView {
        switch (mode) {
            case RenderMode.Raw:
                return this.view(record, RenderMode.Raw, toHex(record.payload));
            case RenderMode.Utf8IfPrintable: {
                const text = decodePrintable(record.payload);
                if (text !== null) {
                    return this.view(record, RenderMode.Utf8IfPrintable, text);
                }

                return this.view(record, RenderMode.Hex, toHex(record.payload));
            }
            case RenderMode.Hex:
            default:
                return this.view(record, RenderMode.Hex, toHex(record.payload));
        }
    }

    private view(record: NotificationRecord, mode: RenderMode, text: string): RenderedView {
        return Object.freeze({
            topic: record.topic,
            sequence: record.sequence,
            mode,
            text,
            bytes: record.payload,
        });
    }
}

/**
 * Lowercase, high nibble first. Hash topics already arrive in display byte order.
 */
export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

export function decodePrintable(bytes: Uint8Array): string | null {
    let text: string;
    try {
        text = utf8Decoder.decode(bytes);
    } catch {
        return null;
    }

    return NON_PRINTABLE.test(text) ? null : text;
}
