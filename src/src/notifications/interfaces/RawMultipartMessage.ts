/**
 * Frames of one multipart message, in the order the transport delivered them.
 */
export type RawMultipartMessage = readonly Uint8Array[];
