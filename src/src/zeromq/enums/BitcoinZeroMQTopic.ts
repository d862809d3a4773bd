export enum BitcoinZeroMQTopic {
    RawBlock = 'rawblock',
    RawTx = 'rawtx',
    HashTx = 'hashtx',
    HashBlock = 'hashblock',
    Everything = 'everything',
}

const KNOWN_TOPICS: ReadonlySet<string> = new Set(Object.values(BitcoinZeroMQTopic));

export function isBitcoinZeroMQTopic(value: string): value is BitcoinZeroMQTopic {
    return KNOWN_TOPICS.has(value);
}

/**
 * Prefix handed to the subscriber socket. `everything` subscribes to all topics.
 */
export function toSubscriptionFilter(topic: BitcoinZeroMQTopic): string {
    return topic === BitcoinZeroMQTopic.Everything ? '' : topic;
}
