import type { DebugLevel } from '../../logger/enums/DebugLevel.js';
import type { RenderMode } from '../../notifications/renderer/RenderMode.js';
import type { BitcoinZeroMQTopic } from '../../zeromq/enums/BitcoinZeroMQTopic.js';

export interface SequenceConfig {
    readonly GAP_DETECTION: boolean;
    readonly WRAP_AROUND: boolean;
    readonly RESET_ON_RECONNECT: boolean;
}

export interface ZeroMQConfig {
    readonly RECEIVE_HIGH_WATER_MARK: number;
}

export interface SubscriptionConfig {
    readonly ENDPOINT: string;
    readonly TOPIC: BitcoinZeroMQTopic;
}

export interface IListenerConfig {
    readonly DEBUG_LEVEL: DebugLevel;
    readonly RENDER_MODE: RenderMode;

    readonly SEQUENCE: SequenceConfig;
    readonly ZEROMQ: ZeroMQConfig;

    readonly SUBSCRIPTIONS: readonly SubscriptionConfig[];
}
