import fs from 'fs';
import toml from 'toml';
import { DebugLevel } from '../logger/enums/DebugLevel.js';
import { Logger } from '../logger/Logger.js';
import { parseRenderMode, RenderMode } from '../notifications/renderer/RenderMode.js';
import { isBitcoinZeroMQTopic } from '../zeromq/enums/BitcoinZeroMQTopic.js';
import { isZeroMQEndpoint } from '../zeromq/ZeroMQEndpoint.js';
import type {
    IListenerConfig,
    SequenceConfig,
    SubscriptionConfig,
    ZeroMQConfig,
} from './interfaces/IListenerConfig.js';

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly configPath?: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

type TomlTable = Record<string, unknown>;

const DEBUG_LEVELS: Record<string, DebugLevel> = {
    error: DebugLevel.ERROR,
    warn: DebugLevel.WARN,
    info: DebugLevel.INFO,
    debug: DebugLevel.DEBUG,
};

function isTable(value: unknown): value is TomlTable {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ListenerConfigManager extends Logger {
    public readonly logColor: string = '#c71585';

    private config: IListenerConfig = {
        DEBUG_LEVEL: DebugLevel.INFO,
        RENDER_MODE: RenderMode.Hex,

        SEQUENCE: {
            GAP_DETECTION: true,
            WRAP_AROUND: true,
            RESET_ON_RECONNECT: true,
        },

        ZEROMQ: {
            RECEIVE_HIGH_WATER_MARK: 1000,
        },

        SUBSCRIPTIONS: [],
    };

    constructor(private readonly configPath?: string) {
        super();

        if (configPath) {
            this.loadConfig(configPath);
        }
    }

    public getConfigs(): IListenerConfig {
        return this.config;
    }

    public loadFromString(source: string): IListenerConfig {
        let parsed: unknown;
        try {
            parsed = toml.parse(source);
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(`Failed to parse config: ${reason}`, this.configPath, {
                cause: e,
            });
        }

        if (!isTable(parsed)) {
            throw new ConfigError('Config root must be a table.', this.configPath);
        }

        this.config = this.parsePartialConfig(parsed);

        return this.config;
    }

    private loadConfig(configPath: string): void {
        let source: string;
        try {
            source = fs.readFileSync(configPath, 'utf-8');
        } catch (e: unknown) {
            throw new ConfigError(
                `Failed to load config file ${configPath}. Please ensure that the config file exists.`,
                configPath,
                { cause: e },
            );
        }

        this.loadFromString(source);
        this.debug(`Loaded config from ${configPath}`);
    }

    private parsePartialConfig(parsedConfig: TomlTable): IListenerConfig {
        return {
            DEBUG_LEVEL: this.parseDebugLevel(parsedConfig.DEBUG_LEVEL),
            RENDER_MODE: this.parseRenderMode(parsedConfig.RENDER_MODE),
            SEQUENCE: this.parseSequence(parsedConfig.SEQUENCE),
            ZEROMQ: this.parseZeroMQ(parsedConfig.ZEROMQ),
            SUBSCRIPTIONS: this.parseSubscriptions(parsedConfig.SUBSCRIPTIONS),
        };
    }

    private parseDebugLevel(value: unknown): DebugLevel {
        if (value === undefined) {
            return this.config.DEBUG_LEVEL;
        }

        const key = typeof value === 'string' ? value.toLowerCase() : '';
        if (!Object.hasOwn(DEBUG_LEVELS, key)) {
            throw this.invalid(
                'DEBUG_LEVEL',
                `one of ${Object.keys(DEBUG_LEVELS).join(', ')}`,
            );
        }

        return DEBUG_LEVELS[key];
    }

    private parseRenderMode(value: unknown): RenderMode {
        if (value === undefined) {
            return this.config.RENDER_MODE;
        }

        const expected = `one of ${Object.values(RenderMode).join(', ')}`;
        if (typeof value !== 'string') {
            throw this.invalid('RENDER_MODE', expected);
        }

        try {
            return parseRenderMode(value);
        } catch (e: unknown) {
            throw this.invalid('RENDER_MODE', expected, { cause: e });
        }
    }

    private parseSequence(value: unknown): SequenceConfig {
        const defaults = this.config.SEQUENCE;
        if (value === undefined) {
            return defaults;
        }

        if (!isTable(value)) {
            throw this.invalid('SEQUENCE', 'a table');
        }

        return {
            GAP_DETECTION: this.parseBoolean(value, 'SEQUENCE', 'GAP_DETECTION', defaults),
            WRAP_AROUND: this.parseBoolean(value, 'SEQUENCE', 'WRAP_AROUND', defaults),
            RESET_ON_RECONNECT: this.parseBoolean(
                value,
                'SEQUENCE',
                'RESET_ON_RECONNECT',
                defaults,
            ),
        };
    }

    private parseZeroMQ(value: unknown): ZeroMQConfig {
        const defaults = this.config.ZEROMQ;
        if (value === undefined) {
            return defaults;
        }

        if (!isTable(value)) {
            throw this.invalid('ZEROMQ', 'a table');
        }

        const hwm = value.RECEIVE_HIGH_WATER_MARK ?? defaults.RECEIVE_HIGH_WATER_MARK;
        if (typeof hwm !== 'number' || !Number.isInteger(hwm) || hwm < 0) {
            throw this.invalid('ZEROMQ.RECEIVE_HIGH_WATER_MARK', 'a non-negative integer');
        }

        return { RECEIVE_HIGH_WATER_MARK: hwm };
    }

    private parseSubscriptions(value: unknown): SubscriptionConfig[] {
        if (!Array.isArray(value) || value.length === 0) {
            throw this.invalid('SUBSCRIPTIONS', 'a non-empty array of [[SUBSCRIPTIONS]] tables');
        }

        return value.map((entry: unknown, index: number): SubscriptionConfig => {
            const path = `SUBSCRIPTIONS[${index}]`;
            if (!isTable(entry)) {
                throw this.invalid(path, 'a table');
            }

            const endpoint = entry.ENDPOINT;
            if (typeof endpoint !== 'string' || !isZeroMQEndpoint(endpoint)) {
                throw this.invalid(`${path}.ENDPOINT`, 'a tcp://, ipc:// or inproc:// address');
            }

            const topic = typeof entry.TOPIC === 'string' ? entry.TOPIC.toLowerCase() : '';
            if (!isBitcoinZeroMQTopic(topic)) {
                throw this.invalid(
                    `${path}.TOPIC`,
                    'hashblock, hashtx, rawblock, rawtx or everything',
                );
            }

            return { ENDPOINT: endpoint, TOPIC: topic };
        });
    }

    private parseBoolean<K extends string>(
        table: TomlTable,
        section: string,
        key: K,
        defaults: Readonly<Record<K, boolean>>,
    ): boolean {
        const value = table[key];
        if (value === undefined) {
            return defaults[key];
        }

        if (typeof value !== 'boolean') {
            throw this.invalid(`${section}.${key}`, 'a boolean');
        }

        return value;
    }

    private invalid(property: string, expected: string, options?: ErrorOptions): ConfigError {
        return new ConfigError(
            `Oops the property ${property} is not valid, expected ${expected}.`,
            this.configPath,
            options,
        );
    }
}
