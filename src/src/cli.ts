#!/usr/bin/env node
import { loadConfig, resolveConfigPath } from './config/Config.js';
import type { IListenerConfig } from './config/interfaces/IListenerConfig.js';
import { ZeroMQListener } from './listener/ZeroMQListener.js';
import { Logger } from './logger/Logger.js';

class ListenerCli extends Logger {
    public readonly logColor: string = '#1553c7';

    public async main(): Promise<number> {
        const configPath = resolveConfigPath();

        let config: IListenerConfig;
        try {
            config = loadConfig(configPath);
        } catch (e: unknown) {
            this.panic(e instanceof Error ? e.message : String(e));
            return 1;
        }

        const listener = new ZeroMQListener(config);
        const shutdown = (): void => {
            this.warn('Shutting down...');
            listener.stop();
        };

        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        return await listener.start();
    }
}

new ListenerCli().main().then(
    (code: number) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        console.error(e);
        process.exitCode = 1;
    },
);
