import path from 'path';
import type { IListenerConfig } from './interfaces/IListenerConfig.js';
import { ListenerConfigManager } from './ListenerConfigManager.js';

export const DEFAULT_CONFIG_PATH: string = path.join('config', 'listener.conf');

/**
 * First command line argument, then ZMQ_LISTENER_CONFIG, then config/listener.conf in the working directory.
 */
export function resolveConfigPath(
    argv: readonly string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): string {
    return path.resolve(argv[0] ?? env.ZMQ_LISTENER_CONFIG ?? DEFAULT_CONFIG_PATH);
}

export function loadConfig(configPath: string = resolveConfigPath()): IListenerConfig {
    const configManager: ListenerConfigManager = new ListenerConfigManager(configPath);

    return configManager.getConfigs();
}
