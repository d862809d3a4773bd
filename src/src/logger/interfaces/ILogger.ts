export interface ILogger {
    moduleName: string;
    logColor: string;

    log(...args: unknown[]): void;

    info(...args: unknown[]): void;

    error(...args: unknown[]): void;

    warn(...args: unknown[]): void;

    debug(...args: unknown[]): void;

    success(...args: unknown[]): void;

    important(...args: unknown[]): void;

    panic(...args: unknown[]): void;
}
