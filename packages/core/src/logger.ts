/**
 * Logging seam. Core code never writes to the console itself; front-ends
 * pass a Logger (the CLI's writes coloured lines to stderr).
 */

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
