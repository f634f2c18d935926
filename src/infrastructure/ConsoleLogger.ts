import type { Logger } from '../domain/Logger';

/**
 * Console-backed logger; every line is prefixed with `[scope]`.
 */
export function createConsoleLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
        warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
        error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    };
}
