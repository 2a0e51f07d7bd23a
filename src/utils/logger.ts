export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

/** Console-backed logger that tags every line with `[scope]`. */
export function createConsoleLogger(scope: string): Logger {
    const tag = `[${scope}]`;
    return {
        debug: (message, ...meta) => console.debug(tag, message, ...meta),
        info: (message, ...meta) => console.info(tag, message, ...meta),
        warn: (message, ...meta) => console.warn(tag, message, ...meta),
        error: (message, ...meta) => console.error(tag, message, ...meta),
    };
}
