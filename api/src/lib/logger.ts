export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let threshold: LogLevel | null = null;

function currentThreshold(): LogLevel {
    return threshold ?? LOG_LEVELS.find(level => level === process.env.LOG_LEVEL) ?? 'info';
}

export function configureLogging(level: LogLevel): void {
    threshold = level;
}

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    child(scope: string): Logger;
}

/**
 * Console logger whose lines carry a `[scope]` prefix, e.g.
 * `[rag] Created 4 chunks for document 9f1c...`.
 */
export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    const enabled = (level: LogLevel) => SEVERITY[level] >= SEVERITY[currentThreshold()];

    return {
        debug: (message, ...details) => {
            if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
        },
        info: (message, ...details) => {
            if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
        },
        warn: (message, ...details) => {
            if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
        },
        error: (message, ...details) => {
            if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
        },
        child: (childScope) => createLogger(`${scope}:${childScope}`),
    };
}
