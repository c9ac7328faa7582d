/**
 * LogLevel - SysLog RFC5424 compliant log levels
 *
 * @see RFC5424: https://tools.ietf.org/html/rfc5424
 */
export interface LogLevels {
    emerg: number;
    alert: number;
    crit: number;
    error: number;
    warning: number;
    notice: number;
    info: number;
    debug: number;
}

export const LogLevels: LogLevels = {
    emerg: 0,
    alert: 1,
    crit: 2,
    error: 3,
    warning: 4,
    notice: 5,
    info: 6,
    debug: 7
};

export type LogLevel = keyof LogLevels;

const LEVEL_NAMES: readonly LogLevel[] = ['emerg', 'alert', 'crit', 'error', 'warning', 'notice', 'info', 'debug'];

/**
 * Logger - SysLog RFC5424 compliant logger type
 *
 * @see RFC5424: https://tools.ietf.org/html/rfc5424
 */
export type Logger = {
    [Level in LogLevel]: (message: string, extra?: Record<string, unknown>) => void;
};

export function isLogLevel(value: string): value is LogLevel {
    return LEVEL_NAMES.some(level => level === value);
}

/**
 * Console logger, used when no custom logger is provided.
 *
 * Everything is written to stderr: under the pipe transport stdout carries the
 * protocol stream and must stay clean.
 */
export const consoleLogger: Logger = {
    debug: (message, extra) => {
        console.error(message, extra ?? '');
    },
    info: (message, extra) => {
        console.error(message, extra ?? '');
    },
    notice: (message, extra) => {
        console.error(message, extra ?? '');
    },
    warning: (message, extra) => {
        console.warn(message, extra ?? '');
    },
    error: (message, extra) => {
        console.error(message, extra ?? '');
    },
    crit: (message, extra) => {
        console.error(message, extra ?? '');
    },
    alert: (message, extra) => {
        console.error(message, extra ?? '');
    },
    emerg: (message, extra) => {
        console.error(message, extra ?? '');
    }
};

const noop = (): void => {};

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    notice: noop,
    warning: noop,
    error: noop,
    crit: noop,
    alert: noop,
    emerg: noop
};

/**
 * Wraps a logger so that messages less severe than `minLevel` are discarded.
 *
 * @example
 * ```typescript
 * const logger = filterLogger(consoleLogger, 'warning');
 * logger.info('dropped');
 * logger.error('printed');
 * ```
 */
export function filterLogger(logger: Logger, minLevel: LogLevel): Logger {
    const threshold = LogLevels[minLevel];
    const pick = (level: LogLevel): Logger[LogLevel] =>
        LogLevels[level] <= threshold ? (message, extra) => logger[level](message, extra) : noop;
    return {
        emerg: pick('emerg'),
        alert: pick('alert'),
        crit: pick('crit'),
        error: pick('error'),
        warning: pick('warning'),
        notice: pick('notice'),
        info: pick('info'),
        debug: pick('debug')
    };
}
