// src/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type Meta = Record<string, unknown>;

export interface Logger {
    debug(msg: string, meta?: Meta): void;
    info(msg: string, meta?: Meta): void;
    warn(msg: string, meta?: Meta): void;
    error(msg: string, meta?: Meta): void;
}

const ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// One JSON object per line; warnings and errors go to stderr.
export function createLogger(level: LogLevel = 'info'): Logger {
    const minIdx = ORDER.indexOf(level);
    function log(lvl: Exclude<LogLevel, 'silent'>, msg: string, meta?: Meta) {
        if (ORDER.indexOf(lvl) < minIdx) return;
        const entry = JSON.stringify({ level: lvl, msg, time: new Date().toISOString(), ...(meta ?? {}) });
        if (lvl === 'warn' || lvl === 'error') {
            console.error(entry);
        } else {
            console.log(entry);
        }
    }
    return {
        debug: (msg, meta) => log('debug', msg, meta),
        info: (msg, meta) => log('info', msg, meta),
        warn: (msg, meta) => log('warn', msg, meta),
        error: (msg, meta) => log('error', msg, meta),
    };
}

export function describeError(err: unknown): Meta {
    if (err instanceof Error) {
        return { error: err.message, name: err.name };
    }
    return { error: String(err) };
}
