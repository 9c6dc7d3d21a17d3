/**
 * @file Scoped Logger
 *
 * Level-filtered console logger. Lines carry the same markers as the
 * rest of the project's terminal output:
 *
 *   · [scope] debug line
 *   ○ [scope] info line
 *   >> WARNING: [scope] warn line
 *   >> ERROR: [scope] error line
 *
 * Colour comes from chalk and can be switched off for tests and log files.
 *
 * @module logging/logger
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { LogLevel } from '../config/settings.js';

export const MARKERS = {
    DEBUG: '·',
    INFO: '○',
    WARNING: '>> WARNING:',
    ERROR: '>> ERROR:',
};

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/** Where lines go. `console` satisfies this. */
export interface LogSink {
    log(line: string): void;
    error(line: string): void;
}

export interface Logger {
    readonly scope: string;
    readonly level: LogLevel;
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Logger for a sub-scope, e.g. `engine` → `engine:queue`. */
    child(scope: string): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    sink?: LogSink;
    color?: boolean;
}

/**
 * Create a logger for one scope.
 */
export function logger_create(scope: string, options: LoggerOptions = {}): Logger {
    const level: LogLevel = options.level ?? 'info';
    const sink: LogSink = options.sink ?? console;
    const paint: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;

    const enabled = (at: LogLevel): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level];
    const tag: string = paint.dim(`[${scope}]`);

    return {
        scope,
        level,
        debug(message: string): void {
            if (enabled('debug')) sink.log(`${paint.gray(MARKERS.DEBUG)} ${tag} ${paint.gray(message)}`);
        },
        info(message: string): void {
            if (enabled('info')) sink.log(`${paint.cyan(MARKERS.INFO)} ${tag} ${message}`);
        },
        warn(message: string): void {
            if (enabled('warn')) sink.log(`${paint.yellow(MARKERS.WARNING)} ${tag} ${message}`);
        },
        error(message: string): void {
            if (enabled('error')) sink.error(`${paint.red.bold(MARKERS.ERROR)} ${tag} ${message}`);
        },
        child(child: string): Logger {
            return logger_create(`${scope}:${child}`, options);
        },
    };
}

/** A logger that discards everything. */
export function logger_silent(): Logger {
    return logger_create('silent', { level: 'silent' });
}
