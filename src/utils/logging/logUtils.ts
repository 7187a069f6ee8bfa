// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.js';

import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LEVELS: Record<LogLevel, { label: string; paint: (text: string) => string; channel: keyof ILogFacility }> = {
    info: { label: 'INFO', paint: chalk.blue, channel: 'log' },
    success: { label: 'SUCCESS', paint: chalk.green, channel: 'log' },
    warn: { label: 'WARNING', paint: chalk.yellow, channel: 'warn' },
    error: { label: 'ERROR', paint: chalk.red, channel: 'error' },
    debug: { label: 'DEBUG', paint: chalk.magenta, channel: 'log' },
};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Writes coloured `[LEVEL] name :: message` lines to a facility. Debug lines are only
 * written when verbose. Nothing is retained between calls.
 */
class Logger implements ILogger {
    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.write('info', message);
    }

    success(message: string) {
        this.write('success', message);
    }

    warn(message: string) {
        this.write('warn', message);
    }

    error(message: string) {
        this.write('error', message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.write('debug', message);
        }
    }

    private write(level: LogLevel, message: string) {
        const { label, paint, channel } = LEVELS[level];
        this.facility[channel](paint(`[${label}] ${this.name} :: ${message}`));
    }
}

export const NoopLogger: ILogger = new Logger('noop', NoopLogFacility);

/**
 * Creates a logger bound to a facility.
 *
 * @param name - Shown in every line.
 * @param logFacility - Where formatted lines are sent.
 * @param verbose - Whether debug lines are written.
 */
export function createLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    return new Logger(name, logFacility, verbose);
}
