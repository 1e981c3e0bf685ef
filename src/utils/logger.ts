/**
 * Scoped stderr logger
 * Output goes to stderr so stdout stays clean for reports and --json.
 */

import chalk from 'chalk';

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function debugEnabled(): boolean {
    const value = process.env.DEBUG;
    return Boolean(value && value !== '0' && value.toLowerCase() !== 'false');
}

export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;

    return {
        debug(message, ...details) {
            if (!debugEnabled()) return;
            console.error(chalk.gray(`${prefix} ${message}`), ...details);
        },
        info(message, ...details) {
            console.error(`${chalk.cyan(prefix)} ${message}`, ...details);
        },
        warn(message, ...details) {
            console.error(`${chalk.yellow(prefix)} ${message}`, ...details);
        },
        error(message, ...details) {
            console.error(`${chalk.red(prefix)} ${message}`, ...details);
        },
    };
}
