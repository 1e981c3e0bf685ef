/**
 * UI Theme - palette, icons and line helpers for the terminal
 */

import chalk from 'chalk';
import figures from 'figures';
import type { UiMode } from '../config.js';

let configuredMode: UiMode | undefined;

/**
 * Set the mode chosen on the command line; UI_MODE and NO_COLOR still apply.
 */
export function setUiMode(mode: UiMode): void {
    configuredMode = mode;
}

export function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = configuredMode ?? process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

function isPlainMode(): boolean {
    return getUiMode() === 'plain';
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 100): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Small margin so the right border never soft-wraps
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

export const colors = {
    primary: maybeColor(chalk.hex('#2563EB')),      // Blue
    secondary: maybeColor(chalk.hex('#14B8A6')),    // Teal
    success: maybeColor(chalk.hex('#10B981')),
    warning: maybeColor(chalk.hex('#F59E0B')),
    error: maybeColor(chalk.hex('#EF4444')),
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    bold: maybeColor(chalk.bold),
};

export const gradientStops = {
    title: ['#1D4ED8', '#2563EB', '#0EA5E9', '#14B8A6'],
    done: ['#10B981', '#14B8A6'],
};

// figures gives ASCII fallbacks on terminals without unicode
export const icons = {
    query: figures.pointerSmall,
    sources: figures.hamburger,
    summary: figures.bullet,
    continue: figures.arrowRight,
    stop: figures.square,
    complete: figures.tick,
    warning: figures.warning,
    error: figures.cross,
    mail: figures.arrowUp,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

export function createHeader(title: string, subtitle?: string): string {
    const parts = [isPlainMode() ? title : chalk.bold(colors.primary(title))];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

/**
 * One line of loop progress, e.g. "✔ 2/3 searched: rust async runtimes"
 */
export function iterationLine(
    iteration: number,
    maxLoops: number,
    text: string,
    status: 'active' | 'done' | 'warning' | 'error'
): string {
    const statusIcon = {
        active: colors.secondary(icons.query),
        done: colors.success(icons.complete),
        warning: colors.warning(icons.warning),
        error: colors.error(icons.error),
    }[status];

    return `${statusIcon} ${colors.dim(`${iteration}/${maxLoops}`)} ${text}`;
}
