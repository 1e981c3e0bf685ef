/**
 * Option parsers and setup hints shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { SEARCH_PROVIDERS, UI_MODES, type SearchProvider, type UiMode } from '../config.js';
import { EXPORT_FORMATS, type ExportFormat } from '../export/formats.js';
import { colors } from '../ui/theme.js';

function choiceParser<T extends string>(choices: readonly T[], label: string): (value: string) => T {
    return (value: string) => {
        const normalized = value.trim().toLowerCase();
        const match = choices.find((choice) => choice === normalized);
        if (!match) {
            throw new InvalidArgumentError(`${label} must be one of: ${choices.join(', ')}`);
        }
        return match;
    };
}

export const parseProvider: (value: string) => SearchProvider = choiceParser(SEARCH_PROVIDERS, 'Provider');
export const parseUiMode: (value: string) => UiMode = choiceParser(UI_MODES, 'UI mode');
export const parseFormat: (value: string) => ExportFormat = choiceParser(EXPORT_FORMATS, 'Format');

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

export function parsePort(value: string): number {
    const parsed = parsePositiveInt(value);
    if (parsed > 65535) throw new InvalidArgumentError('Port must be at most 65535.');
    return parsed;
}

export function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.error();
    console.error(colors.primary('Quick setup'));
    console.error(colors.muted('Paste the missing settings (they will be saved to .env).'));
    console.error(colors.muted(`Missing: ${errors.map((e) => e.replace(' is not set', '')).join(', ')}`));
    console.error(colors.muted('Tip: run `research init` anytime to change them.'));
    console.error();
}
