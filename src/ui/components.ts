/**
 * UI Components - Rich terminal UI elements
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { Marked } from 'marked';
import TerminalRenderer from 'marked-terminal';
import gradient from 'gradient-string';
import type { Config } from '../config.js';
import { collectReferences } from '../research/finalizer.js';
import type { SourceDoc } from '../research/types.js';
import { colors, createHeader, divider, getBoxOuterWidth, getUiMode, gradientStops, icons } from './theme.js';

/**
 * Display the app header
 */
export function showHeader(options: { topic?: string; model?: string; maxLoops?: number } = {}): void {
    const { topic, model, maxLoops } = options;
    const title = 'Iterative Web Research';
    const mode = getUiMode();
    const details = [
        model ? `Model: ${model}` : '',
        maxLoops ? `Loops: up to ${maxLoops}` : '',
    ].filter(Boolean);

    console.log();

    if (mode === 'fancy') {
        const lines = [gradient(gradientStops.title)(title)];
        if (topic) lines.push(colors.bold(topic));
        details.forEach((d) => lines.push(colors.muted(d)));
        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#2563EB',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(createHeader(title, details.join(' · ')));
    if (topic) console.log(colors.muted(`Topic: ${topic}`));
    console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling. Spinners draw on stderr.
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

export async function renderMarkdown(markdown: string): Promise<string> {
    if (getUiMode() === 'plain') return markdown;

    const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
        ? Math.min(process.stdout.columns, 100)
        : 80;

    // Own instance so the terminal renderer never leaks into HTML rendering
    const terminal = new Marked().setOptions({
        renderer: new TerminalRenderer({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }),
    });

    return await terminal.parse(markdown);
}

/**
 * Print the report, boxed in fancy mode
 */
export async function showReport(report: string): Promise<void> {
    const mode = getUiMode();
    console.log();
    if (mode === 'fancy') {
        console.log(
            boxen(colors.primary('Report'), {
                padding: { top: 0, bottom: 0, left: 1, right: 1 },
                borderStyle: 'round',
                borderColor: '#2563EB',
                width: getBoxOuterWidth(),
            })
        );
    } else {
        console.log(colors.primary('Report'));
        console.log(colors.muted(divider()));
    }
    console.log(await renderMarkdown(report));
}

export function showSourceCount(sources: readonly SourceDoc[]): void {
    const count = collectReferences(sources).length;
    console.log(colors.muted(`${count} unique source${count === 1 ? '' : 's'} referenced`));
}

export function showComplete(options: { outputPath?: string; deliveredTo?: string; partial?: boolean } = {}): void {
    const mode = getUiMode();
    const label = options.partial ? 'Done (partial results)' : 'Done';
    console.log();
    if (mode === 'fancy' && !options.partial) {
        console.log(`${colors.success(icons.complete)} ${gradient(gradientStops.done)(label)}`);
    } else {
        const color = options.partial ? colors.warning : colors.success;
        console.log(`${color(options.partial ? icons.warning : icons.complete)} ${color(label)}`);
    }
    if (options.deliveredTo) console.log(colors.muted(`Emailed to: ${options.deliveredTo}`));
    if (options.outputPath) console.log(colors.muted(`Saved to: ${options.outputPath}`));
}

export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}

/**
 * Print the effective configuration; expects secrets already masked
 */
export function showConfig(config: Config): void {
    const rows: [string, string][] = [
        ['LLM endpoint', config.llm.baseUrl],
        ['LLM model', config.llm.model],
        ['LLM API key', config.llm.apiKey || '(none)'],
        ['Search provider', config.search.provider],
        ['Include YouTube', config.search.includeYoutube ? 'yes' : 'no'],
        ['Results per query', String(config.search.maxResults)],
        ['Fetch full page', config.search.fetchFullPage ? 'yes' : 'no'],
        ['On search failure', config.search.failurePolicy],
        ['Max loops', String(config.research.maxLoops)],
        ['Email', config.email.enabled ? config.email.recipient || '(recipient missing)' : 'off'],
        ['SMTP', `${config.email.smtp.host}:${config.email.smtp.port}`],
        ['Server', `${config.server.host}:${config.server.port}`],
    ];
    const width = Math.max(...rows.map(([label]) => label.length));
    console.log();
    for (const [label, value] of rows) {
        console.log(`${colors.muted(label.padEnd(width))}  ${value}`);
    }
}
