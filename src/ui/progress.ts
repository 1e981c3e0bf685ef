/**
 * Terminal progress for a research run, driven by loop events
 */

import type { Ora } from 'ora';
import type { LoopListener } from '../research/loop.js';
import { colors, icons, iterationLine } from './theme.js';
import { createSpinner } from './components.js';

function truncate(text: string, max: number): string {
    const singleLine = text.replace(/\s+/g, ' ').trim();
    return singleLine.length > max ? `${singleLine.slice(0, max - 1)}…` : singleLine;
}

export interface ProgressReporter {
    listener: LoopListener;
    /** Stop any spinner still running */
    stop(): void;
}

export function createProgressReporter(maxLoops: number): ProgressReporter {
    let spinner: Ora | null = null;

    const start = (text: string) => {
        spinner?.stop();
        spinner = createSpinner(text).start();
    };
    const succeed = (text: string) => {
        if (spinner) {
            spinner.succeed(text);
            spinner = null;
        } else {
            console.error(text);
        }
    };
    const fail = (text: string) => {
        if (spinner) {
            spinner.fail(text);
            spinner = null;
        } else {
            console.error(text);
        }
    };

    const listener: LoopListener = (event) => {
        switch (event.type) {
            case 'query':
                start(`Searching (${event.iteration}/${maxLoops}): ${truncate(event.query, 60)}`);
                break;
            case 'sources':
                succeed(iterationLine(
                    event.iteration,
                    maxLoops,
                    `${truncate(event.sources[0]?.title ?? 'no results', 50)} ${colors.muted(`(${event.sources.length} sources)`)}`,
                    event.sources.length > 0 ? 'done' : 'warning'
                ));
                start('Updating summary...');
                break;
            case 'summary':
                spinner?.stop();
                spinner = null;
                start('Reflecting on gaps...');
                break;
            case 'decision': {
                const text = event.decision.kind === 'continue'
                    ? `${icons.continue} next: ${truncate(event.decision.query, 60)}`
                    : `${icons.stop} stop (${event.decision.reason === 'max_loops' ? 'loop limit reached' : 'summary is sufficient'})`;
                spinner?.stop();
                spinner = null;
                console.error(colors.muted(`  ${text}`));
                break;
            }
            case 'report':
                start('Finalizing report...');
                break;
            case 'delivered':
                succeed(`${colors.success(icons.mail)} Report emailed to ${event.recipient}`);
                break;
            case 'error':
                if (event.recoverable) {
                    fail(`${colors.warning(icons.warning)} ${event.phase}: ${event.error.message}`);
                } else {
                    fail(`${colors.error(icons.error)} ${event.phase}: ${event.error.message}`);
                }
                break;
        }
    };

    return {
        listener,
        stop() {
            spinner?.stop();
            spinner = null;
        },
    };
}
