import { Command } from 'commander';
import {
    assertValidConfig,
    ensureConfig,
    loadConfig,
    validateConfig,
    withOverrides,
    type ConfigOverrides,
    type SearchProvider,
    type UiMode,
} from '../config.js';
import { errorMessage } from '../errors.js';
import { exportReport, formatFromPath, type ExportFormat } from '../export/formats.js';
import { buildResearchLoop } from '../research/factory.js';
import { reportSubject } from '../research/finalizer.js';
import type { RunOutcome } from '../research/loop.js';
import { showComplete, showError, showHeader, showReport, showSourceCount } from '../ui/components.js';
import { createProgressReporter } from '../ui/progress.js';
import { setUiMode } from '../ui/theme.js';
import {
    maybeShowSetupIntro,
    parseFormat,
    parsePositiveInt,
    parseProvider,
    parseUiMode,
} from './options.js';

interface RunCommandOptions {
    loops?: number;
    provider?: SearchProvider;
    model?: string;
    email: boolean;
    output?: string;
    format?: ExportFormat;
    ui?: UiMode;
    json?: boolean;
}

function outcomeJson(outcome: RunOutcome): string {
    return JSON.stringify({
        status: outcome.status,
        report: outcome.report ?? null,
        error: outcome.error?.message ?? null,
        messageId: outcome.messageId ?? null,
        state: outcome.state,
    }, null, 2);
}

export const runCommand = new Command('run')
    .description('Research a topic: search, summarize and reflect in a loop, then email the report')
    .argument('<topic>', 'Research topic')
    .option('-l, --loops <n>', 'Maximum research iterations', parsePositiveInt)
    .option('-p, --provider <provider>', 'Search provider: tavily | perplexity | youtube', parseProvider)
    .option('-m, --model <model>', 'Chat model id')
    .option('--no-email', 'Do not email the report')
    .option('-o, --output <file>', 'Save report to file')
    .option('-f, --format <format>', 'File format: markdown | html | txt', parseFormat)
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain', parseUiMode)
    .option('--json', 'Print the run outcome as JSON')
    .action(async (topic: string, options: RunCommandOptions) => {
        try {
            if (options.ui) setUiMode(options.ui);

            const overrides: ConfigOverrides = {
                maxLoops: options.loops,
                provider: options.provider,
                model: options.model,
                emailEnabled: options.email ? undefined : false,
                uiMode: options.ui,
            };

            const preflight = withOverrides(loadConfig(), overrides);
            if (!options.ui) setUiMode(preflight.uiMode);

            const validation = validateConfig(preflight);
            if (!validation.valid) maybeShowSetupIntro(validation.errors);
            const config = assertValidConfig(await ensureConfig({ overrides }));

            const loop = buildResearchLoop(config);
            let outcome: RunOutcome;

            if (options.json) {
                outcome = await loop.run(topic);
                console.log(outcomeJson(outcome));
            } else {
                showHeader({ topic, model: config.llm.model, maxLoops: config.research.maxLoops });
                const progress = createProgressReporter(config.research.maxLoops);
                try {
                    outcome = await loop.run(topic, { onEvent: progress.listener });
                } finally {
                    progress.stop();
                }

                if (outcome.report) {
                    await showReport(outcome.report);
                    showSourceCount(outcome.state.sources);
                }
            }

            if (options.output && outcome.report) {
                await exportReport(outcome.report, {
                    format: options.format ?? formatFromPath(options.output),
                    outputPath: options.output,
                    title: reportSubject(topic),
                });
            }

            if (outcome.status === 'failed') {
                if (!options.json) showError(outcome.error?.message ?? 'Research run failed');
                process.exitCode = 1;
                return;
            }

            if (!options.json) {
                showComplete({
                    outputPath: options.output,
                    deliveredTo: outcome.messageId !== undefined ? config.email.recipient : undefined,
                    partial: outcome.status === 'partial',
                });
            }
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });
