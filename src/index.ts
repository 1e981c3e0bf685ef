#!/usr/bin/env node
/**
 * Iterative Web Researcher - Main Entry Point
 * Searches, summarizes and reflects in a bounded loop, then emails a report
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { Command } from 'commander';
import { checkNodeVersion } from './utils/node-version.js';
import { runCommand } from './commands/run.js';
import { serveCommand } from './commands/serve.js';
import { configCommand, initCommand } from './commands/setup.js';
import { colors } from './ui/theme.js';

// Check Node.js version before anything else
checkNodeVersion();

function packageVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    const version: unknown = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'version') : undefined;
    return typeof version === 'string' ? version : '0.0.0';
}

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.error('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(130);
});

process.on('SIGTERM', () => {
    console.error('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

const program = new Command();

program
    .name('research')
    .description('Iterative web research: search, summarize, reflect, report')
    .version(packageVersion());

program.addCommand(runCommand);
program.addCommand(serveCommand);
program.addCommand(initCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
