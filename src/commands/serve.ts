import { Command } from 'commander';
import { loadConfig, withOverrides } from '../config.js';
import { errorMessage } from '../errors.js';
import { startServer } from '../server/index.js';
import { showError } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { parsePort } from './options.js';

export const serveCommand = new Command('serve')
    .description('Start the development server for starting and inspecting runs')
    .option('--port <n>', 'Port to listen on', parsePort)
    .option('--host <host>', 'Interface to bind')
    .action(async (options: { port?: number; host?: string }) => {
        try {
            const config = withOverrides(loadConfig(), { port: options.port, host: options.host });
            const { url } = await startServer(config);
            console.log(colors.success(`Research server ready at ${url}`));
            console.log(colors.muted('POST /runs {"topic": "..."} to start a run. Ctrl+C to stop.'));
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });
