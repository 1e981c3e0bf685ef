import { Command } from 'commander';
import { ensureConfig, loadConfig, maskConfig, validateConfig, type Config } from '../config.js';
import { errorMessage } from '../errors.js';
import { showConfig, showError } from '../ui/components.js';
import { colors, icons, setUiMode } from '../ui/theme.js';

export const initCommand = new Command('init')
    .description('Set up API keys and the report recipient')
    .option('-f, --force', 'Re-enter values even if set')
    .action(async (options: { force?: boolean }) => {
        try {
            setUiMode(loadConfig().uiMode);

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your settings to .env in this folder.'));
            console.log();

            await ensureConfig({ force: Boolean(options.force) });
            console.log(colors.success('Saved configuration to .env'));
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });

export const configCommand = new Command('config')
    .description('Show the effective configuration with secrets masked')
    .option('--json', 'Output JSON')
    .action((options: { json?: boolean }) => {
        let config: Config;
        try {
            config = loadConfig();
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
            return;
        }
        const { valid, errors } = validateConfig(config);

        if (options.json) {
            console.log(JSON.stringify({ config: maskConfig(config), valid, errors }, null, 2));
            return;
        }

        setUiMode(config.uiMode);
        showConfig(maskConfig(config));
        console.log();
        if (valid) {
            console.log(colors.success(`${icons.complete} Ready to run`));
        } else {
            errors.forEach((e) => console.log(colors.warning(`${icons.warning} ${e}`)));
        }
    });
