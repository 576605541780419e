#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import process from 'process';
import chalk from 'chalk';
import { ConfigManager } from './config.js';
import type { CommitOptions } from './types/common.js';
import { CONFIG_KEYS, ModelSchema, isConfigKey } from './schemas/validation.js';
import { ErrorType } from './types/error-handler.js';
import { SecureError } from './utils/error-handler.js';
import { exitProcess, handleErrorImmediate } from './utils/process-utils.js';
import { AI_MODELS } from './constants/ai.js';
import {
  ERROR_MESSAGES,
  HELP_MESSAGES,
  INFO_MESSAGES,
  PROMPT_MESSAGES,
  SUCCESS_MESSAGES,
  WARNING_MESSAGES,
} from './constants/messages.js';
import { UI_CONSTANTS } from './constants/ui.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

interface CommitCommandOptions {
  yes?: boolean;
  combine?: boolean;
  smartGrouping?: boolean;
  dryRun?: boolean;
  model?: string;
}

const validateModel = (model: string | undefined): string | undefined => {
  if (model === undefined) {
    return undefined;
  }

  const result = ModelSchema.safeParse(model);
  if (!result.success) {
    throw new SecureError(
      `Invalid model: ${model}. Allowed models: ${AI_MODELS.join(', ')}`,
      ErrorType.VALIDATION_ERROR,
      { operation: 'commit' },
      true
    );
  }
  return result.data;
};

// Heavy modules load only for the commands that need them
const loadStagedFiles = async (config: ConfigManager) => {
  const { GitService } = await import('./services/git.js');
  const git = new GitService(process.cwd(), config.get('ignoredPatterns'));

  if (!(await git.isGitRepository())) {
    throw new SecureError(ERROR_MESSAGES.NOT_GIT_REPOSITORY, ErrorType.GIT_ERROR, { operation: 'loadStagedFiles' }, true);
  }

  const files = await git.getChangedFiles();
  if (files.length === 0) {
    throw new SecureError(ERROR_MESSAGES.NO_STAGED_CHANGES, ErrorType.GIT_ERROR, { operation: 'loadStagedFiles' }, true);
  }

  return { git, files };
};

const runCommit = async (options: CommitCommandOptions): Promise<void> => {
  const model = validateModel(options.model);
  const config = ConfigManager.getInstance();
  const settings = config.getAnalyzerSettings(model);

  const [{ CommitWeave }, { GitService }, { AIService }, { SmartGrouper }, { LocalFileSource }, { confirmAction }] =
    await Promise.all([
      import('./core/commitweave.js'),
      import('./services/git.js'),
      import('./services/ai.js'),
      import('./core/grouping/smart-grouper.js'),
      import('./core/grouping/file-source.js'),
      import('./utils/console.js'),
    ]);

  const commitWeave = new CommitWeave({
    git: new GitService(process.cwd(), config.get('ignoredPatterns')),
    ai: new AIService(config.getApiKey(), { model: settings.model }),
    grouper: new SmartGrouper(new LocalFileSource(process.cwd()), config.getGroupingOptions()),
    settings: { ...settings, smartGrouping: config.get('smartGrouping') },
    confirm: confirmAction,
  });

  const commitOptions: CommitOptions = {
    yes: options.yes,
    combine: options.combine,
    smartGrouping: options.smartGrouping,
    dryRun: options.dryRun,
    model,
  };

  await commitWeave.run(commitOptions);
};

const program = new Command();

program
  .name('cw')
  .description('🧵 AI-assisted git commits with smart file grouping')
  .version(version);

program
  .command('commit', { isDefault: true })
  .alias('c')
  .description('Generate commit messages for staged changes and commit them')
  .option('-y, --yes', 'Automate the whole process without prompts')
  .option('-c, --combine', 'Create one combined commit for all batches')
  .option('--smart-grouping', 'Group related files into batches')
  .option('--no-smart-grouping', 'Split batches by file count only')
  .option('-d, --dry-run', 'Show what would be committed without committing')
  .option('-m, --model <model>', `AI model to use (${AI_MODELS.join(', ')})`)
  .action(async (options: CommitCommandOptions): Promise<void> => {
    try {
      await runCommit(options);
      exitProcess(0);
    } catch (error) {
      handleErrorImmediate(error, 'commit');
    }
  });

program
  .command('group')
  .alias('g')
  .description('Show how staged files would be grouped, without calling the AI')
  .option('--json', 'Print groups as JSON')
  .action(async (options: { json?: boolean }): Promise<void> => {
    try {
      const config = ConfigManager.getInstance();
      const { files } = await loadStagedFiles(config);
      const [{ SmartGrouper }, { LocalFileSource }, { printGroupSummary }] = await Promise.all([
        import('./core/grouping/smart-grouper.js'),
        import('./core/grouping/file-source.js'),
        import('./utils/console.js'),
      ]);

      const groups = new SmartGrouper(new LocalFileSource(process.cwd()), config.getGroupingOptions()).buildGroups(files);

      if (options.json) {
        console.log(JSON.stringify(groups, null, 2));
      } else {
        printGroupSummary(groups);
      }
    } catch (error) {
      handleErrorImmediate(error, 'group');
    }
  });

program
  .command('analyze')
  .alias('a')
  .description('Estimate token usage, cost and complexity of the staged changes')
  .option('-m, --model <model>', 'Model to price the estimate against')
  .action(async (options: { model?: string }): Promise<void> => {
    try {
      const config = ConfigManager.getInstance();
      const settings = config.getAnalyzerSettings(validateModel(options.model));
      const { git, files } = await loadStagedFiles(config);
      const [{ analyzeDiffComplexity }, consoleUtils] = await Promise.all([
        import('./core/analyzer.js'),
        import('./utils/console.js'),
      ]);

      const analysis = analyzeDiffComplexity(await git.getDiff(files), files, settings);

      consoleUtils.printChangedFiles(files);
      consoleUtils.printAnalysisStats(analysis);
      if (analysis.warnings.length > 0) {
        consoleUtils.printWarnings(analysis);
      } else {
        consoleUtils.printSuccess('No complexity warnings');
      }
    } catch (error) {
      handleErrorImmediate(error, 'analyze');
    }
  });

const configCmd = program.command('config').description('Manage commitweave configuration');

configCmd
  .command('set <key> <value>')
  .description('Set configuration value')
  .action(async (key: string, value: string): Promise<void> => {
    try {
      if (!isConfigKey(key)) {
        throw new SecureError(
          `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${CONFIG_KEYS.join(', ')}`,
          ErrorType.VALIDATION_ERROR,
          { operation: 'configSet', key },
          true
        );
      }

      const config = ConfigManager.getInstance();
      await config.set(key, value);
      console.log(chalk.green(`✅ Set ${key} = ${JSON.stringify(config.get(key))}`));
    } catch (error) {
      handleErrorImmediate(error, 'configSet');
    }
  });

configCmd
  .command('get [key]')
  .description('Get configuration value(s)')
  .action((key?: string): void => {
    try {
      const config = ConfigManager.getInstance();
      const resolved = config.getConfig();
      const display = (configKey: string, value: unknown): string =>
        configKey === 'apiKey'
          ? value
            ? UI_CONSTANTS.CONFIG_SECRET_MASK
            : 'Not set'
          : JSON.stringify(value);

      if (key) {
        if (!isConfigKey(key)) {
          throw new SecureError(
            `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${CONFIG_KEYS.join(', ')}`,
            ErrorType.VALIDATION_ERROR,
            { operation: 'configGet', key },
            true
          );
        }
        console.log(`${key}: ${display(key, resolved[key])}`);
        return;
      }

      console.log(chalk.blue(`Current configuration (${config.getConfigPath()}):`));
      for (const configKey of CONFIG_KEYS) {
        console.log(`  ${configKey}: ${display(configKey, resolved[configKey])}`);
      }
    } catch (error) {
      handleErrorImmediate(error, 'configGet');
    }
  });

configCmd
  .command('reset')
  .description('Reset configuration to defaults')
  .action(async (): Promise<void> => {
    try {
      const { confirmAction } = await import('./utils/console.js');
      if (await confirmAction(PROMPT_MESSAGES.RESET_CONFIG, false)) {
        await ConfigManager.getInstance().reset();
        console.log(chalk.green(`✅ ${SUCCESS_MESSAGES.CONFIGURATION_RESET}`));
      } else {
        console.log(chalk.yellow(WARNING_MESSAGES.RESET_CANCELLED));
      }
    } catch (error) {
      handleErrorImmediate(error, 'configReset');
    }
  });

program
  .command('setup')
  .description('Interactive setup for first-time users')
  .action(async (): Promise<void> => {
    try {
      const [{ default: inquirer }, { printBanner }] = await Promise.all([
        import('inquirer'),
        import('./utils/console.js'),
      ]);
      const config = ConfigManager.getInstance();
      printBanner(`${INFO_MESSAGES.WELCOME_SETUP}\n`);

      const answers = await inquirer.prompt<{ model: string; smartGrouping: boolean }>([
        {
          type: 'list',
          name: 'model',
          message: PROMPT_MESSAGES.MODEL,
          choices: [...AI_MODELS],
          default: config.get('model'),
        },
        {
          type: 'confirm',
          name: 'smartGrouping',
          message: PROMPT_MESSAGES.SMART_GROUPING,
          default: config.get('smartGrouping'),
        },
      ]);

      await config.saveConfig({ model: answers.model, smartGrouping: answers.smartGrouping });

      console.log(`${chalk.green(`\n✅ ${SUCCESS_MESSAGES.SETUP_COMPLETED}`)}
${chalk.blue(HELP_MESSAGES.USAGE)}
${chalk.gray(config.getApiKey() ? HELP_MESSAGES.API_KEY_ENV : `${ERROR_MESSAGES.API_KEY_NOT_FOUND}. ${HELP_MESSAGES.API_KEY_ENV}`)}
${chalk.gray(HELP_MESSAGES.CONFIG_MODIFY)}`);
    } catch (error) {
      handleErrorImmediate(error, 'setup');
    }
  });

await program.parseAsync(process.argv);
