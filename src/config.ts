import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import process from 'process';
import chalk from 'chalk';
import {
  CommitConfigSchema,
  ApiKeySchema,
  coerceConfigValue,
  type ValidatedCommitConfig,
} from './schemas/validation.js';
import type { CommitConfig } from './types/common.js';
import type { AnalyzerSettings } from './types/analyzer.js';
import type { GroupingOptions } from './types/grouping.js';
import { sanitizeError } from './utils/security.js';
import { ErrorType } from './types/error-handler.js';
import { withErrorHandling, SecureError } from './utils/error-handler.js';
import {
  CONFIG_DIR as CONFIG_DIR_NAME,
  CONFIG_DIR_ENV,
  CONFIG_FILE as CONFIG_FILE_NAME,
  CONFIG_FILE_MODE,
  CONFIG_DIR_MODE,
  DEFAULT_CONFIG,
  ENV_OVERRIDES,
} from './constants/config.js';
import { WARNING_MESSAGES } from './constants/messages.js';

export type ResolvedConfig = typeof DEFAULT_CONFIG & Pick<CommitConfig, 'apiKey'>;

const defaultConfigDir = (): string =>
  process.env[CONFIG_DIR_ENV] ?? path.join(os.homedir(), CONFIG_DIR_NAME);

const formatIssues = (issues: ReadonlyArray<{ message: string }>): string =>
  issues.map((issue) => issue.message).join(', ');

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly configFile: string;
  private fileConfig: ValidatedCommitConfig;

  constructor(
    private readonly configDir: string = defaultConfigDir(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.configFile = path.join(configDir, CONFIG_FILE_NAME);
    this.fileConfig = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getConfigPath = (): string => this.configFile;

  private readonly loadConfig = (): ValidatedCommitConfig => {
    try {
      if (!fs.existsSync(this.configFile)) {
        return {};
      }

      const userConfig: unknown = JSON.parse(fs.readFileSync(this.configFile, 'utf-8'));
      const result = CommitConfigSchema.safeParse(userConfig);
      if (result.success) {
        return result.data;
      }

      console.warn(chalk.yellow(`⚠️  ${WARNING_MESSAGES.INVALID_CONFIG_FILE}: ${formatIssues(result.error.issues)}`));
    } catch (error) {
      console.warn(chalk.yellow(`⚠️  Failed to load config, using defaults: ${sanitizeError(error)}`));
    }

    return {};
  };

  private readonly readEnvOverrides = (): ValidatedCommitConfig => {
    const overrides: ValidatedCommitConfig = {};

    for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
      const raw = this.env[variable];
      if (raw === undefined || raw === '') {
        continue;
      }

      const result = CommitConfigSchema.safeParse({ [key]: coerceConfigValue(key, raw) });
      if (result.success) {
        Object.assign(overrides, result.data);
      } else {
        console.warn(
          chalk.yellow(
            `⚠️  ${WARNING_MESSAGES.INVALID_ENV_OVERRIDE} ${variable}: ${formatIssues(result.error.issues)}`
          )
        );
      }
    }

    return overrides;
  };

  /** Defaults, then the config file, then environment overrides. */
  public getConfig = (): ResolvedConfig => ({
    ...DEFAULT_CONFIG,
    ...this.fileConfig,
    ...this.readEnvOverrides(),
  });

  public get = <K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] => this.getConfig()[key];

  public saveConfig = async (config: Partial<CommitConfig>): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        const result = CommitConfigSchema.safeParse(config);
        if (!result.success) {
          throw new SecureError(
            `Invalid configuration: ${formatIssues(result.error.issues)}`,
            ErrorType.VALIDATION_ERROR,
            { operation: 'saveConfig' },
            true
          );
        }

        this.fileConfig = { ...this.fileConfig, ...result.data };
        this.writeConfigFile();
      },
      { operation: 'saveConfig' }
    );
  };

  private readonly writeConfigFile = (): void => {
    if (!fs.existsSync(this.configDir)) {
      fs.mkdirSync(this.configDir, { recursive: true, mode: CONFIG_DIR_MODE });
    }

    // The API key only ever comes from the environment
    const { apiKey: _apiKey, ...safeConfig } = this.fileConfig;

    fs.writeFileSync(this.configFile, JSON.stringify(safeConfig, null, 2), {
      mode: CONFIG_FILE_MODE,
    });
  };

  /** Validates a raw string for the key and persists it. */
  public set = async (key: keyof CommitConfig, value: string): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        if (key === 'apiKey') {
          throw new SecureError(
            'The API key is read from GEMINI_API_KEY and cannot be stored in the config file',
            ErrorType.CONFIG_ERROR,
            { operation: 'setConfig', key },
            true
          );
        }

        const result = CommitConfigSchema.safeParse({ [key]: coerceConfigValue(key, value) });

        if (!result.success) {
          throw new SecureError(
            `Invalid value for ${key}: ${formatIssues(result.error.issues)}`,
            ErrorType.VALIDATION_ERROR,
            { operation: 'setConfig', key },
            true
          );
        }

        await this.saveConfig(result.data);
      },
      { operation: 'setConfig', key }
    );
  };

  public getApiKey = (): string => {
    const envKey = this.env.GEMINI_API_KEY;
    if (envKey) {
      const result = ApiKeySchema.safeParse(envKey);
      if (result.success) {
        return result.data;
      }
    }

    return '';
  };

  public getAnalyzerSettings = (model?: string): AnalyzerSettings => {
    const config = this.getConfig();
    return {
      model: model ?? config.model,
      tokenLimit: config.tokenLimit,
      maxFilesThreshold: config.maxFilesThreshold,
      costWarningThreshold: config.costWarningThreshold,
    };
  };

  public getGroupingOptions = (): GroupingOptions => {
    const { maxGroupSize, smallGroupThreshold } = this.getConfig();
    return { maxGroupSize, smallGroupThreshold };
  };

  public reset = async (): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        this.fileConfig = {};
        this.writeConfigFile();
      },
      { operation: 'resetConfig' }
    );
  };
}
