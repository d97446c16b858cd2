/**
 * Configuration loader with hierarchy support
 * Priority: overrides > env vars > project config > global config > defaults
 */

import yaml from 'yaml';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import type { ZodError } from 'zod';
import type { IFileSystem } from '../platform/IFileSystem.js';
import { FileSystemAdapter } from '../platform/FileSystemAdapter.js';
import { ConfigurationError } from '../shared/utils/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/utils/logger.js';
import {
  EngineConfigLayerSchema,
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigLayer,
} from './schemas.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, getDefaultConfig } from './defaults.js';

export interface ConfigLoadOptions {
  projectRoot?: string;
  /**
   * Directory holding the global config (default: ~/.shellweave)
   */
  globalDir?: string;
  overrides?: EngineConfigLayer;
  /**
   * Environment to read SHELLWEAVE_* variables from (default: process.env)
   */
  env?: NodeJS.ProcessEnv;
}

const ENV_PREFIX = 'SHELLWEAVE_';

export class ConfigLoader {
  constructor(
    private fs: IFileSystem = new FileSystemAdapter(),
    private logger: Logger = defaultLogger
  ) {}

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.shellweave/config.yml)
   * 3. Project (.shellweave/config.yml)
   * 4. Environment variables (process env over .env)
   * 5. Overrides
   */
  async load(options: ConfigLoadOptions = {}): Promise<EngineConfig> {
    let config = getDefaultConfig();

    const globalPath = path.join(options.globalDir ?? this.defaultGlobalDir(), CONFIG_FILE_NAME);
    const globalConfig = await this.loadFileLayer(globalPath, 'global');
    if (globalConfig) {
      config = this.merge(config, globalConfig);
    }

    if (options.projectRoot) {
      const projectPath = path.join(options.projectRoot, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
      const projectConfig = await this.loadFileLayer(projectPath, 'project');
      if (projectConfig) {
        config = this.merge(config, projectConfig);
      }
    }

    const envConfig = await this.loadEnvConfig(options.projectRoot, options.env ?? process.env);
    if (envConfig) {
      config = this.merge(config, envConfig);
    }

    if (options.overrides) {
      const parsed = EngineConfigLayerSchema.safeParse(options.overrides);
      if (!parsed.success) {
        throw new ConfigurationError('Invalid configuration overrides', formatIssues(parsed.error));
      }
      config = this.merge(config, parsed.data);
    }

    const validated = this.validate(config);
    if (validated.logging.file && !path.isAbsolute(validated.logging.file)) {
      validated.logging.file = path.resolve(
        options.projectRoot ?? process.cwd(),
        validated.logging.file
      );
    }
    return validated;
  }

  /**
   * Validate a complete configuration object
   */
  validate(config: unknown): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
    }
    return parsed.data;
  }

  async save(
    config: EngineConfigLayer,
    scope: 'global' | 'project',
    projectRoot?: string
  ): Promise<string> {
    const configPath =
      scope === 'global'
        ? path.join(this.defaultGlobalDir(), CONFIG_FILE_NAME)
        : path.join(projectRoot ?? process.cwd(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);

    const configDir = path.dirname(configPath);
    if (!(await this.fs.exists(configDir))) {
      await this.fs.mkdir(configDir, { recursive: true });
    }

    await this.fs.writeFile(configPath, yaml.stringify(config));
    this.logger.info(`Config saved to ${configPath}`);
    return configPath;
  }

  private defaultGlobalDir(): string {
    return path.join(os.homedir(), CONFIG_DIR_NAME);
  }

  /**
   * Read one YAML layer. Missing files are skipped silently, invalid ones with a warning.
   */
  private async loadFileLayer(
    configPath: string,
    scope: 'global' | 'project'
  ): Promise<EngineConfigLayer | null> {
    if (!(await this.fs.exists(configPath))) {
      return null;
    }

    let raw: unknown;
    try {
      raw = yaml.parse(await this.fs.readFile(configPath));
    } catch (error) {
      this.logger.warn(`Failed to load ${scope} config`, { path: configPath, error: String(error) });
      return null;
    }

    if (raw === null || raw === undefined) {
      return null;
    }

    const parsed = EngineConfigLayerSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring invalid ${scope} config`, {
        path: configPath,
        issues: formatIssues(parsed.error),
      });
      return null;
    }
    return parsed.data;
  }

  private async loadEnvConfig(
    projectRoot: string | undefined,
    env: NodeJS.ProcessEnv
  ): Promise<EngineConfigLayer | null> {
    // Variables already in the environment win over .env, as with dotenv.config()
    const envPath = path.join(projectRoot ?? process.cwd(), '.env');
    let vars: NodeJS.ProcessEnv = env;
    if (await this.fs.exists(envPath)) {
      vars = { ...dotenv.parse(await this.fs.readFile(envPath)), ...env };
    }

    const read = (name: string): string | undefined => {
      const value = vars[`${ENV_PREFIX}${name}`];
      return value === undefined || value === '' ? undefined : value;
    };

    const envConfig: Record<string, Record<string, unknown>> = {};
    const set = (section: string, key: string, value: unknown): void => {
      envConfig[section] = { ...envConfig[section], [key]: value };
    };

    const maxConcurrent = read('MAX_CONCURRENT');
    if (maxConcurrent !== undefined) {
      set('pool', 'maxConcurrent', Number(maxConcurrent));
    }
    const timeout = read('TIMEOUT_MS');
    if (timeout !== undefined) {
      set('execution', 'defaultTimeoutMs', Number(timeout));
    }
    const killGrace = read('KILL_GRACE_MS');
    if (killGrace !== undefined) {
      set('execution', 'killGraceMs', Number(killGrace));
    }
    const logFile = read('LOG_FILE');
    if (logFile !== undefined) {
      set('logging', 'file', logFile);
    }
    const logLevel = read('LOG_LEVEL');
    if (logLevel !== undefined) {
      set('logging', 'level', logLevel.toLowerCase());
    }
    const logConsole = read('LOG_CONSOLE');
    if (logConsole !== undefined) {
      set('logging', 'console', logConsole === 'true' || logConsole === '1');
    }

    if (Object.keys(envConfig).length === 0) {
      return null;
    }

    const parsed = EngineConfigLayerSchema.safeParse(envConfig);
    if (!parsed.success) {
      this.logger.warn('Ignoring invalid environment config', { issues: formatIssues(parsed.error) });
      return null;
    }
    return parsed.data;
  }

  private merge(base: EngineConfig, override: EngineConfigLayer): EngineConfig {
    return {
      shells: {
        console: { ...base.shells.console, ...override.shells?.console },
        powershell: { ...base.shells.powershell, ...override.shells?.powershell },
        posix: { ...base.shells.posix, ...override.shells?.posix },
      },
      pool: { ...base.pool, ...override.pool },
      execution: { ...base.execution, ...override.execution },
      normalizer: { ...base.normalizer, ...override.normalizer },
      classifier: { ...base.classifier, ...override.classifier },
      guard: { ...base.guard, ...override.guard },
      logging: { ...base.logging, ...override.logging },
    };
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
