import * as fs from 'fs/promises';
import * as path from 'path';
import dotenv from 'dotenv';
import type { CliOverrides, PreflightConfig, ProjectConfigFile, RequiredEnvVar } from '../env/types.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

const ENV_PREFIX = 'RAILWAY_PREFLIGHT_';

const DEFAULT_REQUIRED_FILES = ['requirements.txt', 'Procfile', 'app.py', 'runtime.txt'];

const DEFAULT_ENV_VARS: RequiredEnvVar[] = [
  { name: 'MONGO_URI', description: 'Your MongoDB Atlas connection string' },
  { name: 'JWT_SECRET_KEY', description: 'A secure random string' },
  { name: 'FLASK_ENV', description: "Set to 'production'" },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string' && item.length > 0);
}

function isEnvVarList(value: unknown): value is RequiredEnvVar[] {
  return Array.isArray(value) && value.every(
    item => isRecord(item) && typeof item.name === 'string' && item.name.length > 0 && typeof item.description === 'string'
  );
}

function parseBooleanFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

/**
 * Configuration loader with priority system:
 * CLI args > Env vars > Project config > Defaults
 */
export class ConfigLoader {
  static readonly LOCAL_CONFIG = '.railway-preflight.json';

  static getDefaults(workingDir: string = process.cwd()): PreflightConfig {
    return {
      workingDir,
      cliCommand: 'railway',
      requiredFiles: [...DEFAULT_REQUIRED_FILES],
      envVars: DEFAULT_ENV_VARS.map(envVar => ({ ...envVar })),
      secretVariable: 'JWT_SECRET_KEY',
      debug: false,
    };
  }

  static async load(
    workingDir: string = process.cwd(),
    cliOverrides: CliOverrides = {}
  ): Promise<PreflightConfig> {
    // 4. Built-in defaults (lowest priority)
    const config = this.getDefaults(workingDir);

    // 3. Project config (.railway-preflight.json)
    const projectConfig = await this.loadProjectConfig(path.join(workingDir, this.LOCAL_CONFIG));
    this.applyOverrides(config, projectConfig);

    // 2. Environment variables, then the project .env for anything unset
    const dotenvValues = await this.loadDotenv(path.join(workingDir, '.env'));
    this.applyOverrides(config, this.loadFromEnv({ ...dotenvValues, ...process.env }));

    // 1. CLI arguments (highest priority)
    this.applyOverrides(config, cliOverrides);

    logger.debug('Loaded configuration', config);
    return config;
  }

  /**
   * Parse the project .env without writing to process.env.
   * Only RAILWAY_PREFLIGHT_* keys are kept.
   */
  private static async loadDotenv(envPath: string): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await fs.readFile(envPath, 'utf-8');
    } catch {
      logger.debug('No .env file found', { envPath });
      return {};
    }

    return Object.fromEntries(
      Object.entries(dotenv.parse(content)).filter(([key]) => key.startsWith(ENV_PREFIX))
    );
  }

  private static loadFromEnv(source: Record<string, string | undefined>): CliOverrides {
    const env: CliOverrides = {};

    const cliCommand = source[`${ENV_PREFIX}CLI`];
    if (cliCommand) {
      env.cliCommand = cliCommand;
    }
    const debug = source[`${ENV_PREFIX}DEBUG`];
    if (debug) {
      env.debug = parseBooleanFlag(debug);
    }

    return env;
  }

  /**
   * Read and validate the project config file. A missing file yields `{}`.
   */
  private static async loadProjectConfig(filePath: string): Promise<ProjectConfigFile> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.validateProjectConfig(raw, filePath);
  }

  static validateProjectConfig(raw: unknown, filePath: string): ProjectConfigFile {
    if (!isRecord(raw)) {
      throw new ConfigurationError(`${filePath} must contain a JSON object`);
    }

    const config: ProjectConfigFile = {};

    if (raw.cliCommand !== undefined) {
      if (typeof raw.cliCommand !== 'string' || raw.cliCommand.trim() === '') {
        throw new ConfigurationError(`${filePath}: "cliCommand" must be a non-empty string`);
      }
      config.cliCommand = raw.cliCommand;
    }

    if (raw.requiredFiles !== undefined) {
      if (!isStringArray(raw.requiredFiles)) {
        throw new ConfigurationError(`${filePath}: "requiredFiles" must be an array of file names`);
      }
      config.requiredFiles = raw.requiredFiles;
    }

    if (raw.envVars !== undefined) {
      if (!isEnvVarList(raw.envVars)) {
        throw new ConfigurationError(`${filePath}: "envVars" must be an array of { name, description } objects`);
      }
      config.envVars = raw.envVars.map(({ name, description }) => ({ name, description }));
    }

    if (raw.secretVariable !== undefined) {
      if (typeof raw.secretVariable !== 'string') {
        throw new ConfigurationError(`${filePath}: "secretVariable" must be a string`);
      }
      config.secretVariable = raw.secretVariable;
    }

    if (raw.debug !== undefined) {
      if (typeof raw.debug !== 'boolean') {
        throw new ConfigurationError(`${filePath}: "debug" must be a boolean`);
      }
      config.debug = raw.debug;
    }

    return config;
  }

  /**
   * Copy every defined field of `overrides` onto `config`
   */
  private static applyOverrides(config: PreflightConfig, overrides: ProjectConfigFile): void {
    if (overrides.cliCommand !== undefined) config.cliCommand = overrides.cliCommand;
    if (overrides.requiredFiles !== undefined) config.requiredFiles = overrides.requiredFiles;
    if (overrides.envVars !== undefined) config.envVars = overrides.envVars;
    if (overrides.secretVariable !== undefined) config.secretVariable = overrides.secretVariable || undefined;
    if (overrides.debug !== undefined) config.debug = overrides.debug;
  }
}
