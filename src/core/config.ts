import { join, resolve } from 'path';
import { FILE_PATTERNS } from '../constants/index.js';
import { GameConfig, SrcpackConfig, SrcpackDirectories } from '../types/index.js';
import { readJsonOrJsoncFile, writeJsonFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { ensureSrcpackDirectories, getSrcpackDirectories } from './directory.js';

/**
 * Configuration management for the srcpack CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];
const DEFAULT_CONFIG_FILE = FILE_PATTERNS.CONFIG_JSONC;

export const CONFIG_KEYS = ['game.dir', 'game.modDir', 'game.appId', 'exclude'] as const;
export type ConfigKey = typeof CONFIG_KEYS[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(candidate => candidate === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string, path: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path}: "${field}" must be a string`);
  }
  return value;
}

function parseAppId(value: unknown, field: string): number {
  const appId = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof appId !== 'number' || !Number.isInteger(appId) || appId <= 0) {
    throw new ConfigError(`"${field}" must be a positive integer`);
  }
  return appId;
}

/**
 * Validate a parsed config document
 */
export function parseConfig(raw: unknown, path: string): SrcpackConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${path}: configuration must be an object`);
  }

  const config: SrcpackConfig = {};

  if (raw.game !== undefined) {
    if (!isRecord(raw.game)) {
      throw new ConfigError(`${path}: "game" must be an object`);
    }
    const game: GameConfig = {
      dir: optionalString(raw.game.dir, 'game.dir', path),
      modDir: optionalString(raw.game.modDir, 'game.modDir', path),
      appId: raw.game.appId === undefined ? undefined : parseAppId(raw.game.appId, 'game.appId')
    };
    config.game = game;
  }

  if (raw.exclude !== undefined) {
    const exclude = raw.exclude;
    if (!Array.isArray(exclude) || !exclude.every((pattern): pattern is string => typeof pattern === 'string')) {
      throw new ConfigError(`${path}: "exclude" must be an array of glob strings`);
    }
    config.exclude = exclude;
  }

  return config;
}

class ConfigManager {
  private config: SrcpackConfig | null = null;
  private configPath: string | null = null;
  private srcpackDirs: SrcpackDirectories;

  constructor(dirs: SrcpackDirectories = getSrcpackDirectories()) {
    this.srcpackDirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.srcpackDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * The path to save to: the existing file's format wins, JSONC otherwise
   */
  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }

    this.configPath = await this.findConfigFile() ?? join(this.srcpackDirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file. A missing file is an empty configuration.
   */
  async load(): Promise<SrcpackConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    try {
      this.config = parseConfig(await readJsonOrJsoncFile(configPath), configPath);
      this.configPath = configPath;
      return this.config;
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`, { configPath });
    }
  }

  /**
   * Save current configuration to file. Comments in a JSONC file are not preserved.
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    try {
      await ensureSrcpackDirectories(this.srcpackDirs);
      const configPath = await this.getConfigPath();
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsonFile(configPath, this.config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath: this.configPath });
      throw new ConfigError(`Failed to save configuration: ${errorMessage(error)}`);
    }
  }

  /**
   * Get a configuration value
   */
  async get(key: ConfigKey): Promise<string | number | string[] | undefined> {
    const config = await this.load();
    switch (key) {
      case 'game.dir':
        return config.game?.dir;
      case 'game.modDir':
        return config.game?.modDir;
      case 'game.appId':
        return config.game?.appId;
      case 'exclude':
        return config.exclude;
    }
  }

  /**
   * Set a configuration value from its command-line form.
   * `exclude` takes a comma-separated list; `game.dir` is stored absolute,
   * resolved against `baseDir`.
   */
  async set(key: ConfigKey, value: string, baseDir: string = process.cwd()): Promise<void> {
    const config = await this.load();
    switch (key) {
      case 'game.dir':
        config.game = { ...config.game, dir: resolve(baseDir, value) };
        break;
      case 'game.modDir':
        config.game = { ...config.game, modDir: value };
        break;
      case 'game.appId':
        config.game = { ...config.game, appId: parseAppId(value, key) };
        break;
      case 'exclude':
        config.exclude = value.split(',').map(pattern => pattern.trim()).filter(pattern => pattern.length > 0);
        break;
    }
    await this.save();
    logger.info(`Configuration updated: ${key} = ${value}`);
  }

  async unset(key: ConfigKey): Promise<void> {
    const config = await this.load();
    if (key === 'exclude') {
      delete config.exclude;
    } else if (config.game) {
      const field = key === 'game.dir' ? 'dir' : key === 'game.modDir' ? 'modDir' : 'appId';
      const game = config.game;
      delete game[field];
      if (game.dir === undefined && game.modDir === undefined && game.appId === undefined) {
        delete config.game;
      }
    }
    await this.save();
    logger.info(`Configuration updated: ${key} unset`);
  }

  /**
   * Get all configuration values
   */
  async getAll(): Promise<SrcpackConfig> {
    return await this.load();
  }

  /**
   * Get the configuration file path
   */
  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
