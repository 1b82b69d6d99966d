import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { QuireConfig, ResolvedConfig, LayoutConfig, LoggingConfig } from './types';
import { DEFAULT_MAX_DEPTH } from './types';
import { loggingConfig } from './logging';
import { ConfigError } from '@core/errors/ConfigError';
import { configLogger, loggerFactory } from '@core/utils/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ConfigLoaderOptions {
  projectPath?: string;
  globalConfigPath?: string;
}

/**
 * Load quire configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: QuireConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    // Global config location: ~/.config/quire.json
    this.globalConfigPath = options.globalConfigPath
      ?? path.join(os.homedir(), '.config', 'quire.json');

    // Project config location: <project>/quire.config.json
    this.projectConfigPath = path.join(options.projectPath ?? process.cwd(), 'quire.config.json');
  }

  /**
   * Load and merge configurations. Project settings override global ones.
   */
  load(): QuireConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * The merged configuration with defaults filled in.
   */
  resolve(): ResolvedConfig {
    const config = this.load();
    return {
      layout: {
        maxDepth: config.layout?.maxDepth ?? DEFAULT_MAX_DEPTH,
        debug: config.layout?.debug ?? false
      },
      logging: {
        level: config.logging?.level ?? loggingConfig.defaultLevel
      }
    };
  }

  /**
   * Resolves the configuration and applies its log level to every service
   * logger.
   */
  apply(): ResolvedConfig {
    const resolved = this.resolve();
    loggerFactory.setLevel(resolved.logging.level);
    configLogger.debug('Applied configuration', { ...resolved });
    return resolved;
  }

  clearCache(): void {
    this.cachedConfig = undefined;
  }

  /**
   * A missing file is an empty config. So is a file that cannot be read or
   * parsed, with a warning.
   */
  private loadConfigFile(filePath: string): QuireConfig {
    let raw: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      configLogger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    if (!isRecord(raw)) {
      configLogger.warn(`Ignoring config in ${filePath}: expected a JSON object`);
      return {};
    }

    return this.validateConfig(raw, filePath);
  }

  private validateConfig(raw: Record<string, unknown>, filePath: string): QuireConfig {
    const config: QuireConfig = {};

    if (raw.layout !== undefined) {
      config.layout = this.validateLayout(raw.layout, filePath);
    }

    if (raw.logging !== undefined) {
      config.logging = this.validateLogging(raw.logging, filePath);
    }

    return config;
  }

  private validateLayout(raw: unknown, filePath: string): LayoutConfig {
    if (!isRecord(raw)) {
      throw new ConfigError('layout', raw, 'an object', filePath);
    }

    const layout: LayoutConfig = {};
    const { maxDepth, debug } = raw;

    if (maxDepth !== undefined) {
      if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1) {
        throw new ConfigError('layout.maxDepth', maxDepth, 'a positive integer', filePath);
      }
      layout.maxDepth = maxDepth;
    }

    if (debug !== undefined) {
      if (typeof debug !== 'boolean') {
        throw new ConfigError('layout.debug', debug, 'a boolean', filePath);
      }
      layout.debug = debug;
    }

    return layout;
  }

  private validateLogging(raw: unknown, filePath: string): LoggingConfig {
    if (!isRecord(raw)) {
      throw new ConfigError('logging', raw, 'an object', filePath);
    }

    const { level } = raw;
    if (level === undefined) {
      return {};
    }

    if (typeof level !== 'string' || !(level in loggingConfig.levels)) {
      throw new ConfigError(
        'logging.level',
        level,
        `one of ${Object.keys(loggingConfig.levels).join(', ')}`,
        filePath
      );
    }

    return { level };
  }

  private mergeConfigs(global: QuireConfig, project: QuireConfig): QuireConfig {
    const merged: QuireConfig = {};

    if (global.layout || project.layout) {
      merged.layout = { ...global.layout, ...project.layout };
    }

    if (global.logging || project.logging) {
      merged.logging = { ...global.logging, ...project.logging };
    }

    return merged;
  }
}
