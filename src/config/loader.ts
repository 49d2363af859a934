/**
 * Configuration file loader
 * Reads the optional client configuration file and environment overrides
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../types/errors.js';
import { configLogger } from '../utils/logger.js';
import {
  StoreKindSchema,
  validateClientConfig,
  type ClientConfigFile,
  type StoreKind,
} from './validation.js';

const CONFIG_DIR = '.remindkit';
const CONFIG_FILE = 'config.json';

export interface ClientConfig {
  store: StoreKind;
  defaultCalendarName?: string;
}

export class ConfigLoader {
  /**
   * Get the configuration directory (REMINDKIT_CONFIG_DIR overrides the home default)
   */
  static getConfigDir(): string {
    return process.env.REMINDKIT_CONFIG_DIR ?? join(homedir(), CONFIG_DIR);
  }

  static getConfigPath(): string {
    return join(this.getConfigDir(), CONFIG_FILE);
  }

  static getDefaultConfig(platform: NodeJS.Platform = process.platform): ClientConfig {
    return {
      store: platform === 'darwin' ? 'eventkit' : 'memory',
    };
  }

  /**
   * Load the configuration; a missing file yields the defaults
   */
  static async load(configPath: string = this.getConfigPath()): Promise<ClientConfig> {
    const config = this.getDefaultConfig();

    const fromFile = await this.readConfigFile(configPath);
    if (fromFile) {
      if (fromFile.store) {
        config.store = fromFile.store;
      }
      if (fromFile.defaultCalendarName) {
        config.defaultCalendarName = fromFile.defaultCalendarName;
      }
    }

    const storeOverride = process.env.REMINDKIT_STORE;
    if (storeOverride) {
      const parsed = StoreKindSchema.safeParse(storeOverride);
      if (!parsed.success) {
        throw new ConfigError(
          `Invalid REMINDKIT_STORE value '${storeOverride}': expected 'eventkit' or 'memory'`
        );
      }
      config.store = parsed.data;
    }

    configLogger.debug({ configPath, store: config.store }, 'Configuration loaded');
    return config;
  }

  private static async readConfigFile(configPath: string): Promise<ClientConfigFile | undefined> {
    let content: string;
    try {
      content = await readFile(configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Configuration file ${configPath} is not valid JSON`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const validation = validateClientConfig(parsed);
    if (!validation.success || !validation.data) {
      const issues = validation.error?.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration file ${configPath}: ${issues}`, validation.error?.issues);
    }

    return validation.data;
  }
}
