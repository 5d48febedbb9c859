/**
 * Config Loader - Loads validator settings from JSON config files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigSource } from './types';
import type { ConfigError, ConfigParseResult, ValidatorConfig } from './types';

export const DEFAULT_VALIDATOR_CONFIG: Readonly<ValidatorConfig> = Object.freeze({
  strictMode: false,
  requireHeader: false,
  maxLength: 512
});

/**
 * Fill unset options from the defaults
 */
export function resolveConfig(overrides?: Partial<ValidatorConfig>): ValidatorConfig {
  return { ...DEFAULT_VALIDATOR_CONFIG, ...overrides };
}

export interface ConfigPaths {
  user: string;
  project: string;
}

export class ConfigLoader {
  private paths: ConfigPaths;

  constructor(paths?: Partial<ConfigPaths>) {
    this.paths = {
      user: paths?.user ?? path.join(os.homedir(), '.config', 'metar-inspect', 'config.json'),
      project: paths?.project ?? path.join(process.cwd(), '.metar-inspect.json')
    };
  }

  /**
   * Parse a single config file
   */
  parse(filePath: string, source: ConfigSource): ConfigParseResult {
    const config: Partial<ValidatorConfig> = {};
    const errors: ConfigError[] = [];

    // Check if file exists
    if (!fs.existsSync(filePath)) {
      // Not an error - just return empty result
      return { config, errors };
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      errors.push({
        key: null,
        message: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        source
      });
      return { config, errors };
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      errors.push({ key: null, message: 'Config must be a JSON object', source });
      return { config, errors };
    }

    for (const [key, value] of Object.entries(data)) {
      // Record the error but keep the remaining keys
      try {
        this.applyKey(config, key, value);
      } catch (error) {
        errors.push({
          key,
          message: error instanceof Error ? error.message : String(error),
          source
        });
      }
    }

    return { config, errors };
  }

  private applyKey(config: Partial<ValidatorConfig>, key: string, value: unknown): void {
    switch (key) {
      case 'strictMode':
      case 'requireHeader':
        if (typeof value !== 'boolean') {
          throw new Error(`${key} must be a boolean`);
        }
        config[key] = value;
        return;

      case 'maxLength':
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
          throw new Error('maxLength must be a positive integer');
        }
        config.maxLength = value;
        return;

      default:
        throw new Error(`Unknown config key: ${key}`);
    }
  }

  /**
   * Load settings from all standard locations.
   * Project settings take precedence over user settings.
   */
  loadAll(): Partial<ValidatorConfig> {
    const userResult = this.parse(this.paths.user, ConfigSource.USER);
    this.logErrors(userResult.errors);

    const projectResult = this.parse(this.paths.project, ConfigSource.PROJECT);
    this.logErrors(projectResult.errors);

    return { ...userResult.config, ...projectResult.config };
  }

  /**
   * Log parse errors to stderr
   */
  private logErrors(errors: ConfigError[]): void {
    for (const error of errors) {
      if (error.key === null) {
        // File-level error
        console.error(`Warning: ${error.message} (${error.source})`);
      } else {
        console.error(`Warning: Invalid config key "${error.key}" in ${error.source}: ${error.message}`);
      }
    }
  }
}
