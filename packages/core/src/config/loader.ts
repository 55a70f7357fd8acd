import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ProvisionConfigSchema, type ProvisionConfig } from '@provisioner/shared';

export const USER_CONFIG_DIR = '.provisioner';
export const USER_CONFIG_FILE = 'config.yaml';
export const LOCAL_CONFIG_FILE = 'provision.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Record<string, unknown>; // CLI flags, nested like the config file
  cwd?: string; // Directory searched for provision.yaml
  homeDir?: string; // Directory searched for .provisioner/config.yaml
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping at the top level: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): ProvisionConfig {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.provisioner/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, USER_CONFIG_FILE));

    // 2. Local config: <cwd>/provision.yaml
    const localConfig = this.loadYaml(path.join(cwd, LOCAL_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Merge in order of precedence: flags > explicit > local > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, localConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    return this.validate(merged);
  }

  static validate(raw: unknown): ProvisionConfig {
    const result = ProvisionConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
      });
    }
    return result.data;
  }
}
