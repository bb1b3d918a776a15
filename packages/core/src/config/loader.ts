import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { type Config, ConfigError, ConfigSchema, expandHome } from '@index-meta/shared';

export interface ConfigOptions {
  configPath?: string; // explicit config file
  cwd?: string; // directory searched for a project config
  env?: NodeJS.ProcessEnv; // Environment variables
}

type RawConfig = Record<string, unknown>;

/** Environment variable naming the user config file. */
export const USER_CONFIG_ENV = 'INDEX_META_CONFIG';
export const PROJECT_CONFIG_FILENAME = '.index-meta.yaml';

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static userConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    return env[USER_CONFIG_ENV] || path.join(os.homedir(), '.config', 'index-meta', 'config.yaml');
  }

  static loadYaml(filePath: string): RawConfig {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: RawConfig, source: RawConfig): RawConfig {
    const output = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
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

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = os.homedir();

    // 1. User config: $INDEX_META_CONFIG or ~/.config/index-meta/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(env));

    // 2. Project config: <cwd>/.index-meta.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILENAME));

    // 3. Explicit config file (if provided)
    let explicitConfig: RawConfig = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Merge in order of precedence: explicit > project > user > defaults
    const defaults: RawConfig = {
      configVersion: 1,
      repositoryCache: path.join(homeDir, '.cabal', 'packages'),
    };
    let mergedConfig = this.mergeConfigs(defaults, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, projectConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);

    const result = ConfigSchema.safeParse(mergedConfig);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    return {
      ...config,
      repositoryCache: expandHome(config.repositoryCache, homeDir),
      cacheDir: config.cacheDir === undefined ? undefined : expandHome(config.cacheDir, homeDir),
      repositories: Object.fromEntries(
        Object.entries(config.repositories).map(([id, repository]) => [
          id,
          repository.indexPath === undefined
            ? repository
            : { ...repository, indexPath: expandHome(repository.indexPath, homeDir) },
        ]),
      ),
    };
  }
}
