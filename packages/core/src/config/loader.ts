import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigSchema,
  ConfigError,
  SPECFORGE_DIR,
  redactForLogs,
  type Config,
  type ProviderConfig,
} from '@specforge/shared';

type ConfigLayer = Record<string, unknown>;

export interface ConfigOptions {
  /** Explicit --config file */
  configPath?: string;
  /** CLI flags, already shaped like the config document */
  flags?: ConfigLayer;
  /** Directory searched for `.specforge.yaml` */
  cwd?: string;
  /** Directory searched for `.specforge/config.yaml` */
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Lowest-precedence layer. Every other layer merges over it.
 */
export const DEFAULT_CONFIG = {
  configVersion: 1,
  defaults: { provider: 'anthropic' },
  providers: {
    anthropic: {
      type: 'anthropic',
      model: 'claude-sonnet-4-5',
      api_key_env: 'ANTHROPIC_API_KEY',
      pricing: { inputPerMTokUsd: 3, outputPerMTokUsd: 15 },
    },
    openai: {
      type: 'openai',
      model: 'gpt-4o',
      api_key_env: 'OPENAI_API_KEY',
      pricing: { inputPerMTokUsd: 2.5, outputPerMTokUsd: 10 },
    },
    fake: {
      type: 'fake',
      model: 'fake-model',
      pricing: { inputPerMTokUsd: 0, outputPerMTokUsd: 0 },
    },
  },
} satisfies ConfigLayer;

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const parsed: unknown = yaml.load(fs.readFileSync(filePath, 'utf8'));
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isLayer(parsed)) {
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

  /**
   * Deep merge. Nested mappings merge key by key; arrays and scalars replace;
   * `undefined` in the source is skipped.
   */
  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isLayer(sourceValue) && isLayer(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Writes `effective-config.json` into `dir` with API keys masked.
   */
  static writeEffectiveConfig(config: Config, dir: string): string {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const filePath = path.join(dir, 'effective-config.json');
    fs.writeFileSync(filePath, JSON.stringify(redactForLogs(config), null, 2), 'utf8');
    return filePath;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    const userConfig = this.loadYaml(path.join(homeDir, SPECFORGE_DIR, 'config.yaml'));
    const repoConfig = this.loadYaml(path.join(cwd, '.specforge.yaml'));

    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // flags > explicit > repo > user > defaults
    let merged = this.mergeConfigs({}, DEFAULT_CONFIG);
    merged = this.mergeConfigs(merged, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags || {});

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const finalConfig = result.data;

    if (finalConfig.providers) {
      for (const providerConfig of Object.values(finalConfig.providers)) {
        if (providerConfig.api_key_env && !providerConfig.api_key) {
          const fromEnv = env[providerConfig.api_key_env];
          if (fromEnv) {
            providerConfig.api_key = fromEnv;
          }
        }
      }
    }

    return finalConfig;
  }
}

export interface SelectedProvider {
  id: string;
  config: ProviderConfig;
}

/**
 * Picks the provider to use: the explicit id, else `defaults.provider`.
 * An `apiKey` replaces whatever key the config resolved.
 */
export function selectProvider(
  config: Config,
  options: { providerId?: string; apiKey?: string } = {},
): SelectedProvider {
  const id = options.providerId ?? config.defaults.provider;
  if (!id) {
    throw new ConfigError('No provider selected. Set defaults.provider or pass --provider');
  }
  const providerConfig = config.providers?.[id];
  if (!providerConfig) {
    const known = Object.keys(config.providers ?? {}).sort().join(', ');
    throw new ConfigError(`Provider '${id}' is not configured (known: ${known || 'none'})`);
  }
  return {
    id,
    config: options.apiKey ? { ...providerConfig, api_key: options.apiKey } : providerConfig,
  };
}
