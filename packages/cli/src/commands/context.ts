import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ProviderAdapter } from '@specforge/adapters';
import {
  ConfigLoader,
  ProviderRegistry,
  selectProvider,
  type SelectedProvider,
} from '@specforge/core';
import {
  JsonlLogger,
  UsageError,
  createRunDir,
  createRunId,
  resolvePricing,
  type Config,
  type Logger,
  type Pricing,
  type RunArtifactPaths,
} from '@specforge/shared';
import { registerProviders } from '../providers';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  provider?: string;
  apiKey?: string;
  yes?: boolean;
  nonInteractive?: boolean;
};

/**
 * Process-level inputs of a command. Tests pass their own.
 */
export interface CliEnvironment {
  cwd: string;
  homeDir: string;
  env: NodeJS.ProcessEnv;
}

export function processEnvironment(): CliEnvironment {
  return { cwd: process.cwd(), homeDir: os.homedir(), env: process.env };
}

export interface RunContext {
  config: Config;
  provider: SelectedProvider;
  adapter: ProviderAdapter;
  pricing: Pricing;
  runId: string;
  artifacts: RunArtifactPaths;
  effectiveConfigPath: string;
  logger: Logger;
  startedAt: Date;
}

/**
 * Reads a text argument: literal text, or `@path` for a file relative to `cwd`.
 */
export async function readSpecInput(
  input: string,
  cwd: string,
  label = 'Specification',
): Promise<string> {
  let spec = input;
  if (input.startsWith('@')) {
    const file = path.resolve(cwd, input.slice(1));
    try {
      spec = await fs.readFile(file, 'utf8');
    } catch (error) {
      throw new UsageError(`Cannot read ${label.toLowerCase()} file: ${file}`, { cause: error });
    }
  }
  if (spec.trim().length === 0) {
    throw new UsageError(`${label} is empty`);
  }
  return spec;
}

/**
 * Loads configuration, resolves the provider adapter and creates the run
 * directory with its trace and effective config.
 */
export async function prepareRun(
  globals: GlobalOptions,
  environment: CliEnvironment,
  flags: Record<string, unknown> = {},
): Promise<RunContext> {
  const config = ConfigLoader.load({
    configPath: globals.config ? path.resolve(environment.cwd, globals.config) : undefined,
    flags,
    cwd: environment.cwd,
    homeDir: environment.homeDir,
    env: environment.env,
  });

  const provider = selectProvider(config, { providerId: globals.provider, apiKey: globals.apiKey });
  const registry = registerProviders(new ProviderRegistry(config));
  const adapter = registry.getAdapter(provider.id, provider.config);

  const startedAt = new Date();
  const runId = createRunId(startedAt);
  const artifacts = await createRunDir(environment.cwd, runId);
  const effectiveConfigPath = ConfigLoader.writeEffectiveConfig(config, artifacts.root);
  const logger = new JsonlLogger(artifacts.trace, {}, { quiet: !globals.verbose || !!globals.json });

  for (const warning of registry.outputLimitWarnings(adapter, config.generation)) {
    logger.warn(warning);
  }

  return {
    config,
    provider,
    adapter,
    pricing: resolvePricing(provider.config),
    runId,
    artifacts,
    effectiveConfigPath,
    logger,
    startedAt,
  };
}
