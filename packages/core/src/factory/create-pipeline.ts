import { ProcessRunner, type CommandRunner } from '@provisioner/exec';
import type { Logger, ProvisionConfig } from '@provisioner/shared';
import { CommandConfigurationApplier } from '../apply/applier';
import { RegistryEnvironmentSource, type EnvironmentSource } from '../env/environment-source';
import { EnvironmentResolver } from '../env/resolver';
import { HttpArtifactFetcher } from '../fetch/fetcher';
import { CommandPackageInstaller } from '../install/installer';
import { ProvisioningPipeline, type PipelineComponents } from '../pipeline/pipeline';
import { CommandServiceRestorer } from '../restore/restorer';

export interface CreatePipelineOptions {
  logger: Logger;
  signal?: AbortSignal;
  runId?: string;
  /** Overrides for tests; the real process runner is used otherwise. */
  runner?: CommandRunner;
  fetchImpl?: typeof fetch;
  environmentSource?: EnvironmentSource;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Wires the production components for a run from validated configuration.
 */
export function createComponents(
  config: ProvisionConfig,
  options: CreatePipelineOptions,
): PipelineComponents {
  const runner = options.runner ?? new ProcessRunner();
  const { logger } = options;

  return {
    fetcher: new HttpArtifactFetcher({
      timeoutMs: config.timeouts.fetchMs,
      fetchImpl: options.fetchImpl,
      logger: logger.child({ component: 'fetcher' }),
    }),
    installer: new CommandPackageInstaller(runner, {
      command: config.commands.install,
      timeoutMs: config.timeouts.installMs,
      logger: logger.child({ component: 'installer' }),
    }),
    restorer: new CommandServiceRestorer(runner, logger.child({ component: 'restorer' })),
    resolver: new EnvironmentResolver({
      source: options.environmentSource ?? new RegistryEnvironmentSource(runner),
      executableName: config.commands.packageManager,
      conventionalDir: config.resolver.conventionalDir,
      env: options.env,
      platform: options.platform,
      logger: logger.child({ component: 'resolver' }),
    }),
    applier: new CommandConfigurationApplier(runner, {
      timeoutMs: config.timeouts.applyMs,
      env: options.env,
      logger: logger.child({ component: 'applier' }),
    }),
  };
}

export function createPipeline(
  config: ProvisionConfig,
  options: CreatePipelineOptions,
): ProvisioningPipeline {
  return new ProvisioningPipeline(config, createComponents(config, options), {
    logger: options.logger,
    signal: options.signal,
    runId: options.runId,
  });
}
