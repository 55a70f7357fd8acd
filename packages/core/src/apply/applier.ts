import { constants as fsConstants, promises as fs } from 'fs';
import type { CommandResult, CommandRunner } from '@provisioner/exec';
import {
  ApplyError,
  describeError,
  ProcessError,
  TimeoutError,
  type ExecutableRef,
  type Logger,
} from '@provisioner/shared';

export interface ApplyOptions {
  /** Pre-accept configuration and source agreements; without it the call waits on a prompt. */
  acceptAgreements: boolean;
  /** PATH handed to the package manager, typically the resolver's search path. */
  searchPath?: string;
}

/**
 * Runs the package manager's declarative configuration subcommand against a
 * local document.
 */
export interface ConfigurationApplier {
  apply(executable: ExecutableRef, document: string, options: ApplyOptions): Promise<void>;
}

export interface CommandConfigurationApplierOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export function configureArgs(document: string, acceptAgreements: boolean): string[] {
  const args = ['configure', '-f', document];
  if (acceptAgreements) {
    args.push('--accept-configuration-agreements', '--accept-source-agreements');
  }
  return args;
}

export class CommandConfigurationApplier implements ConfigurationApplier {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CommandConfigurationApplierOptions = {},
  ) {}

  async apply(executable: ExecutableRef, document: string, options: ApplyOptions): Promise<void> {
    try {
      await fs.access(document, fsConstants.R_OK);
    } catch (error) {
      throw new ApplyError('DocumentUnreadable', `Configuration document is not readable: ${document}`, {
        cause: error,
      });
    }

    const command = executable.kind === 'resolved' ? executable.path : executable.name;
    const env = { ...(this.options.env ?? process.env) };
    if (options.searchPath) {
      env.PATH = options.searchPath;
    }

    await this.options.logger?.debug(`Running ${command} configure -f ${document}`);

    let result: CommandResult;
    try {
      result = await this.runner.run({
        command,
        args: configureArgs(document, options.acceptAgreements),
        env,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      if (error instanceof ProcessError && error.errno === 'ENOENT') {
        throw new ApplyError('ExecutableNotFound', `Package manager not found: ${command}`, {
          cause: error,
        });
      }
      if (error instanceof TimeoutError) {
        throw new ApplyError('InvocationFailed', `${command} configure did not finish: ${error.message}`, {
          cause: error,
        });
      }
      throw new ApplyError('InvocationFailed', `${command} configure failed to run: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (result.exitCode !== 0) {
      throw new ApplyError('InvocationFailed', `${command} configure exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        details: { stderr: result.stderr.slice(-2000) },
      });
    }
  }
}
