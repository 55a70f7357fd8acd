import path from 'path';
import fse from 'fs-extra';
import type { CommandResult, CommandRunner } from '@provisioner/exec';
import { describeError, InstallError, type Logger } from '@provisioner/shared';
import { expandCommand } from './command-template';
import { classifyInstallFailure, findHResult } from './deployment-errors';

/**
 * Registers one downloaded package with the OS. Callers invoke it once per
 * package, in dependency order.
 */
export interface PackageInstaller {
  install(packagePath: string): Promise<void>;
}

export interface CommandPackageInstallerOptions {
  /** Install command template; `{path}` is replaced by the package path. */
  command: string[];
  timeoutMs?: number;
  logger?: Logger;
}

const OUTPUT_TAIL_CHARS = 2000;

export class CommandPackageInstaller implements PackageInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CommandPackageInstallerOptions,
  ) {}

  async install(packagePath: string): Promise<void> {
    const packageName = path.basename(packagePath);

    if (!(await fse.pathExists(packagePath))) {
      throw new InstallError('InvalidPackage', `Package file not found: ${packagePath}`);
    }

    const { command, args } = expandCommand(this.options.command, { path: packagePath });
    await this.options.logger?.debug(`Registering ${packageName} via ${command}`);

    let result: CommandResult;
    try {
      result = await this.runner.run({ command, args, timeoutMs: this.options.timeoutMs });
    } catch (error) {
      throw new InstallError(
        'RegistrationRejected',
        `Could not register ${packageName}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (result.exitCode === 0) {
      return;
    }

    const output = `${result.stdout}\n${result.stderr}`.trim();
    const hresult = findHResult(output);
    const kind = classifyInstallFailure(output);
    throw new InstallError(
      kind,
      `${packageName} was not registered (exit code ${result.exitCode}${hresult ? `, ${hresult}` : ''})`,
      {
        details: {
          exitCode: result.exitCode,
          hresult,
          output: output.slice(-OUTPUT_TAIL_CHARS),
        },
      },
    );
  }
}
