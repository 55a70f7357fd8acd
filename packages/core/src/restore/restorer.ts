import type { CommandRunner } from '@provisioner/exec';
import { describeError, RestoreError, type Logger } from '@provisioner/shared';
import { expandCommand } from '../install/command-template';

/**
 * Issues a reinitialization trigger to an OS-managed service. Completion is
 * asynchronous and not observable; the caller owns any settle delay.
 */
export interface ServiceRestorer {
  restore(trigger: string[]): Promise<void>;
}

export class CommandServiceRestorer implements ServiceRestorer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger?: Logger,
  ) {}

  async restore(trigger: string[]): Promise<void> {
    const { command, args } = expandCommand(trigger, {});
    try {
      const { pid } = await this.runner.launch({ command, args });
      await this.logger?.debug(`Launched ${[command, ...args].join(' ')} (pid ${pid ?? 'unknown'})`);
    } catch (error) {
      throw new RestoreError(`Restore trigger ${command} could not be issued: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
