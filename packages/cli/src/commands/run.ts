import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader, createPipeline } from '@provisioner/core';
import { ConsoleLogger, JsonlLogger, type Logger } from '@provisioner/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../options';

interface RunOptions {
  workDir?: string;
  settleDelay?: number;
  acceptAgreements: boolean;
  logFile?: string;
}

function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    // reported by commander as a usage error
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return parsed;
}

/** Maps run flags onto the config file layout for ConfigLoader. */
export function runFlags(options: RunOptions): Record<string, unknown> {
  return {
    workingDir: options.workDir ? { root: path.resolve(options.workDir) } : undefined,
    settleDelayMs: options.settleDelay,
    configuration: options.acceptAgreements ? undefined : { acceptAgreements: false },
  };
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Bootstrap the package manager and apply the configuration document')
    .option('--work-dir <path>', 'Directory the working area is created in')
    .option('--settle-delay <ms>', 'Wait after the store service restore trigger', parseMilliseconds)
    .option('--no-accept-agreements', 'Do not pre-accept configuration and source agreements')
    .option('--log-file <path>', 'Append redacted run events to a JSONL file')
    .action(async (options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const json = !!globalOpts.json;
      const renderer = new OutputRenderer(json);

      const config = ConfigLoader.load({ configPath: globalOpts.config, flags: runFlags(options) });

      const consoleLogger = new ConsoleLogger({ verbose: !!globalOpts.verbose && !json, quiet: json });
      const logger: Logger = options.logFile
        ? new JsonlLogger(path.resolve(options.logFile), consoleLogger)
        : consoleLogger;

      const controller = new AbortController();
      const onInterrupt = () => {
        renderer.log('Interrupt received; stopping after the current stage.');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const report = await createPipeline(config, { logger, signal: controller.signal }).run();
        renderer.render(report);
        process.exitCode = report.exitCode;
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
