import fs from 'fs';
import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { AppError, ConfigError, UsageError } from '@provisioner/shared';
import { registerDoctorCommand } from './commands/doctor';
import { registerInitCommand } from './commands/init';
import { registerRunCommand } from './commands/run';
import type { GlobalOptions } from './options';

export const EXIT_USAGE = 2;

function readVersion(): string {
  const parsed: unknown = JSON.parse(
    fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return String(parsed.version);
  }
  return '0.0.0';
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();
  if (output) {
    program.configureOutput(output);
  }

  program
    .name('provision')
    .description('Unattended package manager bootstrap and configuration apply')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerRunCommand(program);
  registerDoctorCommand(program);
  registerInitCommand(program);

  return program;
}

/**
 * Prints an error that escaped a command and returns the process exit code.
 * Commander has already printed its own usage errors.
 */
export function handleCliError(e: unknown, opts: GlobalOptions): number {
  if (e instanceof CommanderError) {
    return e.exitCode === 0 ? 0 : EXIT_USAGE;
  }

  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return e instanceof ConfigError || e instanceof UsageError ? EXIT_USAGE : 1;
}
