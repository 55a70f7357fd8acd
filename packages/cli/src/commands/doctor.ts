import { Command } from 'commander';
import which from 'which';
import chalk from 'chalk';
import { ConfigLoader } from '@provisioner/core';
import { describeError, isWindows, type ProvisionConfig } from '@provisioner/shared';
import type { GlobalOptions } from '../options';

export const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

export type CheckResult = [string, string];

export type Lookup = (name: string) => Promise<string>;

const lookupOnPath: Lookup = (name) => which(name);

export async function checkExecutable(
  name: string,
  missing = CHECKS.FAIL,
  lookup: Lookup = lookupOnPath,
): Promise<CheckResult> {
  try {
    const path = await lookup(name);
    return [CHECKS.OK, `${name} found at: ${path}`];
  } catch {
    return [missing, `${name} not found in PATH.`];
  }
}

export function checkPlatform(): CheckResult {
  if (isWindows()) {
    return [CHECKS.OK, 'Running on Windows.'];
  }
  return [
    CHECKS.WARN,
    `Running on ${process.platform}. Package registration and the store service only exist on Windows.`,
  ];
}

export async function checkCommands(
  config: ProvisionConfig,
  lookup: Lookup = lookupOnPath,
): Promise<CheckResult[]> {
  const [installShell] = config.commands.install;
  const [restoreTrigger] = config.commands.restore;
  const results: CheckResult[] = [];
  if (installShell) results.push(await checkExecutable(installShell, CHECKS.FAIL, lookup));
  if (restoreTrigger) results.push(await checkExecutable(restoreTrigger, CHECKS.FAIL, lookup));
  // Installed by the bootstrap stage, so its absence is expected on a fresh image.
  results.push(await checkExecutable(config.commands.packageManager, CHECKS.WARN, lookup));
  return results;
}

export function registerDoctorCommand(program: Command) {
  program
    .command('doctor')
    .description('Run checks to diagnose issues with the environment.')
    .action(async () => {
      console.log(chalk.bold('Provisioner Environment Checkup'));

      const results: CheckResult[] = [];

      console.log('---------------------------------');
      results.push(checkPlatform());

      try {
        const globalOpts = program.opts<GlobalOptions>();
        const config = ConfigLoader.load({ configPath: globalOpts.config });
        results.push([CHECKS.OK, 'Configuration is valid.']);
        results.push(...(await checkCommands(config)));
      } catch (error: unknown) {
        results.push([CHECKS.FAIL, `Failed to load configuration: ${describeError(error)}`]);
      }

      results.forEach(([status, message]) => {
        console.log(`${status} ${message}`);
      });

      console.log('---------------------------------');

      const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
      if (hasFailures) {
        console.log(
          chalk.red.bold('Doctor checks failed.') +
            ' Please resolve the issues marked with ' +
            CHECKS.FAIL,
        );
        process.exitCode = 1;
      } else {
        console.log(chalk.green.bold('All checks passed. This machine is ready to provision.'));
      }
    });
}
