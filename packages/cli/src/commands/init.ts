import { promises as fs } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { LOCAL_CONFIG_FILE } from '@provisioner/core';
import { atomicWrite, UsageError } from '@provisioner/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../options';

const TEMPLATE_URL = new URL('../../templates/provision.yaml', import.meta.url);

export async function readStarterConfig(): Promise<string> {
  return fs.readFile(TEMPLATE_URL, 'utf8');
}

/**
 * Writes the starter config into `dir`. Refuses to replace an existing file
 * unless `force` is set.
 */
export async function writeStarterConfig(dir: string, force = false): Promise<string> {
  const configPath = path.join(dir, LOCAL_CONFIG_FILE);
  if (!force) {
    const exists = await fs
      .access(configPath)
      .then(() => true)
      .catch(() => false);
    if (exists) {
      throw new UsageError(`${LOCAL_CONFIG_FILE} already exists at ${configPath}. Use --force to overwrite it.`);
    }
  }
  await atomicWrite(configPath, await readStarterConfig());
  return configPath;
}

export function registerInitCommand(program: Command) {
  program
    .command('init')
    .description(`Create a starter ${LOCAL_CONFIG_FILE} in the current directory`)
    .option('--force', 'Overwrite an existing file')
    .action(async (options: { force?: boolean }) => {
      const renderer = new OutputRenderer(!!program.opts<GlobalOptions>().json);
      const configPath = await writeStarterConfig(process.cwd(), !!options.force);

      renderer.log(`Created ${LOCAL_CONFIG_FILE} at ${configPath}`);
      renderer.log(`\nNext steps:`);
      renderer.log(`  1. Set configuration.url to your configuration document.`);
      renderer.log(`  2. Run 'provision doctor' to verify this machine.`);
      renderer.log(`  3. Run 'provision run' to provision it.`);
    });
}
