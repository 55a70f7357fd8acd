import { describe, it, expect } from 'vitest';
import { ProvisionConfigSchema } from '@provisioner/shared';
import { CHECKS, checkCommands, checkExecutable, type Lookup } from './doctor';

const config = ProvisionConfigSchema.parse({
  artifacts: {
    framework: { url: 'https://downloads.test/a.appx' },
    uiFramework: { url: 'https://downloads.test/b.appx' },
    packageManager: { url: 'https://downloads.test/c.msixbundle' },
  },
  configuration: { url: 'https://config.test/config.yaml' },
});

function finds(found: Record<string, string>): Lookup {
  return async (name) => {
    const hit = found[name];
    if (!hit) throw new Error(`not found: ${name}`);
    return hit;
  };
}

describe('doctor checks', () => {
  it('reports where an executable was found', async () => {
    const lookup = finds({ 'wsreset.exe': 'C:\\Windows\\System32\\wsreset.exe' });

    await expect(checkExecutable('wsreset.exe', CHECKS.FAIL, lookup)).resolves.toEqual([
      CHECKS.OK,
      'wsreset.exe found at: C:\\Windows\\System32\\wsreset.exe',
    ]);
  });

  it('checks the install shell, restore trigger and package manager', async () => {
    const lookup = finds({
      'powershell.exe': 'C:\\Windows\\System32\\WindowsPowerShell\\v1.0\\powershell.exe',
    });

    await expect(checkCommands(config, lookup)).resolves.toEqual([
      [CHECKS.OK, 'powershell.exe found at: C:\\Windows\\System32\\WindowsPowerShell\\v1.0\\powershell.exe'],
      [CHECKS.FAIL, 'wsreset.exe not found in PATH.'],
      [CHECKS.WARN, 'winget not found in PATH.'],
    ]);
  });
});
