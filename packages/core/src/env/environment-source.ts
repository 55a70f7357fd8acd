import type { CommandRunner } from '@provisioner/exec';

export type EnvironmentScope = 'machine' | 'user';

/**
 * Reads the persisted (not process-inherited) PATH definition of a scope.
 * Returns undefined when the scope defines no PATH.
 */
export interface EnvironmentSource {
  readPath(scope: EnvironmentScope): Promise<string | undefined>;
}

export const REGISTRY_ENVIRONMENT_KEYS: Record<EnvironmentScope, string> = {
  machine: 'HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment',
  user: 'HKCU\\Environment',
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Extracts a string value from `reg query <key> /v <name>` output:
 *
 *     HKEY_CURRENT_USER\Environment
 *         Path    REG_EXPAND_SZ    %USERPROFILE%\AppData\Local\Microsoft\WindowsApps;
 */
export function parseRegQueryValue(output: string, valueName: string): string | undefined {
  const pattern = new RegExp(`^\\s+${escapeRegExp(valueName)}\\s+REG_(?:EXPAND_)?SZ(?:\\s+(.*))?$`, 'i');
  for (const line of output.split(/\r?\n/)) {
    const match = pattern.exec(line);
    if (match) {
      return (match[1] ?? '').trim();
    }
  }
  return undefined;
}

export class RegistryEnvironmentSource implements EnvironmentSource {
  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutMs = 15_000,
  ) {}

  async readPath(scope: EnvironmentScope): Promise<string | undefined> {
    const result = await this.runner.run({
      command: 'reg',
      args: ['query', REGISTRY_ENVIRONMENT_KEYS[scope], '/v', 'Path'],
      timeoutMs: this.timeoutMs,
    });
    // reg exits 1 when the value does not exist
    if (result.exitCode !== 0) {
      return undefined;
    }
    return parseRegQueryValue(result.stdout, 'Path');
  }
}
