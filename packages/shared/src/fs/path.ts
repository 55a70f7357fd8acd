import path from 'node:path';
import os from 'node:os';

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}

/**
 * Rejects names that would escape the directory they are joined to.
 */
export function isPlainFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== '.' &&
    name !== '..' &&
    !name.includes('/') &&
    !name.includes('\\') &&
    path.basename(name) === name
  );
}

/**
 * Expands `%NAME%` references the way cmd.exe does: lookup is
 * case-insensitive and unknown names are left untouched.
 */
export function expandWindowsEnv(value: string, env: NodeJS.ProcessEnv): string {
  const lookup = new Map<string, string>();
  for (const [key, v] of Object.entries(env)) {
    if (v !== undefined) lookup.set(key.toUpperCase(), v);
  }
  return value.replace(/%([^%]+)%/g, (match: string, name: string) => {
    return lookup.get(name.toUpperCase()) ?? match;
  });
}
