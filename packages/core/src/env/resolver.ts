import path from 'path';
import fse from 'fs-extra';
import which from 'which';
import {
  describeError,
  expandWindowsEnv,
  type Logger,
  type Resolution,
} from '@provisioner/shared';
import type { EnvironmentScope, EnvironmentSource } from './environment-source';

export interface EnvironmentResolverOptions {
  source: EnvironmentSource;
  /** Bare executable name, without extension. */
  executableName: string;
  /** Directory the installer is expected to place the executable in; `%VAR%` references are expanded. */
  conventionalDir: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

const SCOPES: EnvironmentScope[] = ['machine', 'user'];

/**
 * Recomputes the PATH a fresh session would see (machine, then user, then
 * whatever the current process already had) and locates the package manager
 * with it. Nothing in `process.env` is modified; callers pass `searchPath`
 * on to the processes they start.
 */
export class EnvironmentResolver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;

  constructor(private readonly options: EnvironmentResolverOptions) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  private get isWindows(): boolean {
    return this.platform === 'win32';
  }

  private get delimiter(): string {
    return this.isWindows ? ';' : ':';
  }

  async resolve(): Promise<Resolution> {
    const searchPath = await this.computeSearchPath();
    const pathApi = this.isWindows ? path.win32 : path.posix;
    const fileName = this.isWindows
      ? `${this.options.executableName}.exe`
      : this.options.executableName;

    const conventional = pathApi.join(
      expandWindowsEnv(this.options.conventionalDir, this.env),
      fileName,
    );
    if (await fse.pathExists(conventional)) {
      return { kind: 'resolved', path: conventional, searchPath };
    }

    const found = await which(this.options.executableName, {
      path: searchPath,
      delimiter: this.delimiter,
      nothrow: true,
    });
    if (found) {
      return { kind: 'resolved', path: found, searchPath };
    }

    return {
      kind: 'absent',
      reason: `${fileName} not found at ${conventional} or on the refreshed PATH`,
      searchPath,
    };
  }

  async computeSearchPath(): Promise<string> {
    const entries: string[] = [];
    for (const scope of SCOPES) {
      let value: string | undefined;
      try {
        value = await this.options.source.readPath(scope);
      } catch (error) {
        await this.options.logger?.debug(
          `Could not read ${scope} PATH definition: ${describeError(error)}`,
        );
        continue;
      }
      if (value) {
        entries.push(...this.split(expandWindowsEnv(value, this.env)));
      }
    }
    entries.push(...this.split(this.env.PATH ?? this.env.Path ?? ''));
    return this.dedupe(entries).join(this.delimiter);
  }

  private split(value: string): string[] {
    return value
      .split(this.delimiter)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  private dedupe(entries: string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const entry of entries) {
      const key = this.isWindows ? entry.toLowerCase().replace(/[\\/]+$/, '') : entry;
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(entry);
    }
    return result;
  }
}
