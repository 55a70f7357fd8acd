import path from 'path';
import fse from 'fs-extra';
import { isPlainFileName, UsageError } from '@provisioner/shared';

/**
 * The single scratch directory a run downloads into. The name is
 * deterministic, so a directory left behind by a crashed run is found and
 * destroyed by the next `reset()` rather than reused.
 *
 * A `<name>.lock` file beside the directory records the owning process id.
 * `reset()` refuses an area whose owner is still alive, so two concurrent
 * runs configured with the same root and name cannot wipe each other's
 * downloads. A lock left by a process that no longer exists is taken over.
 */
export class WorkingArea {
  readonly path: string;
  private readonly lockPath: string;
  private held = false;

  constructor(root: string, name: string) {
    if (!isPlainFileName(name)) {
      throw new UsageError(`Working area name must be a plain directory name: ${name}`);
    }
    this.path = path.resolve(root, name);
    this.lockPath = `${this.path}.lock`;
  }

  /** Takes ownership, destroys any previous contents and recreates the directory empty. */
  async reset(): Promise<void> {
    await this.acquire();
    await fse.remove(this.path);
    await fse.ensureDir(this.path);
  }

  /**
   * Removes the directory recursively and gives up ownership. An area this
   * instance never acquired is left untouched.
   */
  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    try {
      await fse.remove(this.path);
    } finally {
      await fse.remove(this.lockPath);
      this.held = false;
    }
  }

  async exists(): Promise<boolean> {
    return fse.pathExists(this.path);
  }

  /** Absolute path of a file directly inside the working area. */
  resolve(fileName: string): string {
    if (!isPlainFileName(fileName)) {
      throw new UsageError(`Artifact file name must not contain directory parts: ${fileName}`);
    }
    return path.join(this.path, fileName);
  }

  private async acquire(): Promise<void> {
    if (this.held) {
      return;
    }
    await fse.ensureDir(path.dirname(this.path));
    const pid = String(process.pid);
    try {
      await fse.writeFile(this.lockPath, pid, { flag: 'wx' });
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        throw error;
      }
      const owner = Number.parseInt(await fse.readFile(this.lockPath, 'utf8'), 10);
      if (isProcessAlive(owner)) {
        throw new UsageError(`Working area ${this.path} is in use by process ${owner}`, {
          details: { lockPath: this.lockPath, owner },
        });
      }
      await fse.writeFile(this.lockPath, pid);
    }
    this.held = true;
  }
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errnoCode(error) === 'EPERM';
  }
}
