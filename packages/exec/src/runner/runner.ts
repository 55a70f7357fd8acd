import { spawn, spawnSync } from 'child_process';
import { isWindows, ProcessError, TimeoutError } from '@provisioner/shared';

const DEFAULT_MAX_OUTPUT_BYTES = 1_000_000;

function killProcessTree(pid: number, signal: NodeJS.Signals | number = 'SIGTERM') {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // Negative PID signals the whole process group (child was spawned detached).
    try {
      process.kill(-pid, signal);
    } catch {
      // Already exited.
    }
  }
}

function errnoOf(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  /** Full environment for the child; defaults to the current process environment. */
  env?: NodeJS.ProcessEnv;
  /** Kill the process tree after this many milliseconds. `0` or unset disables. */
  timeoutMs?: number;
  /** Combined stdout + stderr bytes kept in the result. */
  maxOutputBytes?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  truncated: boolean;
}

export interface LaunchRequest {
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
}

export interface LaunchResult {
  pid?: number;
}

/**
 * Process invocation seam. Stage components depend on this interface only,
 * so tests can substitute a recording fake.
 */
export interface CommandRunner {
  /** Runs to completion and captures output. Rejects only when the process cannot be started or times out. */
  run(req: CommandRequest): Promise<CommandResult>;
  /** Starts a detached process and returns as soon as it has spawned. */
  launch(req: LaunchRequest): Promise<LaunchResult>;
}

export class ProcessRunner implements CommandRunner {
  async run(req: CommandRequest): Promise<CommandResult> {
    const maxOutputBytes = req.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let outputBytes = 0;
    let truncated = false;

    const start = Date.now();
    let timeoutTimer: NodeJS.Timeout | undefined;

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(req.command, req.args, {
        cwd: req.cwd,
        env: req.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows(),
        windowsHide: true,
      });

      const collect = (target: Buffer[]) => (chunk: Buffer) => {
        if (truncated) return;
        const remaining = maxOutputBytes - outputBytes;
        if (chunk.length > remaining) {
          truncated = true;
          target.push(chunk.subarray(0, Math.max(0, remaining)));
          outputBytes = maxOutputBytes;
          return;
        }
        outputBytes += chunk.length;
        target.push(chunk);
      };

      if (req.timeoutMs && req.timeoutMs > 0) {
        const timeoutMs = req.timeoutMs;
        timeoutTimer = setTimeout(() => {
          if (settled) return;
          settled = true;
          if (child.pid) {
            killProcessTree(child.pid, 'SIGTERM');
          }
          reject(
            new TimeoutError(`${req.command} timed out after ${timeoutMs}ms`, {
              details: {
                partialStdout: Buffer.concat(stdoutChunks).toString('utf8').slice(0, 1000),
                partialStderr: Buffer.concat(stderrChunks).toString('utf8').slice(0, 1000),
              },
            }),
          );
        }, timeoutMs);
      }

      child.stdout?.on('data', collect(stdoutChunks));
      child.stderr?.on('data', collect(stderrChunks));

      child.on('error', (err) => {
        clearTimeout(timeoutTimer);
        if (settled) return;
        settled = true;
        reject(
          new ProcessError(`Failed to start ${req.command}: ${err.message}`, {
            cause: err,
            errno: errnoOf(err),
          }),
        );
      });

      child.on('close', (code) => {
        clearTimeout(timeoutTimer);
        if (settled) return;
        settled = true;
        resolve({
          exitCode: code ?? -1,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
          durationMs: Date.now() - start,
          truncated,
        });
      });
    });
  }

  async launch(req: LaunchRequest): Promise<LaunchResult> {
    return new Promise<LaunchResult>((resolve, reject) => {
      const child = spawn(req.command, req.args, {
        env: req.env ?? process.env,
        stdio: 'ignore',
        detached: true,
        windowsHide: true,
      });

      child.once('spawn', () => {
        child.unref();
        resolve({ pid: child.pid });
      });

      child.once('error', (err) => {
        reject(
          new ProcessError(`Failed to start ${req.command}: ${err.message}`, {
            cause: err,
            errno: errnoOf(err),
          }),
        );
      });
    });
  }
}
