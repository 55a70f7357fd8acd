import { describe, it, expect, vi } from 'vitest';
import type { CommandRunner } from '@provisioner/exec';
import { ProcessError, RestoreError } from '@provisioner/shared';
import { CommandServiceRestorer } from './restorer';

describe('CommandServiceRestorer', () => {
  it('launches the trigger without waiting for it to finish', async () => {
    const runner: CommandRunner = {
      run: vi.fn(),
      launch: vi.fn(async () => ({ pid: 42 })),
    };

    await new CommandServiceRestorer(runner).restore(['wsreset.exe', '-i']);

    expect(runner.launch).toHaveBeenCalledWith({ command: 'wsreset.exe', args: ['-i'] });
    expect(runner.run).not.toHaveBeenCalled();
  });

  it('wraps launch failures in RestoreError', async () => {
    const runner: CommandRunner = {
      run: vi.fn(),
      launch: vi.fn(async () => {
        throw new ProcessError('Failed to start wsreset.exe: spawn wsreset.exe ENOENT');
      }),
    };

    const promise = new CommandServiceRestorer(runner).restore(['wsreset.exe', '-i']);
    await expect(promise).rejects.toBeInstanceOf(RestoreError);
    await expect(promise).rejects.toThrow(
      'Restore trigger wsreset.exe could not be issued: Failed to start wsreset.exe: spawn wsreset.exe ENOENT',
    );
  });
});
