import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CommandResult, CommandRunner } from '@provisioner/exec';
import { ApplyError, ProcessError, TimeoutError } from '@provisioner/shared';
import { CommandConfigurationApplier, configureArgs } from './applier';

function ok(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, truncated: false, ...overrides };
}

describe('CommandConfigurationApplier', () => {
  let dir: string;
  let document: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provisioner-apply-'));
    document = path.join(dir, 'configuration.dsc.yaml');
    fs.writeFileSync(document, 'properties: {}\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('invokes configure with agreement flags and the refreshed PATH', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => ok());
    const applier = new CommandConfigurationApplier(
      { run, launch: vi.fn() },
      { env: { HOME: '/home/test', PATH: '/old' }, timeoutMs: 1000 },
    );

    await applier.apply({ kind: 'resolved', path: 'C:\\apps\\winget.exe' }, document, {
      acceptAgreements: true,
      searchPath: 'C:\\apps;C:\\Windows',
    });

    expect(run).toHaveBeenCalledWith({
      command: 'C:\\apps\\winget.exe',
      args: [
        'configure',
        '-f',
        document,
        '--accept-configuration-agreements',
        '--accept-source-agreements',
      ],
      env: { HOME: '/home/test', PATH: 'C:\\apps;C:\\Windows' },
      timeoutMs: 1000,
    });
  });

  it('uses the bare name for a fallback reference', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => ok());
    const applier = new CommandConfigurationApplier({ run, launch: vi.fn() }, { env: {} });

    await applier.apply({ kind: 'fallback', name: 'winget' }, document, { acceptAgreements: false });

    expect(run).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'winget', args: ['configure', '-f', document], env: {} }),
    );
  });

  it('fails with DocumentUnreadable without invoking anything', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => ok());
    const applier = new CommandConfigurationApplier({ run, launch: vi.fn() });

    await expect(
      applier.apply({ kind: 'fallback', name: 'winget' }, path.join(dir, 'missing.yaml'), {
        acceptAgreements: true,
      }),
    ).rejects.toMatchObject({ kind: 'DocumentUnreadable' });
    expect(run).not.toHaveBeenCalled();
  });

  it('maps ENOENT to ExecutableNotFound', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => {
      throw new ProcessError('Failed to start winget: spawn winget ENOENT', { errno: 'ENOENT' });
    });
    const applier = new CommandConfigurationApplier({ run, launch: vi.fn() });

    const promise = applier.apply({ kind: 'fallback', name: 'winget' }, document, {
      acceptAgreements: true,
    });
    await expect(promise).rejects.toBeInstanceOf(ApplyError);
    await expect(promise).rejects.toMatchObject({
      kind: 'ExecutableNotFound',
      message: 'Package manager not found: winget',
    });
  });

  it('maps a non-zero exit to InvocationFailed with the exit code', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => ok({ exitCode: -1978286075, stderr: 'unit failed' }));
    const applier = new CommandConfigurationApplier({ run, launch: vi.fn() });

    await expect(
      applier.apply({ kind: 'fallback', name: 'winget' }, document, { acceptAgreements: true }),
    ).rejects.toMatchObject({
      kind: 'InvocationFailed',
      exitCode: -1978286075,
      details: { stderr: 'unit failed' },
    });
  });

  it('maps a timeout to InvocationFailed without an exit code', async () => {
    const run = vi.fn<CommandRunner['run']>(async () => {
      throw new TimeoutError('winget timed out after 10ms');
    });
    const applier = new CommandConfigurationApplier({ run, launch: vi.fn() });

    const error = await applier
      .apply({ kind: 'fallback', name: 'winget' }, document, { acceptAgreements: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApplyError);
    expect(error).toMatchObject({ kind: 'InvocationFailed', exitCode: undefined });
  });
});

describe('configureArgs', () => {
  it('omits agreement flags when not accepting', () => {
    expect(configureArgs('c.yaml', false)).toEqual(['configure', '-f', 'c.yaml']);
  });
});
