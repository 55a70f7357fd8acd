import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CommandRunner, CommandResult } from '@provisioner/exec';
import { InstallError, ProcessError } from '@provisioner/shared';
import { CommandPackageInstaller } from './installer';
import { classifyInstallFailure, findHResult } from './deployment-errors';
import { expandCommand } from './command-template';

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, truncated: false, ...overrides };
}

function fakeRunner(run: CommandRunner['run']): CommandRunner {
  return { run: vi.fn(run), launch: vi.fn(async () => ({})) };
}

const TEMPLATE = ['powershell.exe', '-Command', "Add-AppxPackage -Path '{path}'"];

describe('CommandPackageInstaller', () => {
  let dir: string;
  let packagePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provisioner-install-'));
    packagePath = path.join(dir, 'Microsoft.UI.Xaml.x64.appx');
    fs.writeFileSync(packagePath, 'pk');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('invokes the install command with the package path substituted', async () => {
    const runner = fakeRunner(async () => result());
    const installer = new CommandPackageInstaller(runner, { command: TEMPLATE, timeoutMs: 500 });

    await installer.install(packagePath);

    expect(runner.run).toHaveBeenCalledWith({
      command: 'powershell.exe',
      args: ['-Command', `Add-AppxPackage -Path '${packagePath}'`],
      timeoutMs: 500,
    });
  });

  it('fails with InvalidPackage before invoking anything when the file is missing', async () => {
    const runner = fakeRunner(async () => result());
    const installer = new CommandPackageInstaller(runner, { command: TEMPLATE });

    await expect(installer.install(path.join(dir, 'absent.appx'))).rejects.toMatchObject({
      kind: 'InvalidPackage',
    });
    expect(runner.run).not.toHaveBeenCalled();
  });

  it('reports an already-installed package as AlreadyInstalledConflict', async () => {
    const runner = fakeRunner(async () =>
      result({
        exitCode: 1,
        stderr:
          'Add-AppxPackage : Deployment failed with HRESULT: 0x80073D06, The package could not be installed because a higher version of this package is already installed.',
      }),
    );
    const installer = new CommandPackageInstaller(runner, { command: TEMPLATE });

    const promise = installer.install(packagePath);
    await expect(promise).rejects.toBeInstanceOf(InstallError);
    await expect(promise).rejects.toMatchObject({
      kind: 'AlreadyInstalledConflict',
      message: 'Microsoft.UI.Xaml.x64.appx was not registered (exit code 1, 0x80073D06)',
    });
  });

  it('reports other deployment failures as RegistrationRejected', async () => {
    const runner = fakeRunner(async () =>
      result({ exitCode: 1, stderr: 'Deployment failed with HRESULT: 0x80073CF3' }),
    );
    const installer = new CommandPackageInstaller(runner, { command: TEMPLATE });

    await expect(installer.install(packagePath)).rejects.toMatchObject({
      kind: 'RegistrationRejected',
      details: { exitCode: 1, hresult: '0x80073CF3' },
    });
  });

  it('maps a launch failure of the install command to RegistrationRejected', async () => {
    const runner = fakeRunner(async () => {
      throw new ProcessError('Failed to start powershell.exe: spawn ENOENT', { errno: 'ENOENT' });
    });
    const installer = new CommandPackageInstaller(runner, { command: TEMPLATE });

    await expect(installer.install(packagePath)).rejects.toMatchObject({
      kind: 'RegistrationRejected',
      message:
        'Could not register Microsoft.UI.Xaml.x64.appx: Failed to start powershell.exe: spawn ENOENT',
    });
  });
});

describe('deployment error classification', () => {
  it('recognises conflict, invalid and unknown HRESULTs', () => {
    expect(classifyInstallFailure('HRESULT: 0x80073cfb')).toBe('AlreadyInstalledConflict');
    expect(classifyInstallFailure('HRESULT: 0x80073CF0')).toBe('InvalidPackage');
    expect(classifyInstallFailure('HRESULT: 0x80070005')).toBe('RegistrationRejected');
    expect(classifyInstallFailure('no code at all')).toBe('RegistrationRejected');
  });

  it('prefers a conflict code when several are present', () => {
    expect(classifyInstallFailure('0x80073CF0 then 0x80073D06')).toBe('AlreadyInstalledConflict');
  });

  it('extracts the first HRESULT upper-cased', () => {
    expect(findHResult('failed: 0x80073cf3 (and 0x80070005)')).toBe('0x80073CF3');
    expect(findHResult('clean output')).toBeUndefined();
  });
});

describe('expandCommand', () => {
  it('substitutes known placeholders and keeps unknown ones', () => {
    expect(expandCommand(['tool', '--in={path}', '{other}'], { path: 'C:\\a.appx' })).toEqual({
      command: 'tool',
      args: ['--in=C:\\a.appx', '{other}'],
    });
  });
});
