import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { UsageError } from '@provisioner/shared';
import { WorkingArea } from './working-area';

describe('WorkingArea', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'provisioner-wa-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('destroys stale contents on reset', async () => {
    const area = new WorkingArea(root, 'work');
    fs.mkdirSync(path.join(root, 'work', 'nested'), { recursive: true });
    fs.writeFileSync(path.join(root, 'work', 'nested', 'stale.appx'), 'old');

    await area.reset();

    expect(fs.readdirSync(area.path)).toEqual([]);
  });

  it('removes the directory on release and tolerates a second release', async () => {
    const area = new WorkingArea(root, 'work');
    await area.reset();
    fs.writeFileSync(area.resolve('a.appx'), 'x');

    await area.release();
    expect(await area.exists()).toBe(false);
    await expect(area.release()).resolves.toBeUndefined();
  });

  it('refuses an area another live run owns and leaves its files alone', async () => {
    const first = new WorkingArea(root, 'work');
    const second = new WorkingArea(root, 'work');
    await first.reset();
    fs.writeFileSync(first.resolve('a.appx'), 'x');

    await expect(second.reset()).rejects.toThrow(
      `Working area ${path.join(root, 'work')} is in use by process ${process.pid}`,
    );
    await second.release();

    expect(fs.readFileSync(first.resolve('a.appx'), 'utf8')).toBe('x');
    await first.release();
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it('takes over a lock left by a process that no longer exists', async () => {
    fs.writeFileSync(path.join(root, 'work.lock'), 'not-a-pid');
    const area = new WorkingArea(root, 'work');

    await area.reset();

    expect(fs.readFileSync(path.join(root, 'work.lock'), 'utf8')).toBe(String(process.pid));
    await area.release();
    expect(fs.existsSync(path.join(root, 'work.lock'))).toBe(false);
  });

  it('does not remove an area it never acquired', async () => {
    fs.mkdirSync(path.join(root, 'work'));

    await new WorkingArea(root, 'work').release();

    expect(fs.existsSync(path.join(root, 'work'))).toBe(true);
  });

  it('resolves file names inside the area', () => {
    const area = new WorkingArea(root, 'work');
    expect(area.resolve('configuration.dsc.yaml')).toBe(
      path.join(root, 'work', 'configuration.dsc.yaml'),
    );
  });

  it('rejects names that would escape the area', () => {
    const area = new WorkingArea(root, 'work');
    expect(() => area.resolve('../outside.appx')).toThrow(UsageError);
    expect(() => new WorkingArea(root, '..')).toThrow(UsageError);
  });
});
