import { describe, it, expect } from 'vitest';
import {
  AppError,
  ApplyError,
  ConfigError,
  describeError,
  FetchError,
  InstallError,
  ProcessError,
  RestoreError,
  TimeoutError,
  UsageError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProcessError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('RestoreError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigError('c'), 'ConfigError'],
    [new UsageError('u'), 'UsageError'],
    [new TimeoutError('t'), 'TimeoutError'],
    [new RestoreError('r'), 'RestoreError'],
  ])('%s carries code %s', (error, code) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(code);
  });

  it('ProcessError carries errno', () => {
    const error = new ProcessError('spawn failed', { errno: 'ENOENT' });
    expect(error.code).toBe('ProcessError');
    expect(error.errno).toBe('ENOENT');
  });

  it('FetchError carries kind and HTTP status', () => {
    const error = new FetchError('HttpError', 'not found', { status: 404 });
    expect(error.code).toBe('FetchError');
    expect(error.kind).toBe('HttpError');
    expect(error.status).toBe(404);
  });

  it('InstallError and ApplyError carry their kind', () => {
    expect(new InstallError('AlreadyInstalledConflict', 'x').kind).toBe('AlreadyInstalledConflict');
    const apply = new ApplyError('InvocationFailed', 'exit 1', { exitCode: 1 });
    expect(apply.kind).toBe('InvocationFailed');
    expect(apply.exitCode).toBe(1);
  });
});

describe('describeError', () => {
  it('prefixes the kind of kinded errors', () => {
    expect(describeError(new FetchError('NetworkUnreachable', 'offline'))).toBe(
      'NetworkUnreachable: offline',
    );
  });

  it('uses the bare message for other errors', () => {
    expect(describeError(new RestoreError('trigger failed'))).toBe('trigger failed');
    expect(describeError(new Error('plain'))).toBe('plain');
  });

  it('stringifies non-errors', () => {
    expect(describeError('text')).toBe('text');
    expect(describeError(42)).toBe('42');
  });
});
