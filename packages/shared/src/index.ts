export const name = '@provisioner/shared';

export * from './types/events';
export * from './types/stages';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
