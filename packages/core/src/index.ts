export const name = '@provisioner/core';

export * from './config/loader';
export * from './workspace/working-area';
export * from './fetch/fetcher';
export * from './install/command-template';
export * from './install/deployment-errors';
export * from './install/installer';
export * from './restore/restorer';
export * from './env/environment-source';
export * from './env/resolver';
export * from './apply/applier';
export * from './pipeline/plan';
export * from './pipeline/pipeline';
export * from './factory/create-pipeline';
