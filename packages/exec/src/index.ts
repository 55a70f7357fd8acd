export const name = '@provisioner/exec';

export * from './runner/runner';
