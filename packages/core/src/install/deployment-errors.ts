import type { InstallErrorKind } from '@provisioner/shared';

// AppX deployment HRESULTs, as printed by Add-AppxPackage.
const ALREADY_INSTALLED = new Set([
  '0x80073D06', // a higher version of this package is already installed
  '0x80073CFB', // same identity already installed with different contents
]);

const INVALID_PACKAGE = new Set([
  '0x80073CF0', // package could not be opened
  '0x80073CF1', // package was not found
  '0x80073CFD', // not applicable to this OS
]);

/** First deployment HRESULT mentioned in the installer output, upper-cased. */
export function findHResult(output: string): string | undefined {
  const match = /0x[0-9a-f]{8}/i.exec(output);
  return match ? `0x${match[0].slice(2).toUpperCase()}` : undefined;
}

export function classifyInstallFailure(output: string): InstallErrorKind {
  const hresults = (output.match(/0x[0-9a-f]{8}/gi) ?? []).map(
    (h) => `0x${h.slice(2).toUpperCase()}`,
  );
  if (hresults.some((h) => ALREADY_INSTALLED.has(h))) return 'AlreadyInstalledConflict';
  if (hresults.some((h) => INVALID_PACKAGE.has(h))) return 'InvalidPackage';
  return 'RegistrationRejected';
}
