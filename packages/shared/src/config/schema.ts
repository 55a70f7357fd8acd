import os from 'node:os';
import { z } from 'zod';
import { isPlainFileName } from '../fs/path';

const FileNameSchema = z
  .string()
  .refine(isPlainFileName, { message: 'must be a plain file name without directory parts' });

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const CommandSchema = z.array(z.string().min(1)).min(1);

/**
 * A remote file and the name it gets inside the working area.
 */
export const ArtifactSourceSchema = z.object({
  url: HttpUrlSchema,
  fileName: FileNameSchema,
});

export const ArtifactsConfigSchema = z.object({
  framework: ArtifactSourceSchema.extend({
    fileName: FileNameSchema.default('Microsoft.VCLibs.x64.14.00.Desktop.appx'),
  }),
  uiFramework: ArtifactSourceSchema.extend({
    fileName: FileNameSchema.default('Microsoft.UI.Xaml.x64.appx'),
  }),
  packageManager: ArtifactSourceSchema.extend({
    fileName: FileNameSchema.default('Microsoft.DesktopAppInstaller.msixbundle'),
  }),
});

export const ConfigurationDocumentSchema = ArtifactSourceSchema.extend({
  fileName: FileNameSchema.default('configuration.dsc.yaml'),
  /** Pre-accept configuration and source agreements so the call never prompts. */
  acceptAgreements: z.boolean().default(true),
});

export const WorkingDirConfigSchema = z
  .object({
    root: z.string().min(1).default(os.tmpdir()),
    name: FileNameSchema.default('provisioner-work'),
  })
  .default({});

export const CommandsConfigSchema = z
  .object({
    /** Install command; `{path}` is replaced by the package path. */
    install: CommandSchema.default([
      'powershell.exe',
      '-NoProfile',
      '-NonInteractive',
      '-Command',
      "$ErrorActionPreference = 'Stop'; Add-AppxPackage -Path '{path}'",
    ]),
    /** Fire-and-forget trigger that reinitializes the Store service. */
    restore: CommandSchema.default(['wsreset.exe', '-i']),
    /** Bare name of the package manager executable. */
    packageManager: z.string().min(1).default('winget'),
  })
  .default({});

export const ResolverConfigSchema = z
  .object({
    /** Where App Installer drops its execution alias; `%VAR%` references are expanded. */
    conventionalDir: z.string().min(1).default('%LOCALAPPDATA%\\Microsoft\\WindowsApps'),
  })
  .default({});

/**
 * Bounded timeouts in milliseconds. `0` disables a timeout.
 */
export const TimeoutsConfigSchema = z
  .object({
    fetchMs: z.number().int().min(0).default(300_000),
    installMs: z.number().int().min(0).default(600_000),
    applyMs: z.number().int().min(0).default(0),
  })
  .default({});

export const ProvisionConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  workingDir: WorkingDirConfigSchema,
  artifacts: ArtifactsConfigSchema,
  configuration: ConfigurationDocumentSchema,
  commands: CommandsConfigSchema,
  resolver: ResolverConfigSchema,
  /** Fixed wait after the restore trigger; the service exposes no ready signal. */
  settleDelayMs: z.number().int().min(0).default(10_000),
  timeouts: TimeoutsConfigSchema,
});

export type ArtifactSource = z.infer<typeof ArtifactSourceSchema>;
export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
/** Config as written by users, before defaults are applied. */
export type ProvisionConfigInput = z.input<typeof ProvisionConfigSchema>;
