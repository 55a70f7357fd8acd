/**
 * Stages of a provisioning run, in execution order.
 */
export const STAGE_ORDER = [
  'init',
  'cleanup-pre',
  'bootstrap',
  'service-restore',
  'env-refresh',
  'config-apply',
  'cleanup-post',
] as const;

export type StageId = (typeof STAGE_ORDER)[number];

export type StageOutcome = 'success' | 'failure' | 'skipped';

/** Fatal stops the run with exit code 1, warning only degrades the report. */
export type StageSeverity = 'fatal' | 'warning';

export interface StageResult {
  stage: StageId;
  outcome: StageOutcome;
  severity?: StageSeverity;
  /** Human-readable cause or note (stage name is implied by `stage`) */
  diagnostic?: string;
  durationMs: number;
}

/**
 * A remote file the pipeline retrieves into the working area.
 */
export interface Artifact {
  readonly name: string;
  readonly url: string;
  readonly destination: string;
}

/**
 * How the package manager will be invoked: an absolute path found on disk,
 * or a bare command name left to OS lookup.
 */
export type ExecutableRef =
  | { readonly kind: 'resolved'; readonly path: string }
  | { readonly kind: 'fallback'; readonly name: string };

/**
 * Outcome of recomputing installation-dependent lookup state.
 * `searchPath` is the merged PATH value to hand to child processes.
 */
export type Resolution =
  | { readonly kind: 'resolved'; readonly path: string; readonly searchPath: string }
  | { readonly kind: 'absent'; readonly reason: string; readonly searchPath: string };

export type RunClassification = 'success' | 'fatal' | 'cancelled';

export interface ProvisionReport {
  runId: string;
  classification: RunClassification;
  exitCode: number;
  stages: StageResult[];
  warnings: string[];
  fatal?: { stage: StageId; message: string };
  workingArea: string;
  executable?: ExecutableRef;
}
