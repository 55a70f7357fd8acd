import { randomUUID } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import {
  describeError,
  EVENT_SCHEMA_VERSION,
  InstallError,
  type ExecutableRef,
  type Logger,
  type ProvisionConfig,
  type ProvisionEvent,
  type ProvisionReport,
  type Resolution,
  type StageId,
  type StageResult,
  type StageSeverity,
} from '@provisioner/shared';
import type { ArtifactFetcher } from '../fetch/fetcher';
import type { PackageInstaller } from '../install/installer';
import type { ServiceRestorer } from '../restore/restorer';
import type { ConfigurationApplier } from '../apply/applier';
import { WorkingArea } from '../workspace/working-area';
import { buildPlan, type ProvisionPlan } from './plan';

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_CANCELLED = 130;

export interface PipelineComponents {
  fetcher: ArtifactFetcher;
  installer: PackageInstaller;
  restorer: ServiceRestorer;
  resolver: { resolve(): Promise<Resolution> };
  applier: ConfigurationApplier;
}

export interface PipelineOptions {
  logger: Logger;
  runId?: string;
  /** Settle delay implementation; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
  /** Checked at every stage boundary. */
  signal?: AbortSignal;
  /** Defaults to the area named by `config.workingDir`. */
  workingArea?: WorkingArea;
}

/** What a stage body reports besides plain success. */
interface StageNote {
  diagnostic?: string;
  /** Stage completed but something deserves a warning. */
  warnings?: string[];
}

/** An event without the envelope fields `emit` fills in. */
type EventBody<E> = E extends ProvisionEvent ? Omit<E, 'schemaVersion' | 'timestamp' | 'runId'> : never;

interface RunState {
  runId: string;
  stages: StageResult[];
  warnings: string[];
  fatal?: { stage: StageId; message: string };
  cancelled: boolean;
  executable?: ExecutableRef;
  searchPath?: string;
}

const STAGE_LABELS: Record<StageId, string> = {
  init: 'Init',
  'cleanup-pre': 'Cleanup (pre)',
  bootstrap: 'Bootstrap',
  'service-restore': 'Service restore',
  'env-refresh': 'Environment refresh',
  'config-apply': 'Configuration apply',
  'cleanup-post': 'Cleanup (post)',
};

export function stageLabel(stage: StageId): string {
  return STAGE_LABELS[stage];
}

/**
 * Sequences one provisioning run:
 * Init → Cleanup(pre) → Bootstrap → ServiceRestore → EnvRefresh → ConfigApply → Cleanup(post).
 *
 * Only Cleanup(pre) and Bootstrap are fatal. Every other failure is recorded
 * as a warning and the run moves on. Cleanup(post) runs on every path.
 */
export class ProvisioningPipeline {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ProvisionConfig,
    private readonly components: PipelineComponents,
    private readonly options: PipelineOptions,
  ) {
    this.logger = options.logger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Runs every stage and returns the report. Throws only when the
   * configuration is rejected at Init, before anything touches the disk.
   */
  async run(): Promise<ProvisionReport> {
    const state: RunState = {
      runId: this.options.runId ?? randomUUID(),
      stages: [],
      warnings: [],
      cancelled: false,
    };

    const initStart = Date.now();
    const area =
      this.options.workingArea ??
      new WorkingArea(this.config.workingDir.root, this.config.workingDir.name);
    const plan = buildPlan(this.config, area);
    state.stages.push({ stage: 'init', outcome: 'success', durationMs: Date.now() - initStart });

    await this.emit(state, {
      type: 'RunStarted',
      payload: {
        workingArea: area.path,
        artifacts: [...plan.bootstrap, plan.configuration].map(({ name, url }) => ({ name, url })),
      },
    });

    try {
      await this.stage(state, 'cleanup-pre', 'fatal', async () => {
        await area.reset();
        return {};
      });
      await this.stage(state, 'bootstrap', 'fatal', () => this.bootstrap(plan));
      await this.stage(state, 'service-restore', 'warning', () => this.restoreService());
      await this.stage(state, 'env-refresh', 'warning', () => this.refreshEnvironment(state));
      await this.stage(state, 'config-apply', 'warning', () => this.applyConfiguration(state, plan));
    } finally {
      // Cleanup(post) is never skipped, whatever happened above.
      await this.stage(
        state,
        'cleanup-post',
        'warning',
        async () => {
          await area.release();
          return {};
        },
        { always: true },
      );
    }

    const classification = state.fatal ? 'fatal' : state.cancelled ? 'cancelled' : 'success';
    const exitCode =
      classification === 'fatal'
        ? EXIT_FATAL
        : classification === 'cancelled'
          ? EXIT_CANCELLED
          : EXIT_SUCCESS;

    await this.emit(state, {
      type: 'RunFinished',
      payload: { classification, exitCode, warningCount: state.warnings.length },
    });

    return {
      runId: state.runId,
      classification,
      exitCode,
      stages: state.stages,
      warnings: state.warnings,
      fatal: state.fatal,
      workingArea: area.path,
      executable: state.executable,
    };
  }

  private async bootstrap(plan: ProvisionPlan): Promise<StageNote> {
    const stageLogger = this.logger.child({ stage: 'bootstrap' });

    for (const artifact of plan.bootstrap) {
      await stageLogger.info(`Fetching ${artifact.name}`);
      await this.components.fetcher.fetch(artifact.url, artifact.destination);
    }

    const warnings: string[] = [];
    for (const artifact of plan.bootstrap) {
      await stageLogger.info(`Installing ${artifact.name}`);
      try {
        await this.components.installer.install(artifact.destination);
      } catch (error) {
        if (error instanceof InstallError && error.kind === 'AlreadyInstalledConflict') {
          warnings.push(`${artifact.name} is already installed: ${error.message}`);
          continue;
        }
        throw error;
      }
    }
    return { warnings };
  }

  private async restoreService(): Promise<StageNote> {
    await this.components.restorer.restore(this.config.commands.restore);
    if (this.config.settleDelayMs > 0) {
      await this.logger.info(`Waiting ${this.config.settleDelayMs}ms for the service to settle`);
      await this.sleep(this.config.settleDelayMs);
    }
    return {};
  }

  private async refreshEnvironment(state: RunState): Promise<StageNote> {
    // Until a resolution succeeds, fall back to OS lookup by bare name.
    state.executable = { kind: 'fallback', name: this.config.commands.packageManager };

    const resolution = await this.components.resolver.resolve();
    state.searchPath = resolution.searchPath;

    if (resolution.kind === 'absent') {
      return {
        diagnostic: resolution.reason,
        warnings: [
          `${resolution.reason}; invoking "${this.config.commands.packageManager}" through OS lookup`,
        ],
      };
    }

    state.executable = { kind: 'resolved', path: resolution.path };
    return { diagnostic: resolution.path };
  }

  private async applyConfiguration(state: RunState, plan: ProvisionPlan): Promise<StageNote> {
    const executable: ExecutableRef = state.executable ?? {
      kind: 'fallback',
      name: this.config.commands.packageManager,
    };
    state.executable = executable;

    await this.components.fetcher.fetch(plan.configuration.url, plan.configuration.destination);
    await this.components.applier.apply(executable, plan.configuration.destination, {
      acceptAgreements: this.config.configuration.acceptAgreements,
      searchPath: state.searchPath,
    });
    return {};
  }

  private async stage(
    state: RunState,
    stage: StageId,
    severity: StageSeverity,
    body: () => Promise<StageNote>,
    opts: { always?: boolean } = {},
  ): Promise<void> {
    if (!opts.always) {
      if (state.fatal) {
        state.stages.push({ stage, outcome: 'skipped', durationMs: 0, diagnostic: 'after fatal failure' });
        return;
      }
      if (state.cancelled || this.options.signal?.aborted) {
        state.cancelled = true;
        state.stages.push({ stage, outcome: 'skipped', durationMs: 0, diagnostic: 'cancelled' });
        return;
      }
    }

    const stageLogger = this.logger.child({ stage });
    await this.emit(state, { type: 'StageStarted', payload: { stage } });
    const start = Date.now();

    let result: StageResult;
    try {
      const note = await body();
      const warnings = note.warnings ?? [];
      result = {
        stage,
        outcome: 'success',
        severity: warnings.length > 0 ? 'warning' : undefined,
        diagnostic: note.diagnostic,
        durationMs: Date.now() - start,
      };
      for (const warning of warnings) {
        state.warnings.push(`${stageLabel(stage)}: ${warning}`);
        await stageLogger.warn(warning);
      }
    } catch (error) {
      const diagnostic = describeError(error);
      result = { stage, outcome: 'failure', severity, diagnostic, durationMs: Date.now() - start };
      if (severity === 'fatal') {
        state.fatal = { stage, message: diagnostic };
        await stageLogger.error(
          error instanceof Error ? error : new Error(diagnostic),
          `${stageLabel(stage)} failed`,
        );
      } else {
        state.warnings.push(`${stageLabel(stage)} failed: ${diagnostic}`);
        await stageLogger.warn(`${stageLabel(stage)} failed: ${diagnostic}`);
      }
    }

    state.stages.push(result);
    await this.emit(state, {
      type: 'StageFinished',
      payload: {
        stage,
        outcome: result.outcome,
        severity: result.severity,
        diagnostic: result.diagnostic,
        durationMs: result.durationMs,
      },
    });
  }

  private async emit(state: RunState, event: EventBody<ProvisionEvent>): Promise<void> {
    const envelope = {
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: state.runId,
    };
    await this.logger.log({ ...envelope, ...event });
  }
}
