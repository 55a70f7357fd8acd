import type { RunClassification, StageId, StageOutcome, StageSeverity } from './stages';

/**
 * Base interface for all provisioning events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the provisioning run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted once the plan has been validated and the run begins. */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    workingArea: string;
    artifacts: { name: string; url: string }[];
  };
}

export interface StageStarted extends BaseEvent {
  type: 'StageStarted';
  payload: {
    stage: StageId;
  };
}

export interface StageFinished extends BaseEvent {
  type: 'StageFinished';
  payload: {
    stage: StageId;
    outcome: StageOutcome;
    severity?: StageSeverity;
    diagnostic?: string;
    durationMs: number;
  };
}

export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    classification: RunClassification;
    exitCode: number;
    warningCount: number;
  };
}

export type ProvisionEvent = RunStarted | StageStarted | StageFinished | RunFinished;

export const EVENT_SCHEMA_VERSION = 1;
