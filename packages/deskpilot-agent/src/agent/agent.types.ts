import {
  DeskpilotError,
  FailureKind,
  RunReport,
} from '@deskpilot/shared';

export enum LoopState {
  IDLE = 'idle',
  PERCEIVING = 'perceiving',
  PLANNING = 'planning',
  EXECUTING = 'executing',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

export interface RunOptions {
  /** Step budget; defaults to AGENT_MAX_STEPS */
  maxSteps?: number;
  /** Checked at the top of every step */
  signal?: AbortSignal;
}

/**
 * Thrown by a run that ends in the Failed state. The full report, history
 * included, travels with it.
 */
export class AgentRunFailedError extends DeskpilotError {
  readonly kind = 'run_failed';

  constructor(readonly report: RunReport) {
    super(
      `Run ${report.runId} failed: ${report.failure?.message ?? 'unknown failure'}`,
    );
  }

  get failureKind(): FailureKind | undefined {
    return this.report.failure?.kind;
  }

  get failureCount(): number {
    return this.report.failure?.count ?? 0;
  }
}
