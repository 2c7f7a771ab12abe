import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PerceptionService } from '@deskpilot/cv';
import {
  ActionPlan,
  DeskpilotEnv,
  FailureKind,
  HistoryEntry,
  PerceptionUnavailableError,
  PlannerUnavailableError,
  PlatformHint,
  RunFailure,
  RunOutcome,
  RunReport,
  ScreenState,
  UIElement,
  delay,
  describeAction,
  errorMessage,
  findElementById,
  getPlatformHint,
  isDeskpilotError,
  targetElementId,
  withTimeout,
} from '@deskpilot/shared';
import { PlannerService } from '../planner/planner.service';
import { ActionExecutorService } from '../executor/action-executor.service';
import {
  STEP_ARTIFACT_SINK,
  StepArtifactSink,
} from '../artifacts/artifact-sink.types';
import { ConsecutiveFailureTracker } from './failure-tracker';
import { AgentRunFailedError, LoopState, RunOptions } from './agent.types';

interface StepResult {
  entry: HistoryEntry;
  state: ScreenState | null;
  goalComplete?: boolean;
  /** Ends the run regardless of the consecutive-failure threshold */
  fatal?: boolean;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatRunId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function classifyFailure(error: unknown, fallback: FailureKind): FailureKind {
  if (isDeskpilotError(error) && error.kind !== 'run_failed') {
    return error.kind;
  }
  return fallback;
}

/**
 * Drives the perceive, plan, act cycle until the goal is reported complete,
 * the step budget runs out or failures cross the configured threshold.
 */
@Injectable()
export class AgentLoopService {
  private readonly logger = new Logger(AgentLoopService.name);
  private loopState = LoopState.IDLE;
  private running = false;

  constructor(
    private readonly perception: PerceptionService,
    private readonly planner: PlannerService,
    private readonly executor: ActionExecutorService,
    @Inject(STEP_ARTIFACT_SINK)
    private readonly artifactSink: StepArtifactSink,
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  get state(): LoopState {
    return this.loopState;
  }

  /**
   * Runs the agent toward `goal`. Resolves with the report for
   * goal_complete and budget_exhausted outcomes; a failed run rejects with
   * AgentRunFailedError carrying the same report.
   */
  async run(goal: string, options: RunOptions = {}): Promise<RunReport> {
    if (this.running) {
      throw new Error('An agent run is already in progress');
    }

    this.running = true;
    try {
      return await this.executeRun(goal, options);
    } finally {
      this.running = false;
    }
  }

  private async executeRun(
    goal: string,
    options: RunOptions,
  ): Promise<RunReport> {
    const defaultMaxSteps = this.configService.get('AGENT_MAX_STEPS', {
      infer: true,
    });
    const maxSteps = options.maxSteps ?? defaultMaxSteps;
    const maxFailures = this.configService.get(
      'AGENT_MAX_CONSECUTIVE_FAILURES',
      { infer: true },
    );
    const stepDelayMs = this.configService.get('AGENT_STEP_DELAY_MS', {
      infer: true,
    });

    const startedAt = new Date();
    const runId = formatRunId(startedAt);
    const platformHint = getPlatformHint();
    const history: HistoryEntry[] = [];
    const failures = new ConsecutiveFailureTracker();
    let finalState: ScreenState | null = null;
    let outcome: RunOutcome = 'budget_exhausted';
    let failure: RunFailure | undefined;

    this.loopState = LoopState.IDLE;
    const artifactsDir = await this.bestEffort('start run', () =>
      this.artifactSink.startRun(runId, goal),
    );
    this.logger.log(
      `Run ${runId} started on ${platformHint}: "${goal}" (budget ${maxSteps} steps)`,
    );

    for (let step = 1; step <= maxSteps; step++) {
      if (options.signal?.aborted) {
        outcome = 'failed';
        failure = {
          kind: 'cancelled',
          count: 1,
          message: `Run cancelled before step ${step}`,
        };
        break;
      }

      const result = await this.runStep(step, goal, history, platformHint);
      history.push(result.entry);
      finalState = result.state ?? finalState;
      this.logStep(result.entry);

      await this.bestEffort('record step', () =>
        this.artifactSink.recordStep({
          runId,
          step,
          state: result.state,
          entry: result.entry,
        }),
      );

      const { failureKind } = result.entry;
      if (result.entry.success || failureKind === undefined) {
        failures.reset();
      } else {
        const count = failures.record(failureKind);
        if (result.fatal || count >= maxFailures) {
          outcome = 'failed';
          failure = { kind: failureKind, count, message: result.entry.summary };
          break;
        }
      }

      if (result.goalComplete) {
        outcome = 'goal_complete';
        break;
      }

      if (step < maxSteps) {
        await delay(stepDelayMs);
      }
    }

    this.loopState = outcome === 'failed' ? LoopState.FAILED : LoopState.COMPLETE;

    const report: RunReport = {
      runId,
      goal,
      outcome,
      finalState,
      stepsTaken: history.length,
      history,
      failure,
      startedAt,
      finishedAt: new Date(),
      artifactsDir,
    };

    await this.bestEffort('finish run', () => this.artifactSink.finishRun(report));
    this.logger.log(
      `Run ${runId} finished: ${outcome} after ${report.stepsTaken} steps`,
    );

    if (outcome === 'failed') {
      throw new AgentRunFailedError(report);
    }
    return report;
  }

  private async runStep(
    step: number,
    goal: string,
    history: readonly HistoryEntry[],
    platformHint: PlatformHint,
  ): Promise<StepResult> {
    this.loopState = LoopState.PERCEIVING;
    let state: ScreenState;
    try {
      state = await this.perceiveWithRetry();
    } catch (error) {
      return {
        entry: this.failedEntry(step, null, undefined, error, 'perception_unavailable'),
        state: null,
        fatal: true,
      };
    }

    this.loopState = LoopState.PLANNING;
    const planningTimeoutMs = this.configService.get('PLANNING_TIMEOUT_MS', {
      infer: true,
    });
    let plan: ActionPlan;
    try {
      plan = await withTimeout(
        (signal) => this.planner.plan(goal, history, state, platformHint, signal),
        planningTimeoutMs,
        () =>
          new PlannerUnavailableError(
            `Planning timed out after ${planningTimeoutMs}ms`,
          ),
      );
    } catch (error) {
      return {
        entry: this.failedEntry(step, null, undefined, error, 'planner_unavailable'),
        state,
      };
    }

    if (plan.isGoalComplete) {
      return {
        entry: {
          step,
          plan,
          summary: 'Goal reported complete',
          success: true,
          timestamp: Date.now(),
        },
        state,
        goalComplete: true,
      };
    }

    const elementId = targetElementId(plan.action);
    const target =
      elementId === undefined ? undefined : findElementById(state, elementId);

    this.loopState = LoopState.EXECUTING;
    try {
      const result = await this.executor.execute(plan, state);
      return {
        entry: {
          step,
          plan,
          target,
          summary: `${describeAction(plan.action)} (${result.method} verification, confidence ${result.confidence.toFixed(2)})`,
          success: true,
          result,
          timestamp: Date.now(),
        },
        state,
      };
    } catch (error) {
      return {
        entry: this.failedEntry(step, plan, target, error, 'execution'),
        state,
      };
    }
  }

  /**
   * One capture attempt plus up to PERCEPTION_MAX_RETRIES retries, with
   * the backoff doubling after each failure.
   */
  private async perceiveWithRetry(): Promise<ScreenState> {
    const maxRetries = this.configService.get('PERCEPTION_MAX_RETRIES', {
      infer: true,
    });
    const backoffMs = this.configService.get('PERCEPTION_RETRY_BACKOFF_MS', {
      infer: true,
    });
    const timeoutMs = this.configService.get('PERCEPTION_TIMEOUT_MS', {
      infer: true,
    });

    for (let attempt = 0; ; attempt++) {
      let inFlight: Promise<unknown> = Promise.resolve();
      try {
        return await withTimeout(
          (signal) => {
            const capture = this.perception.capture(signal);
            inFlight = capture;
            return capture;
          },
          timeoutMs,
          () =>
            new PerceptionUnavailableError(
              `Perception timed out after ${timeoutMs}ms`,
            ),
        );
      } catch (error) {
        // A timed-out capture is aborted; let it settle so attempts never overlap
        await Promise.allSettled([inFlight]);
        if (attempt >= maxRetries) {
          throw error;
        }
        const waitMs = backoffMs * 2 ** attempt;
        this.logger.warn(
          `Perception attempt ${attempt + 1} failed: ${errorMessage(error)}. Retrying in ${waitMs}ms`,
        );
        await delay(waitMs);
      }
    }
  }

  private failedEntry(
    step: number,
    plan: ActionPlan | null,
    target: UIElement | undefined,
    error: unknown,
    fallbackKind: FailureKind,
  ): HistoryEntry {
    const failureKind = classifyFailure(error, fallbackKind);
    return {
      step,
      plan,
      target,
      summary: `${failureKind}: ${errorMessage(error)}`,
      success: false,
      failureKind,
      timestamp: Date.now(),
    };
  }

  private logStep(entry: HistoryEntry): void {
    const message = `Step ${entry.step}: ${entry.summary}`;
    if (entry.success) {
      this.logger.log(message);
    } else {
      this.logger.warn(message);
    }
  }

  private async bestEffort<T>(
    description: string,
    operation: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await operation();
    } catch (error) {
      this.logger.warn(
        `Artifact sink failed to ${description}: ${errorMessage(error)}`,
      );
      return undefined;
    }
  }
}
