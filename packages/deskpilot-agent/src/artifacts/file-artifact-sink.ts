import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import {
  DeskpilotEnv,
  RunReport,
  ScreenState,
  denormalizePoint,
  describePlan,
  elementTargetPoint,
} from '@deskpilot/shared';
import { StepArtifactSink, StepRecord } from './artifact-sink.types';
import { ScreenshotAnnotator } from './screenshot-annotator';
import { elementBoxesSvg, highlightSvg } from './overlay-svg';

interface ActiveRun {
  dir: string;
  logger: winston.Logger;
}

function serializableState(state: ScreenState | null) {
  if (!state) {
    return null;
  }
  const { screenshot, ...rest } = state;
  return { ...rest, screenshotBytes: screenshot.length };
}

/**
 * Writes screenshots, overlays, a JSON-lines run log and the final report
 * under RUN_OUTPUT_DIR/<runId>/.
 */
@Injectable()
export class FileArtifactSink implements StepArtifactSink {
  private readonly logger = new Logger(FileArtifactSink.name);
  private activeRun: ActiveRun | null = null;

  constructor(
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  async startRun(runId: string, goal: string): Promise<string> {
    const dir = path.resolve(
      this.configService.get('RUN_OUTPUT_DIR', { infer: true }),
      runId,
    );
    await fs.mkdir(dir, { recursive: true });

    const logger = winston.createLogger({
      level: 'debug',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports: [
        new winston.transports.File({ filename: path.join(dir, 'run.log') }),
      ],
    });
    this.activeRun = { dir, logger };

    logger.info('Run started', { runId, goal });
    this.logger.log(`Writing run artifacts to ${dir}`);
    return dir;
  }

  async recordStep(record: StepRecord): Promise<void> {
    const run = this.requireActiveRun();
    const { step, state, entry } = record;

    run.logger.log(entry.success ? 'info' : 'warn', `Step ${step}`, {
      step,
      plan: describePlan(entry.plan),
      reasoning: entry.plan?.reasoning,
      targetId: entry.target?.id,
      success: entry.success,
      failureKind: entry.failureKind,
      summary: entry.summary,
      verification: entry.result && {
        method: entry.result.method,
        confidence: entry.result.confidence,
        changes: entry.result.changesDetected.length,
      },
    });

    if (!state) {
      return;
    }

    await fs.writeFile(
      path.join(run.dir, `step_${step}_state_raw.png`),
      state.screenshot,
    );

    const parsed = await ScreenshotAnnotator.from(state.screenshot);
    await fs.writeFile(
      path.join(run.dir, `step_${step}_state_parsed.png`),
      await parsed
        .addSvg(elementBoxesSvg(state.elements, parsed.dimensions))
        .render(),
    );

    if (entry.target) {
      const highlight = await ScreenshotAnnotator.from(state.screenshot);
      const clickPoint = denormalizePoint(
        elementTargetPoint(entry.target),
        highlight.dimensions,
      );
      await fs.writeFile(
        path.join(run.dir, `step_${step}_action_highlight.png`),
        await highlight
          .addSvg(highlightSvg(entry.target, highlight.dimensions, clickPoint))
          .render(),
      );
    }
  }

  async finishRun(report: RunReport): Promise<void> {
    const run = this.requireActiveRun();
    this.activeRun = null;

    try {
      if (report.finalState) {
        await fs.writeFile(
          path.join(run.dir, 'final_state.png'),
          report.finalState.screenshot,
        );
      }

      await fs.writeFile(
        path.join(run.dir, 'report.json'),
        JSON.stringify(
          {
            ...report,
            finalState: serializableState(report.finalState),
          },
          null,
          2,
        ),
      );

      run.logger.info('Run finished', {
        outcome: report.outcome,
        stepsTaken: report.stepsTaken,
        failure: report.failure,
      });
    } finally {
      await new Promise<void>((resolve) => {
        run.logger.on('finish', () => resolve());
        run.logger.end();
      });
    }
  }

  private requireActiveRun(): ActiveRun {
    if (!this.activeRun) {
      throw new Error('No run in progress; call startRun first');
    }
    return this.activeRun;
  }
}
