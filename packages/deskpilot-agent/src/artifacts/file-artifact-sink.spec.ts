import { ConfigService } from '@nestjs/config';
import { existsSync, mkdtempSync, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import {
  DeskpilotEnv,
  HistoryEntry,
  RunReport,
  ScreenState,
  createUIElement,
  validateEnv,
} from '@deskpilot/shared';
import { FileArtifactSink } from './file-artifact-sink';

function configFor(
  overrides: Record<string, string> = {},
): ConfigService<DeskpilotEnv, true> {
  const env = validateEnv(overrides);
  return {
    get: (key: keyof DeskpilotEnv) => env[key],
  } as unknown as ConfigService<DeskpilotEnv, true>;
}

describe('FileArtifactSink', () => {
  const runId = '20260101_120000';
  const submit = createUIElement({
    id: 0,
    type: 'button',
    content: 'Submit',
    bounds: { x: 0.4, y: 0.5, width: 0.2, height: 0.1 },
    confidence: 0.9,
  });

  let outputDir: string;
  let state: ScreenState;

  beforeEach(async () => {
    outputDir = mkdtempSync(path.join(os.tmpdir(), 'deskpilot-artifacts-'));
    const screenshot = await sharp({
      create: {
        width: 100,
        height: 80,
        channels: 3,
        background: { r: 30, g: 30, b: 30 },
      },
    })
      .png()
      .toBuffer();
    state = {
      elements: [submit],
      dimensions: { width: 100, height: 80 },
      timestamp: 1,
      screenshot,
    };
  });

  function entry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
    return {
      step: 1,
      plan: {
        reasoning: 'submit',
        isGoalComplete: false,
        action: { kind: 'click', elementId: 0 },
      },
      target: submit,
      summary: 'click element 0',
      success: true,
      timestamp: 2,
      ...overrides,
    };
  }

  function report(history: HistoryEntry[]): RunReport {
    return {
      runId,
      goal: 'Submit the form',
      outcome: 'budget_exhausted',
      finalState: state,
      stepsTaken: history.length,
      history,
      startedAt: new Date('2026-01-01T12:00:00.000Z'),
      finishedAt: new Date('2026-01-01T12:00:05.000Z'),
    };
  }

  it('writes step images and the final report under the run directory', async () => {
    const sink = new FileArtifactSink(configFor({ RUN_OUTPUT_DIR: outputDir }));
    const runDir = path.join(outputDir, runId);

    await expect(sink.startRun(runId, 'Submit the form')).resolves.toBe(runDir);
    await sink.recordStep({ runId, step: 1, state, entry: entry() });
    await sink.finishRun(report([entry()]));

    for (const file of [
      'step_1_state_raw.png',
      'step_1_state_parsed.png',
      'step_1_action_highlight.png',
      'final_state.png',
      'report.json',
      'run.log',
    ]) {
      expect(existsSync(path.join(runDir, file))).toBe(true);
    }

    const parsedOverlay = await sharp(
      path.join(runDir, 'step_1_state_parsed.png'),
    ).metadata();
    expect([parsedOverlay.width, parsedOverlay.height]).toEqual([100, 80]);

    const written = JSON.parse(
      await fs.readFile(path.join(runDir, 'report.json'), 'utf8'),
    );
    expect(written.outcome).toBe('budget_exhausted');
    expect(written.startedAt).toBe('2026-01-01T12:00:00.000Z');
    expect(written.finalState).toEqual({
      elements: [
        {
          id: 0,
          type: 'button',
          content: 'Submit',
          bounds: { x: 0.4, y: 0.5, width: 0.2, height: 0.1 },
          confidence: 0.9,
          attributes: {},
        },
      ],
      dimensions: { width: 100, height: 80 },
      timestamp: 1,
      screenshotBytes: state.screenshot.length,
    });
  });

  it('records steps without a snapshot as log lines only', async () => {
    const sink = new FileArtifactSink(configFor({ RUN_OUTPUT_DIR: outputDir }));
    const runDir = path.join(outputDir, runId);

    await sink.startRun(runId, 'Submit the form');
    await sink.recordStep({
      runId,
      step: 1,
      state: null,
      entry: entry({
        plan: null,
        target: undefined,
        success: false,
        failureKind: 'perception_unavailable',
      }),
    });
    await sink.finishRun({ ...report([]), finalState: null });

    expect(existsSync(path.join(runDir, 'step_1_state_raw.png'))).toBe(false);
    expect(existsSync(path.join(runDir, 'final_state.png'))).toBe(false);
    expect(existsSync(path.join(runDir, 'report.json'))).toBe(true);
  });

  it('requires startRun before recording', async () => {
    const sink = new FileArtifactSink(configFor({ RUN_OUTPUT_DIR: outputDir }));

    await expect(
      sink.recordStep({ runId, step: 1, state, entry: entry() }),
    ).rejects.toThrow('No run in progress; call startRun first');
  });
});
