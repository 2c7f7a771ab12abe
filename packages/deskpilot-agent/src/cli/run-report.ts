import { RunOutcome, RunReport, formatHistoryEntry } from '@deskpilot/shared';

export const EXIT_CODES: Record<RunOutcome, number> = {
  goal_complete: 0,
  failed: 1,
  budget_exhausted: 2,
};

export function formatRunReport(report: RunReport): string {
  const lines = [
    `Run ${report.runId}: ${report.outcome} after ${report.stepsTaken} step(s)`,
    `Goal: ${report.goal}`,
    ...report.history.map(formatHistoryEntry),
  ];
  if (report.failure) {
    const { kind, count, message } = report.failure;
    lines.push(`Failure: ${kind} (x${count}) ${message}`);
  }
  if (report.artifactsDir) {
    lines.push(`Artifacts: ${report.artifactsDir}`);
  }
  return lines.join('\n');
}
