import { FailureKind } from '@deskpilot/shared';

/**
 * Counts consecutive failures of the same kind. A different kind starts a
 * new streak at 1; a success clears it.
 */
export class ConsecutiveFailureTracker {
  private kind: FailureKind | null = null;
  private streak = 0;

  record(kind: FailureKind): number {
    this.streak = kind === this.kind ? this.streak + 1 : 1;
    this.kind = kind;
    return this.streak;
  }

  reset(): void {
    this.kind = null;
    this.streak = 0;
  }

  get count(): number {
    return this.streak;
  }
}
