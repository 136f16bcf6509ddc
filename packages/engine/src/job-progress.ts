import type { JobProgressReporter, JobProgressSnapshot } from './types';

const clampToNonNegative = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

/**
 * Counts units of work (packets of a sweep, channels of an export).
 * Open-ended work has no total and reports a ratio of 0.
 */
export class JobProgressTracker implements JobProgressReporter {
  private completed = 0;
  private total: number | null;

  constructor(total: number | null = null, private readonly onChange?: (snapshot: JobProgressSnapshot) => void) {
    this.total = total === null ? null : clampToNonNegative(total);
  }

  snapshot(): JobProgressSnapshot {
    return {
      ratio: this.computeRatio(),
      completed: this.completed,
      total: this.total
    };
  }

  advance(completed: number): JobProgressSnapshot {
    this.completed = clampToNonNegative(completed);
    return this.changed();
  }

  setTotal(total: number | null): JobProgressSnapshot {
    this.total = total === null ? null : clampToNonNegative(total);
    return this.changed();
  }

  private changed(): JobProgressSnapshot {
    const snapshot = this.snapshot();
    this.onChange?.(snapshot);
    return snapshot;
  }

  private computeRatio(): number {
    if (!this.total || this.total <= 0) {
      return 0;
    }
    const raw = this.completed / this.total;
    if (!Number.isFinite(raw)) {
      return 0;
    }
    return Math.max(0, Math.min(1, raw));
  }
}
