import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { engineLogger as logger } from '@lasercal/logger';

import { JobCancelledError, QueueFullError, UnknownJobError, isJobCancelledError } from './job-errors';
import { InMemoryHistoryStore } from './job-history';
import { JobProgressTracker } from './job-progress';
import type {
  CancelAllSummary,
  HistoryStore,
  JobHistoryEntry,
  JobRunContext,
  JobRunResult,
  JobSnapshot,
  JobState,
  QueueJobOptions
} from './types';

type JobOutcome =
  | { status: 'completed'; result: JobRunResult }
  | { status: 'canceled'; message: string | null }
  | { status: 'failed'; error: unknown };

interface JobWaiter {
  resolve: (result: JobRunResult) => void;
  reject: (error: unknown) => void;
}

interface InternalJob {
  id: string;
  name: string;
  status: JobState;
  createdAt: number;
  queuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  metadata?: Record<string, unknown>;
  progress: JobProgressTracker;
  options: QueueJobOptions;
  controller: AbortController;
  errorMessage?: string | null;
  message?: string | null;
  queueTimer: NodeJS.Timeout | null;
}

const DEFAULT_HISTORY_LIMIT = 20;
const DEFAULT_MAX_PARALLEL_JOBS = 1;
const DEFAULT_MAX_QUEUE_LENGTH = 4;
const DEFAULT_QUEUE_TIMEOUT_MS = 3 * 60_000;

export interface JobQueueOptions {
  historyStore?: HistoryStore;
  historyLimit?: number;
  maxParallelJobs?: number;
  maxQueueLength?: number;
  queueTimeoutMs?: number;
}

/**
 * FIFO of sweep and export jobs.
 *
 * Events: `job:queued`, `job:started`, `job:status`, `job:progress` and
 * `job:finished`, each with a JobSnapshot. A job cancelled before it starts
 * never runs; a running job sees its AbortSignal fire.
 */
export class JobQueue extends EventEmitter {
  private readonly queue: InternalJob[] = [];
  private readonly activeJobs = new Set<InternalJob>();
  private readonly history: HistoryStore;
  private readonly idleWaiters: Array<() => void> = [];
  private readonly jobWaiters = new Map<string, JobWaiter[]>();
  // settled jobs by id, oldest first, trimmed to outcomeLimit
  private readonly outcomes = new Map<string, JobOutcome>();
  private readonly outcomeLimit: number;
  private readonly maxParallelJobs: number;
  private readonly maxQueueLength: number;
  private readonly queueTimeoutMs: number;

  constructor(options: JobQueueOptions = {}) {
    super();
    this.outcomeLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.history = options.historyStore ?? new InMemoryHistoryStore(this.outcomeLimit);
    this.maxParallelJobs = Math.max(1, options.maxParallelJobs ?? DEFAULT_MAX_PARALLEL_JOBS);
    this.maxQueueLength = Math.max(1, options.maxQueueLength ?? DEFAULT_MAX_QUEUE_LENGTH);
    this.queueTimeoutMs = options.queueTimeoutMs ?? DEFAULT_QUEUE_TIMEOUT_MS;
  }

  enqueue<TResult>(options: QueueJobOptions<TResult>): string {
    if (this.queue.length >= this.maxQueueLength) {
      throw new QueueFullError(this.maxQueueLength);
    }

    const id = randomUUID();
    const job: InternalJob = {
      id,
      name: options.name,
      status: 'queued',
      createdAt: Date.now(),
      queuedAt: Date.now(),
      startedAt: null,
      finishedAt: null,
      metadata: options.metadata,
      progress: new JobProgressTracker(options.total ?? null, () => this.emitProgress(id)),
      options,
      controller: new AbortController(),
      queueTimer: null
    };

    this.queue.push(job);
    this.emit('job:queued', this.toSnapshot(job));
    this.scheduleQueueTimeout(job);
    this.processQueue();
    return job.id;
  }

  /**
   * Cancel one job. Returns false when the job is unknown or already done.
   */
  cancel(jobId: string, reason = 'Cancelled'): boolean {
    const queuedIndex = this.queue.findIndex(job => job.id === jobId);
    if (queuedIndex !== -1) {
      const [job] = this.queue.splice(queuedIndex, 1);
      this.dropQueuedJob(job, reason);
      this.notifyIdleIfNeeded();
      return true;
    }

    for (const job of this.activeJobs) {
      if (job.id !== jobId) {
        continue;
      }
      if (job.status === 'cancelling') {
        return false;
      }
      this.abortActiveJob(job, reason);
      return true;
    }
    return false;
  }

  cancelAll(): CancelAllSummary {
    const summary: CancelAllSummary = { runningJobId: null, runningJobIds: [], queuedJobIds: [] };

    for (const job of this.activeJobs) {
      if (job.status === 'cancelling' || job.status === 'canceled') {
        continue;
      }
      this.abortActiveJob(job, 'Cancel All');
      summary.runningJobIds.push(job.id);
      if (!summary.runningJobId) {
        summary.runningJobId = job.id;
      }
    }

    for (const job of this.queue.splice(0)) {
      this.dropQueuedJob(job, 'Canceled via Cancel All');
      summary.queuedJobIds.push(job.id);
    }

    this.notifyIdleIfNeeded();
    return summary;
  }

  getActiveJob(): JobSnapshot | null {
    const iterator = this.activeJobs.values().next();
    if (iterator.done || !iterator.value) {
      return null;
    }
    return this.toSnapshot(iterator.value);
  }

  getActiveJobs(): JobSnapshot[] {
    return Array.from(this.activeJobs).map(job => this.toSnapshot(job));
  }

  getQueuedJobs(): JobSnapshot[] {
    return this.queue.map(job => this.toSnapshot(job));
  }

  getHistory(): JobHistoryEntry[] {
    return this.history.entries();
  }

  async waitForIdle(): Promise<void> {
    if (this.activeJobs.size === 0 && this.queue.length === 0) {
      return;
    }

    await new Promise<void>(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Settles when the job finishes: resolves with its result when it
   * completed, rejects with JobCancelledError when it was cancelled and with
   * the job's own error when it failed. Jobs that already finished are
   * answered the same way for the last `historyLimit` of them.
   */
  waitForJob(jobId: string): Promise<JobRunResult> {
    if (!this.isPending(jobId)) {
      const outcome = this.outcomes.get(jobId);
      if (!outcome) {
        return Promise.reject(new UnknownJobError(jobId));
      }
      return new Promise<JobRunResult>((resolve, reject) => replayOutcome(outcome, { resolve, reject }));
    }

    return new Promise<JobRunResult>((resolve, reject) => {
      const waiters = this.jobWaiters.get(jobId) ?? [];
      waiters.push({ resolve, reject });
      this.jobWaiters.set(jobId, waiters);
    });
  }

  private isPending(jobId: string): boolean {
    if (this.queue.some(job => job.id === jobId)) {
      return true;
    }
    for (const job of this.activeJobs) {
      if (job.id === jobId) {
        return true;
      }
    }
    return false;
  }

  private processQueue(): void {
    while (this.activeJobs.size < this.maxParallelJobs) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.clearQueueTimeout(next);
      this.startJob(next);
    }
  }

  private startJob(job: InternalJob): void {
    this.activeJobs.add(job);
    job.status = 'running';
    job.startedAt = Date.now();
    this.emit('job:started', this.toSnapshot(job));
    logger.debug({ jobId: job.id, name: job.name }, 'job started');
    void this.runJob(job);
  }

  private async runJob(job: InternalJob): Promise<void> {
    try {
      const ctx: JobRunContext = {
        signal: job.controller.signal,
        progress: job.progress
      };

      const result = await job.options.execute(ctx);

      if (job.controller.signal.aborted) {
        this.finishJob(job, { status: 'canceled', message: job.message ?? null });
        return;
      }

      this.finishJob(job, { status: 'completed', result });
    } catch (error) {
      if (job.controller.signal.aborted || isJobCancelledError(error)) {
        this.finishJob(job, { status: 'canceled', message: job.message ?? null });
      } else {
        job.errorMessage = error instanceof Error ? error.message : String(error);
        logger.warn({ jobId: job.id, name: job.name, err: error }, 'job failed');
        this.finishJob(job, { status: 'failed', error });
      }
    } finally {
      this.activeJobs.delete(job);
      this.processQueue();
      this.notifyIdleIfNeeded();
    }
  }

  private finishJob(job: InternalJob, outcome: JobOutcome): void {
    job.status = outcome.status;
    job.finishedAt = Date.now();
    this.emit('job:finished', this.toSnapshot(job));
    this.recordHistory(job, outcome.status === 'completed' ? outcome.result : undefined);
    this.settle(job, outcome);
  }

  private abortActiveJob(job: InternalJob, reason: string): void {
    job.status = 'cancelling';
    job.message = reason;
    this.emit('job:status', this.toSnapshot(job));
    job.controller.abort(new JobCancelledError(reason));
  }

  private dropQueuedJob(job: InternalJob, message: string): void {
    this.clearQueueTimeout(job);
    job.status = 'canceled';
    job.finishedAt = Date.now();
    job.message = message;
    this.emit('job:finished', this.toSnapshot(job));
    this.recordHistory(job);
    this.settle(job, { status: 'canceled', message });
  }

  private settle(job: InternalJob, outcome: JobOutcome): void {
    this.outcomes.set(job.id, outcome);
    for (const jobId of this.outcomes.keys()) {
      if (this.outcomes.size <= this.outcomeLimit) {
        break;
      }
      this.outcomes.delete(jobId);
    }

    const waiters = this.jobWaiters.get(job.id) ?? [];
    this.jobWaiters.delete(job.id);
    for (const waiter of waiters) {
      replayOutcome(outcome, waiter);
    }
  }

  private recordHistory(job: InternalJob, result?: JobRunResult): void {
    const entry: JobHistoryEntry = {
      jobId: job.id,
      name: job.name,
      status: job.status,
      outputPath: result?.outputPath ?? null,
      errorMessage: job.errorMessage ?? null,
      startedAt: job.startedAt,
      finishedAt: job.finishedAt,
      metadata: job.metadata,
      message: job.message ?? null
    };
    this.history.record(entry);
  }

  private emitProgress(jobId: string): void {
    for (const job of this.activeJobs) {
      if (job.id === jobId) {
        this.emit('job:progress', this.toSnapshot(job));
        return;
      }
    }
  }

  private notifyIdleIfNeeded(): void {
    if (this.activeJobs.size > 0 || this.queue.length > 0) {
      return;
    }

    while (this.idleWaiters.length > 0) {
      const resolve = this.idleWaiters.shift();
      resolve?.();
    }
  }

  private scheduleQueueTimeout(job: InternalJob): void {
    if (!this.queueTimeoutMs || this.queueTimeoutMs <= 0) {
      return;
    }
    this.clearQueueTimeout(job);
    job.queueTimer = setTimeout(() => {
      this.expireQueuedJob(job);
    }, this.queueTimeoutMs);
    if (typeof job.queueTimer.unref === 'function') {
      job.queueTimer.unref();
    }
  }

  private clearQueueTimeout(job: InternalJob): void {
    if (job.queueTimer) {
      clearTimeout(job.queueTimer);
      job.queueTimer = null;
    }
  }

  private expireQueuedJob(job: InternalJob): void {
    const index = this.queue.findIndex(entry => entry.id === job.id);
    if (index === -1) {
      return;
    }

    this.queue.splice(index, 1);
    this.dropQueuedJob(job, `Queue timeout exceeded (${Math.round(this.queueTimeoutMs / 1000)}s)`);
    this.notifyIdleIfNeeded();
  }

  private toSnapshot(job: InternalJob): JobSnapshot {
    return {
      jobId: job.id,
      name: job.name,
      status: job.status,
      progress: job.progress.snapshot(),
      metadata: job.metadata
    };
  }

}

function replayOutcome(outcome: JobOutcome, waiter: JobWaiter): void {
  switch (outcome.status) {
    case 'completed':
      waiter.resolve(outcome.result);
      return;
    case 'canceled':
      waiter.reject(new JobCancelledError(outcome.message ?? undefined));
      return;
    case 'failed':
      waiter.reject(outcome.error);
  }
}
