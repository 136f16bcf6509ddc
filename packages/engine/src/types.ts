export type JobState = 'queued' | 'running' | 'cancelling' | 'completed' | 'failed' | 'canceled';

export interface JobProgressSnapshot {
  ratio: number;
  completed: number;
  total: number | null;
}

export interface JobHistoryEntry {
  jobId: string;
  name: string;
  status: JobState;
  outputPath?: string | null;
  errorMessage?: string | null;
  startedAt: number | null;
  finishedAt: number | null;
  metadata?: Record<string, unknown>;
  message?: string | null;
}

export interface JobSnapshot {
  jobId: string;
  name: string;
  status: JobState;
  progress: JobProgressSnapshot;
  metadata?: Record<string, unknown>;
}

export interface JobProgressReporter {
  snapshot(): JobProgressSnapshot;
  advance(completed: number): JobProgressSnapshot;
  setTotal(total: number | null): JobProgressSnapshot;
}

export interface JobRunContext {
  signal: AbortSignal;
  progress: JobProgressReporter;
}

export interface JobRunResult<TResult = unknown> {
  outputPath?: string | null;
  result?: TResult;
}

export interface QueueJobOptions<TResult = unknown> {
  name: string;
  /** Units of work, when known up front */
  total?: number | null;
  metadata?: Record<string, unknown>;
  execute: (ctx: JobRunContext) => Promise<JobRunResult<TResult>>;
}

export interface HistoryStore {
  record(entry: JobHistoryEntry): void;
  entries(): JobHistoryEntry[];
}

export interface CancelAllSummary {
  runningJobId: string | null;
  runningJobIds: string[];
  queuedJobIds: string[];
}
