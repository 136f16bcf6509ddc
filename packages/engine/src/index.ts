/* c8 ignore file */
export { JobQueue } from './job-queue';
export type { JobQueueOptions } from './job-queue';
export { JobProgressTracker } from './job-progress';
export {
  JobCancelledError,
  QueueFullError,
  UnknownJobError,
  isJobCancelledError,
  isQueueFullError
} from './job-errors';
export { InMemoryHistoryStore } from './job-history';
export { tempPathFor, writeFileAtomic } from './atomic-file';
export { createExportJob } from './export-job';
export type { ExportJobOptions } from './export-job';
export { SWEEP_JOB_NAME, countSweepSteps, createSweepJob } from './sweep-job';
export type { SweepJobOptions } from './sweep-job';
export { CalibrationSession } from './session';
export type { CalibrationSessionOptions, StartSweepOptions } from './session';
export type {
  CancelAllSummary,
  HistoryStore,
  JobHistoryEntry,
  JobProgressReporter,
  JobProgressSnapshot,
  JobRunContext,
  JobRunResult,
  JobSnapshot,
  JobState,
  QueueJobOptions
} from './types';
