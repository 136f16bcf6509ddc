export class JobCancelledError extends Error {
  constructor(message = 'Job cancelled') {
    super(message);
    this.name = 'JobCancelledError';
  }
}

export const isJobCancelledError = (error: unknown): error is JobCancelledError =>
  error instanceof JobCancelledError;

export class QueueFullError extends Error {
  constructor(public readonly maxQueueLength: number) {
    super('QUEUE_FULL');
    this.name = 'QueueFullError';
  }
}

export const isQueueFullError = (error: unknown): error is QueueFullError => error instanceof QueueFullError;

export class UnknownJobError extends Error {
  constructor(public readonly jobId: string) {
    super(`Unknown job: ${jobId}`);
    this.name = 'UnknownJobError';
  }
}
