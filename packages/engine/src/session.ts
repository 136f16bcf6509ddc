import fs from 'node:fs/promises';

import { ControlPointStore, loadProfile, saveProfile } from '@lasercal/curves';
import type { Channel, HeaderExportOptions, LutSize } from '@lasercal/curves';
import type { PreviewChannel, SweepRequest, SweepStep } from '@lasercal/device';
import { engineLogger as logger } from '@lasercal/logger';

import { writeFileAtomic } from './atomic-file';
import { createExportJob } from './export-job';
import { isJobCancelledError } from './job-errors';
import { JobQueue } from './job-queue';
import { SWEEP_JOB_NAME, createSweepJob } from './sweep-job';

export interface CalibrationSessionOptions {
  preview: PreviewChannel;
  store?: ControlPointStore;
  queue?: JobQueue;
  header?: HeaderExportOptions;
}

export interface StartSweepOptions {
  onStep?: (step: SweepStep) => void;
}

/**
 * One calibration run: the editable profile, the device preview and the job
 * queue that sweeps and exports go through.
 *
 * The default queue runs two jobs at once so an export never waits behind a
 * repeating sweep. Sweep starts, stops and close run one after another.
 */
export class CalibrationSession {
  readonly store: ControlPointStore;
  readonly preview: PreviewChannel;
  readonly queue: JobQueue;
  private readonly header: HeaderExportOptions;
  private sweepJobId: string | null = null;
  private sweepChain: Promise<unknown> = Promise.resolve();

  constructor(options: CalibrationSessionOptions) {
    this.preview = options.preview;
    this.store = options.store ?? new ControlPointStore();
    this.queue = options.queue ?? new JobQueue({ maxParallelJobs: 2 });
    this.header = options.header ?? {};
  }

  get activeSweepId(): string | null {
    return this.sweepJobId;
  }

  /**
   * Start a sweep in the background, replacing any sweep already running.
   * Resolves with the job id once the sweep is queued; follow it through the
   * queue's events or `queue.waitForJob`.
   */
  startSweep(request: SweepRequest, options: StartSweepOptions = {}): Promise<string> {
    return this.serialize(() => this.replaceSweep(request, options));
  }

  /**
   * Cancel every running or queued sweep and black out the laser. Resolves
   * with whether a sweep was cancelled.
   */
  stopSweep(): Promise<boolean> {
    return this.serialize(async () => {
      const stopped = await this.cancelSweeps();
      if (this.preview.connected) {
        await this.preview.blackout();
      }
      return stopped;
    });
  }

  /** Show the calibrated output for `input` on its channel */
  testPoint(channel: Channel, input: number): Promise<number> {
    return this.preview.testPoint(this.store.getCurve(channel), this.store.bitDepth, channel, input);
  }

  /** Step to the next control point of a channel and show it */
  async testNextPoint(channel: Channel): Promise<{ input: number; value: number }> {
    const point = this.store.nextPoint(channel);
    const value = await this.testPoint(channel, point.input);
    return { input: point.input, value };
  }

  /**
   * Queue an export of all three channels. Resolves with the written path;
   * nothing is written when the export is cancelled or fails.
   */
  async exportHeader(outputPath: string, size: LutSize): Promise<string> {
    const jobId = this.queue.enqueue(
      createExportJob(this.store.getProfile(), { size, outputPath, header: this.header })
    );
    const result = await this.queue.waitForJob(jobId);
    return result.outputPath ?? outputPath;
  }

  async saveProfile(filePath: string): Promise<void> {
    await writeFileAtomic(filePath, saveProfile(this.store.getProfile()));
    logger.info({ path: filePath }, 'profile saved');
  }

  /** Replaces the session profile; a rejected file leaves it untouched */
  async loadProfile(filePath: string): Promise<void> {
    const text = await fs.readFile(filePath, 'utf8');
    this.store.replaceProfile(loadProfile(text));
    logger.info({ path: filePath, bitDepth: this.store.bitDepth }, 'profile loaded');
  }

  /** Cancel everything, wait for the queue to drain, then black out */
  close(): Promise<void> {
    return this.serialize(async () => {
      this.queue.cancelAll();
      await this.queue.waitForIdle();
      this.sweepJobId = null;
      if (this.preview.connected) {
        await this.preview.blackout();
      }
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.sweepChain.then(task);
    this.sweepChain = next.catch(() => undefined);
    return next;
  }

  private async replaceSweep(request: SweepRequest, options: StartSweepOptions): Promise<string> {
    await this.cancelSweeps();

    const jobId = this.queue.enqueue(createSweepJob(this.preview, this.store.getProfile(), request, options));
    this.sweepJobId = jobId;
    void this.queue.waitForJob(jobId).then(
      () => this.clearSweep(jobId),
      (error: unknown) => {
        this.clearSweep(jobId);
        if (!isJobCancelledError(error)) {
          logger.warn({ err: error, jobId }, 'sweep failed');
        }
      }
    );
    return jobId;
  }

  private async cancelSweeps(): Promise<boolean> {
    const sweeps = [...this.queue.getActiveJobs(), ...this.queue.getQueuedJobs()]
      .filter(job => job.name === SWEEP_JOB_NAME)
      .map(job => job.jobId);
    for (const jobId of sweeps) {
      this.queue.cancel(jobId, 'Sweep stopped');
    }

    const outcomes = await Promise.allSettled(sweeps.map(jobId => this.queue.waitForJob(jobId)));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected' && !isJobCancelledError(outcome.reason)) {
        logger.warn({ err: outcome.reason, jobId: sweeps[index] }, 'sweep failed while stopping');
      }
    });
    this.sweepJobId = null;
    return sweeps.length > 0;
  }

  private clearSweep(jobId: string): void {
    if (this.sweepJobId === jobId) {
      this.sweepJobId = null;
    }
  }
}
