import type { CalibrationProfile } from '@lasercal/curves';
import type { PreviewChannel, SweepRequest, SweepStep, WriteSweepResult } from '@lasercal/device';

import type { QueueJobOptions } from './types';

export const SWEEP_JOB_NAME = 'sweep';

export interface SweepJobOptions {
  onStep?: (step: SweepStep) => void;
}

/** Packets in one pass of a sweep; null when it repeats forever */
export const countSweepSteps = (request: SweepRequest): number | null => {
  const repeat = request.repeat ?? 'once';
  if (request.from === request.to) {
    return 1;
  }
  if (repeat !== 'once') {
    return null;
  }
  return Math.ceil(Math.abs(request.to - request.from) / request.step) + 1;
};

export function createSweepJob(
  preview: PreviewChannel,
  profile: CalibrationProfile,
  request: SweepRequest,
  options: SweepJobOptions = {}
): QueueJobOptions<WriteSweepResult> {
  return {
    name: SWEEP_JOB_NAME,
    total: countSweepSteps(request),
    metadata: { ...request },
    execute: async ({ signal, progress }) => {
      const sweep = preview.sweep(profile, request);
      const result = await preview.writeSweep(sweep, {
        signal,
        onStep: step => {
          progress.advance(step.index + 1);
          options.onStep?.(step);
        }
      });
      return { result };
    }
  };
}
