import { exportHeader } from '@lasercal/curves';
import type { CalibrationProfile, HeaderExportOptions, LutSize } from '@lasercal/curves';
import { engineLogger as logger } from '@lasercal/logger';

import { writeFileAtomic } from './atomic-file';
import { JobCancelledError } from './job-errors';
import type { QueueJobOptions } from './types';

export interface ExportJobOptions {
  size: LutSize;
  outputPath: string;
  header?: HeaderExportOptions;
}

/**
 * Render the firmware header and write it atomically. A cancelled export
 * writes nothing: the signal is checked before rendering and again before
 * the file is touched.
 */
export function createExportJob(profile: CalibrationProfile, options: ExportJobOptions): QueueJobOptions<string> {
  return {
    name: 'export',
    total: 2,
    metadata: { size: options.size, outputPath: options.outputPath },
    execute: async ({ signal, progress }) => {
      if (signal.aborted) {
        throw new JobCancelledError('Export cancelled before it started');
      }
      const text = exportHeader(profile, options.size, options.header);
      progress.advance(1);

      if (signal.aborted) {
        throw new JobCancelledError('Export cancelled before writing');
      }
      await writeFileAtomic(options.outputPath, text);
      progress.advance(2);

      logger.info({ outputPath: options.outputPath, size: options.size }, 'header exported');
      return { outputPath: options.outputPath, result: text };
    }
  };
}
