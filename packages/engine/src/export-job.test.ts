import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createDefaultProfile, exportHeader } from '@lasercal/curves';

import { createExportJob } from './export-job';
import { JobCancelledError } from './job-errors';
import { JobProgressTracker } from './job-progress';

describe('createExportJob', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lasercal-export-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the rendered header to the output path', async () => {
    const profile = createDefaultProfile(12);
    const outputPath = path.join(dir, 'laser_lut.h');
    const job = createExportJob(profile, { size: 256, outputPath, header: { attribute: '' } });
    const progress = new JobProgressTracker(job.total ?? null);

    const result = await job.execute({ signal: new AbortController().signal, progress });

    expect(result.outputPath).toBe(outputPath);
    expect(await fs.readFile(outputPath, 'utf8')).toBe(exportHeader(profile, 256, { attribute: '' }));
    expect(progress.snapshot().ratio).toBe(1);
  });

  it('writes nothing when cancelled before it starts', async () => {
    const outputPath = path.join(dir, 'laser_lut.h');
    const job = createExportJob(createDefaultProfile(12), { size: 256, outputPath });
    const controller = new AbortController();
    controller.abort();

    await expect(job.execute({ signal: controller.signal, progress: new JobProgressTracker() })).rejects.toThrow(
      JobCancelledError
    );
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
