import { describe, expect, it } from 'vitest';

import { createDefaultProfile } from '@lasercal/curves';
import { PreviewChannel } from '@lasercal/device';
import type { Transport } from '@lasercal/device';

import { JobQueue } from './job-queue';
import { countSweepSteps, createSweepJob } from './sweep-job';
import type { JobSnapshot } from './types';

class FakeTransport implements Transport {
  connected = true;
  readonly packets: number[][] = [];

  async write(bytes: Uint8Array): Promise<void> {
    this.packets.push(Array.from(bytes));
  }
}

describe('countSweepSteps', () => {
  it('counts both ends of a single pass', () => {
    expect(countSweepSteps({ channel: 'red', from: 0, to: 10, step: 4, intervalMs: 0 })).toBe(4);
    expect(countSweepSteps({ channel: 'red', from: 8, to: 0, step: 4, intervalMs: 0 })).toBe(3);
    expect(countSweepSteps({ channel: 'red', from: 5, to: 5, step: 1, intervalMs: 0, repeat: 'wrap' })).toBe(1);
  });

  it('has no total for repeating sweeps', () => {
    expect(countSweepSteps({ channel: 'red', from: 0, to: 10, step: 1, intervalMs: 0, repeat: 'bounce' })).toBeNull();
  });
});

describe('createSweepJob', () => {
  it('writes every packet and reports progress through the queue', async () => {
    const transport = new FakeTransport();
    const preview = new PreviewChannel(transport);
    const queue = new JobQueue();
    const ratios: number[] = [];
    queue.on('job:progress', (snapshot: JobSnapshot) => ratios.push(snapshot.progress.ratio));

    const jobId = queue.enqueue(
      createSweepJob(preview, createDefaultProfile(12), { channel: 'blue', from: 0, to: 4095, step: 2048, intervalMs: 0 })
    );
    const result = await queue.waitForJob(jobId);

    expect(result.result).toEqual({ written: 3, cancelled: false });
    expect(transport.packets.map(packet => packet.slice(4))).toEqual([
      [0x00, 0x00],
      [0x00, 0x08],
      [0xff, 0x0f]
    ]);
    expect(ratios).toEqual([1 / 3, 2 / 3, 1]);
  });

  it('stops a repeating sweep when the job is cancelled', async () => {
    const transport = new FakeTransport();
    const preview = new PreviewChannel(transport);
    const queue = new JobQueue();

    const jobId = queue.enqueue(
      createSweepJob(
        preview,
        createDefaultProfile(12),
        { channel: 'red', from: 0, to: 100, step: 10, intervalMs: 0, repeat: 'wrap' },
        {
          onStep: step => {
            if (step.index === 24) {
              queue.cancel(jobId);
            }
          }
        }
      )
    );

    await expect(queue.waitForJob(jobId)).rejects.toThrow('Cancelled');
    expect(transport.packets).toHaveLength(25);
  });
});
