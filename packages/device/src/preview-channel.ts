import { setTimeout as sleep } from 'node:timers/promises';

import { OutOfRangeError, channelEvaluator, evaluateChannel, maxForBitDepth } from '@lasercal/curves';
import type { BitDepth, CalibrationProfile, Channel, ChannelCurve } from '@lasercal/curves';
import { deviceLogger as logger } from '@lasercal/logger';

import { NotConnectedError, TransportError, isTransportError } from './errors';
import { decodeRgbPacket, encodeRgbPacket } from './packet';
import type { RgbValues } from './packet';
import type { Transport } from './transport';
import { WriteLock } from './write-lock';

export type SweepRepeat = 'once' | 'wrap' | 'bounce';

export interface SweepRequest {
  channel: Channel;
  from: number;
  to: number;
  step: number;
  intervalMs: number;
  repeat?: SweepRepeat;
  /** Send each input as the PWM value itself, skipping curve and threshold */
  raw?: boolean;
}

export interface SweepStep {
  index: number;
  input: number;
  value: number;
  packet: Uint8Array;
}

export interface Sweep extends Iterable<SweepStep> {
  readonly request: Readonly<Required<SweepRequest>>;
}

export interface WriteSweepOptions {
  signal?: AbortSignal;
  onStep?: (step: SweepStep) => void;
}

export interface WriteSweepResult {
  written: number;
  cancelled: boolean;
}

export interface PreviewChannelOptions {
  lock?: WriteLock;
}

const BLACK: RgbValues = { red: 0, green: 0, blue: 0 };

/**
 * Inputs of one pass from `from` to `to`, both included
 */
function* pass(from: number, to: number, step: number): Generator<number> {
  const direction = from <= to ? 1 : -1;
  let input = from;
  while (direction * (to - input) > 0) {
    yield input;
    input += direction * step;
  }
  yield to;
}

function* sweepInputs(from: number, to: number, step: number, repeat: SweepRepeat): Generator<number> {
  if (repeat === 'once' || from === to) {
    yield* pass(from, to, step);
    return;
  }

  if (repeat === 'wrap') {
    for (;;) {
      yield* pass(from, to, step);
    }
  }

  yield* pass(from, to, step);
  let forward = false;
  for (;;) {
    const [start, end] = forward ? [from, to] : [to, from];
    let first = true;
    for (const input of pass(start, end, step)) {
      // the turning point was already sent at the end of the previous pass
      if (first) {
        first = false;
        continue;
      }
      yield input;
    }
    forward = !forward;
  }
}

/**
 * Spot values and sweeps for checking a curve on the laser itself.
 *
 * Every packet goes through one WriteLock, so a sweep in the background and a
 * test value sent from the editor never interleave. The values last written
 * are kept so a sweep can hold the two channels it is not sweeping.
 */
export class PreviewChannel {
  private readonly lock: WriteLock;
  private current: RgbValues = { ...BLACK };

  constructor(private readonly transport: Transport, options: PreviewChannelOptions = {}) {
    this.lock = options.lock ?? new WriteLock();
  }

  get connected(): boolean {
    return this.transport.connected;
  }

  /** Values of the last packet written */
  get lastValues(): RgbValues {
    return { ...this.current };
  }

  async sendTestValues(red: number, green: number, blue: number): Promise<Uint8Array> {
    const packet = encodeRgbPacket(red, green, blue);
    await this.writePacket(packet, { red, green, blue });
    return packet;
  }

  /** Drive one channel with the other two off */
  sendChannel(channel: Channel, value: number): Promise<Uint8Array> {
    const values: RgbValues = { ...BLACK, [channel]: value };
    return this.sendTestValues(values.red, values.green, values.blue);
  }

  /**
   * Evaluate the calibrated output for `input` and show it on its channel.
   * Resolves with the value sent.
   */
  async testPoint(curve: ChannelCurve, bitDepth: BitDepth, channel: Channel, input: number): Promise<number> {
    const max = maxForBitDepth(bitDepth);
    if (!Number.isInteger(input) || input < 0 || input > max) {
      throw new OutOfRangeError('input', input, max);
    }
    const value = evaluateChannel(curve, input, bitDepth);
    await this.sendChannel(channel, value);
    return value;
  }

  blackout(): Promise<Uint8Array> {
    return this.sendTestValues(0, 0, 0);
  }

  /**
   * Lazily computed packets for a sweep over one channel. Nothing is written
   * here; pass the result to `writeSweep`, or iterate it to inspect packets.
   */
  sweep(profile: CalibrationProfile, request: SweepRequest): Sweep {
    this.assertConnected();

    const max = maxForBitDepth(profile.bitDepth);
    for (const [field, value] of [['from', request.from], ['to', request.to]] as const) {
      if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new OutOfRangeError(field, value, max);
      }
    }
    if (!Number.isInteger(request.step) || request.step < 1) {
      throw new RangeError(`sweep step must be a positive integer, got ${request.step}`);
    }
    if (!Number.isFinite(request.intervalMs) || request.intervalMs < 0) {
      throw new RangeError(`sweep interval must be a non-negative number, got ${request.intervalMs}`);
    }

    const resolved: Required<SweepRequest> = {
      ...request,
      repeat: request.repeat ?? 'once',
      raw: request.raw ?? false
    };
    const valueAt = resolved.raw
      ? (input: number) => input
      : channelEvaluator(profile[resolved.channel], profile.bitDepth);
    const held = this.lastValues;

    return {
      request: resolved,
      *[Symbol.iterator]() {
        let index = 0;
        for (const input of sweepInputs(resolved.from, resolved.to, resolved.step, resolved.repeat)) {
          const value = valueAt(input);
          const values: RgbValues = { ...held, [resolved.channel]: value };
          yield { index: index++, input, value, packet: encodeRgbPacket(values.red, values.green, values.blue) };
        }
      }
    };
  }

  /**
   * Write a sweep to the device, waiting `intervalMs` between packets.
   * Cancellation is checked between packets, never in the middle of one.
   */
  async writeSweep(sweep: Sweep, options: WriteSweepOptions = {}): Promise<WriteSweepResult> {
    const { signal, onStep } = options;
    const { channel, intervalMs } = sweep.request;
    let written = 0;
    let cancelled = false;

    logger.debug({ ...sweep.request }, 'sweep started');
    for (const step of sweep) {
      if (written > 0 && intervalMs > 0) {
        try {
          await sleep(intervalMs, undefined, { signal });
        } catch (error) {
          if (signal?.aborted) {
            cancelled = true;
            break;
          }
          throw error;
        }
      }
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      await this.writePacket(step.packet, decodeRgbPacket(step.packet));
      written++;
      onStep?.(step);
    }

    logger.debug({ channel, written, cancelled }, 'sweep finished');
    return { written, cancelled };
  }

  private assertConnected(): void {
    if (!this.transport.connected) {
      throw new NotConnectedError();
    }
  }

  private writePacket(packet: Uint8Array, values: RgbValues): Promise<void> {
    return this.lock.run(async () => {
      this.assertConnected();
      try {
        await this.transport.write(packet);
      } catch (error) {
        if (isTransportError(error)) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Write failed: ${reason}`, { cause: error });
      }
      this.current = { ...values };
      logger.trace({ ...values }, 'packet written');
    });
  }
}
