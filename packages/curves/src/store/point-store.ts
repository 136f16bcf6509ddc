import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { curvesLogger as logger } from '@lasercal/logger';

import {
  DuplicateInputError,
  MinimumPointsError,
  OutOfRangeError,
  PointNotFoundError
} from '../errors';
import { CHANNELS, cloneCurve, createDefaultProfile, maxForBitDepth } from '../curves/types';
import type {
  BitDepth,
  CalibrationPoint,
  CalibrationProfile,
  Channel,
  ChannelCurve,
  ControlPoint,
  InterpolationMode
} from '../curves/types';
import { LutCache } from '../lut/lut-cache';
import { materialize } from '../lut/materializer';
import type { LutSize, MaterializedLUT } from '../lut/types';
import { assertValidProfile } from '../profile/validate';

const MIN_POINTS = 2;

interface ChannelState {
  points: ControlPoint[];
  mode: InterpolationMode;
  threshold: number;
}

export interface PointUpdate {
  input?: number;
  output?: number;
}

export interface CurveChangedEvent {
  channel: Channel;
  reason: 'add' | 'update' | 'remove' | 'mode' | 'threshold' | 'replace';
}

export interface ControlPointStoreOptions {
  idFactory?: () => string;
}

const byInput = (a: CalibrationPoint, b: CalibrationPoint) => a.input - b.input;

/**
 * Owner of the editable calibration points of one profile.
 *
 * Every mutation is validated before anything changes, so a rejected call
 * leaves the store as it was. Mutations drop the channel's cached tables and
 * emit `curve:changed`; tables are rebuilt on the next `materialize`.
 */
export class ControlPointStore extends EventEmitter {
  private bitDepthValue: BitDepth;
  private readonly channels = new Map<Channel, ChannelState>();
  private readonly cache = new LutCache();
  private readonly idFactory: () => string;
  private readonly cursors = new Map<Channel, number>();

  constructor(profile: CalibrationProfile = createDefaultProfile(), options: ControlPointStoreOptions = {}) {
    super();
    assertValidProfile(profile);
    this.idFactory = options.idFactory ?? randomUUID;
    this.bitDepthValue = profile.bitDepth;
    this.loadChannels(profile);
  }

  get bitDepth(): BitDepth {
    return this.bitDepthValue;
  }

  get max(): number {
    return maxForBitDepth(this.bitDepthValue);
  }

  listPoints(channel: Channel): ControlPoint[] {
    return this.state(channel).points.map(point => ({ ...point }));
  }

  getCurve(channel: Channel): ChannelCurve {
    const state = this.state(channel);
    return cloneCurve({
      points: state.points,
      mode: state.mode,
      threshold: state.threshold
    });
  }

  getProfile(): CalibrationProfile {
    return {
      bitDepth: this.bitDepthValue,
      red: this.getCurve('red'),
      green: this.getCurve('green'),
      blue: this.getCurve('blue')
    };
  }

  add(channel: Channel, point: CalibrationPoint): ControlPoint {
    this.assertPointInRange(point.input, point.output);
    const state = this.state(channel);
    if (state.points.some(existing => existing.input === point.input)) {
      throw new DuplicateInputError(channel, point.input);
    }

    const created: ControlPoint = { id: this.idFactory(), input: point.input, output: point.output };
    state.points = [...state.points, created].sort(byInput);
    this.changed(channel, 'add');
    return { ...created };
  }

  update(channel: Channel, pointId: string, changes: PointUpdate): ControlPoint {
    const state = this.state(channel);
    const current = this.findPoint(channel, pointId);
    const next: ControlPoint = {
      id: current.id,
      input: changes.input ?? current.input,
      output: changes.output ?? current.output
    };

    this.assertPointInRange(next.input, next.output);
    if (state.points.some(existing => existing.id !== pointId && existing.input === next.input)) {
      throw new DuplicateInputError(channel, next.input);
    }

    state.points = state.points.map(point => (point.id === pointId ? next : point)).sort(byInput);
    this.changed(channel, 'update');
    return { ...next };
  }

  remove(channel: Channel, pointId: string): void {
    const state = this.state(channel);
    this.findPoint(channel, pointId);
    if (state.points.length - 1 < MIN_POINTS) {
      throw new MinimumPointsError(channel);
    }

    state.points = state.points.filter(point => point.id !== pointId);
    this.changed(channel, 'remove');
  }

  /**
   * Insert a point halfway between two neighbouring points, its output the
   * midpoint of theirs. Returns null when no integer input lies between them
   * or the midpoint input is already taken.
   */
  splitSegment(channel: Channel, lowerId: string, upperId: string): ControlPoint | null {
    const lower = this.findPoint(channel, lowerId);
    const upper = this.findPoint(channel, upperId);
    const [from, to] = lower.input <= upper.input ? [lower, upper] : [upper, lower];

    const input = Math.floor((from.input + to.input) / 2);
    if (input === from.input || input === to.input) {
      return null;
    }
    if (this.state(channel).points.some(point => point.input === input)) {
      return null;
    }

    return this.add(channel, {
      input,
      output: Math.floor((from.output + to.output) / 2)
    });
  }

  setMode(channel: Channel, mode: InterpolationMode): void {
    const state = this.state(channel);
    if (state.mode === mode) {
      return;
    }
    state.mode = mode;
    this.changed(channel, 'mode');
  }

  setThreshold(channel: Channel, threshold: number): void {
    if (!Number.isInteger(threshold) || threshold < 0 || threshold >= this.max) {
      throw new OutOfRangeError('threshold', threshold, this.max - 1);
    }
    const state = this.state(channel);
    if (state.threshold === threshold) {
      return;
    }
    state.threshold = threshold;
    this.changed(channel, 'threshold');
  }

  /**
   * Swap in a freshly loaded profile; ids are reassigned
   */
  replaceProfile(profile: CalibrationProfile): void {
    assertValidProfile(profile);
    this.bitDepthValue = profile.bitDepth;
    this.loadChannels(profile);
    this.cache.clear();
    this.cursors.clear();
    for (const channel of CHANNELS) {
      this.emit('curve:changed', { channel, reason: 'replace' } satisfies CurveChangedEvent);
    }
  }

  /**
   * Point after the last one returned for this channel, wrapping around.
   * Used to step through points one by one while testing on the device.
   */
  nextPoint(channel: Channel): ControlPoint {
    const points = this.state(channel).points;
    const cursor = ((this.cursors.get(channel) ?? -1) + 1) % points.length;
    this.cursors.set(channel, cursor);
    return { ...points[cursor] };
  }

  /** Table for a channel; each call returns its own copy of the cached table */
  materialize(channel: Channel, size: LutSize): MaterializedLUT {
    const lut = this.cache.getOrBuild(channel, size, () =>
      materialize(this.getCurve(channel), size, { channel, bitDepth: this.bitDepthValue })
    );
    return { ...lut, table: lut.table.slice() };
  }

  get cachedTableCount(): number {
    return this.cache.size();
  }

  private loadChannels(profile: CalibrationProfile): void {
    for (const channel of CHANNELS) {
      const curve = profile[channel];
      this.channels.set(channel, {
        points: curve.points.map(point => ({ id: this.idFactory(), input: point.input, output: point.output })).sort(byInput),
        mode: curve.mode,
        threshold: curve.threshold
      });
    }
  }

  private state(channel: Channel): ChannelState {
    const state = this.channels.get(channel);
    if (!state) {
      throw new Error(`Unknown channel: ${String(channel)}`);
    }
    return state;
  }

  private findPoint(channel: Channel, pointId: string): ControlPoint {
    const point = this.state(channel).points.find(candidate => candidate.id === pointId);
    if (!point) {
      throw new PointNotFoundError(channel, pointId);
    }
    return point;
  }

  private assertPointInRange(input: number, output: number): void {
    const max = this.max;
    if (!Number.isInteger(input) || input < 0 || input > max) {
      throw new OutOfRangeError('input', input, max);
    }
    if (!Number.isInteger(output) || output < 0 || output > max) {
      throw new OutOfRangeError('output', output, max);
    }
  }

  private changed(channel: Channel, reason: CurveChangedEvent['reason']): void {
    this.cache.invalidate(channel);
    logger.debug({ channel, reason }, 'curve changed');
    this.emit('curve:changed', { channel, reason } satisfies CurveChangedEvent);
  }
}
