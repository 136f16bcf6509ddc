import fs from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  ControlPointStore,
  OutOfRangeError,
  PointNotFoundError,
  createDefaultProfile,
  evaluateChannel,
  loadProfile,
  maxForBitDepth,
  saveProfile
} from '@lasercal/curves';
import type {
  BitDepth,
  CalibrationPoint,
  CalibrationProfile,
  Channel,
  InterpolationMode,
  LutSize,
  MaterializedLUT,
  PointUpdate
} from '@lasercal/curves';
import { PreviewChannel, SerialTransport, listPorts, withTransport } from '@lasercal/device';
import type {
  ClosableTransport,
  SerialTransportOptions,
  SweepRepeat,
  SweepRequest,
  SweepStep,
  WriteSweepResult
} from '@lasercal/device';
import { CalibrationSession, JobQueue, createExportJob, isJobCancelledError, writeFileAtomic } from '@lasercal/engine';
import { cliLogger as logger } from '@lasercal/logger';
import {
  SETTING_KEYS,
  applySetting,
  getSetting,
  isSettingKey,
  loadSettings,
  updateSettings
} from '@lasercal/settings';
import type { LasercalSettings } from '@lasercal/settings';

import { UsageError } from './parse';

export interface LasercalContext {
  loadSettings: typeof loadSettings;
  updateSettings: typeof updateSettings;
  openTransport: (options: SerialTransportOptions) => Promise<ClosableTransport>;
  listPorts: typeof listPorts;
}

/* c8 ignore start */
export const createLasercalContext = (): LasercalContext => ({
  loadSettings,
  updateSettings,
  openTransport: options => SerialTransport.open(options),
  listPorts
});
/* c8 ignore end */

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readProfile = async (profilePath: string): Promise<CalibrationProfile> => {
  let text: string;
  try {
    text = await fs.readFile(profilePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new UsageError(`Profile ${profilePath} not found. Run 'lasercal profile init' first`);
    }
    throw error;
  }
  return loadProfile(text);
};

const writeProfile = (profilePath: string, profile: CalibrationProfile): Promise<void> =>
  writeFileAtomic(profilePath, saveProfile(profile));

/**
 * Load the profile, apply `edit` and write it back. Nothing is written when
 * `edit` throws.
 */
const editProfile = async <T>(profilePath: string, edit: (store: ControlPointStore) => T): Promise<T> => {
  const store = new ControlPointStore(await readProfile(profilePath));
  const result = edit(store);
  await writeProfile(profilePath, store.getProfile());
  return result;
};

// ids only live as long as a store, so the CLI addresses points by input
const pointIdAt = (store: ControlPointStore, channel: Channel, input: number): string => {
  const point = store.listPoints(channel).find(candidate => candidate.input === input);
  if (!point) {
    throw new PointNotFoundError(channel, `@${input}`);
  }
  return point.id;
};

const toPoint = ({ input, output }: CalibrationPoint): CalibrationPoint => ({ input, output });

const serialOptions = (port: string | undefined, settings: LasercalSettings): SerialTransportOptions => {
  const path = port ?? settings.serial.path;
  if (!path) {
    throw new UsageError("No serial port given. Pass --port or run 'lasercal settings set serial.path <path>'");
  }
  return { path, baudRate: settings.serial.baudRate };
};

const hold = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (ms <= 0 || signal?.aborted) {
    return;
  }
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) {
      throw error;
    }
  }
};

export interface InitProfileActionInput {
  profilePath: string;
  bitDepth?: BitDepth;
  force: boolean;
}

export const initProfileAction = async (
  input: InitProfileActionInput,
  ctx = createLasercalContext()
): Promise<CalibrationProfile> => {
  if (!input.force) {
    const exists = await fs.access(input.profilePath).then(
      () => true,
      () => false
    );
    if (exists) {
      throw new UsageError(`${input.profilePath} already exists. Pass --force to overwrite it`);
    }
  }
  const settings = await ctx.loadSettings();
  const profile = createDefaultProfile(input.bitDepth ?? settings.bitDepth);
  await writeProfile(input.profilePath, profile);
  logger.info({ path: input.profilePath, bitDepth: profile.bitDepth }, 'profile created');
  return profile;
};

export const showProfileAction = (profilePath: string): Promise<CalibrationProfile> => readProfile(profilePath);

export interface PointActionInput {
  profilePath: string;
  channel: Channel;
  input: number;
}

export const addPointAction = (input: PointActionInput & { output: number }): Promise<CalibrationPoint> =>
  editProfile(input.profilePath, store =>
    toPoint(store.add(input.channel, { input: input.input, output: input.output }))
  );

export const setPointAction = (input: PointActionInput & { changes: PointUpdate }): Promise<CalibrationPoint> =>
  editProfile(input.profilePath, store =>
    toPoint(store.update(input.channel, pointIdAt(store, input.channel, input.input), input.changes))
  );

export const removePointAction = (input: PointActionInput): Promise<void> =>
  editProfile(input.profilePath, store => {
    store.remove(input.channel, pointIdAt(store, input.channel, input.input));
  });

export interface SplitPointActionInput {
  profilePath: string;
  channel: Channel;
  lower: number;
  upper: number;
}

/** Resolves with the inserted point, or null when the inputs are adjacent */
export const splitPointAction = (input: SplitPointActionInput): Promise<CalibrationPoint | null> =>
  editProfile(input.profilePath, store => {
    const point = store.splitSegment(
      input.channel,
      pointIdAt(store, input.channel, input.lower),
      pointIdAt(store, input.channel, input.upper)
    );
    return point ? toPoint(point) : null;
  });

export const setModeAction = (input: { profilePath: string; channel: Channel; mode: InterpolationMode }) =>
  editProfile(input.profilePath, store => store.setMode(input.channel, input.mode));

export const setThresholdAction = (input: { profilePath: string; channel: Channel; threshold: number }) =>
  editProfile(input.profilePath, store => store.setThreshold(input.channel, input.threshold));

export interface EvalCurveActionInput {
  profilePath: string;
  channel: Channel;
  inputs: number[];
}

export const evalCurveAction = async (input: EvalCurveActionInput): Promise<Array<{ input: number; value: number }>> => {
  const profile = await readProfile(input.profilePath);
  const max = maxForBitDepth(profile.bitDepth);
  return input.inputs.map(value => {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new OutOfRangeError('input', value, max);
    }
    return { input: value, value: evaluateChannel(profile[input.channel], value, profile.bitDepth) };
  });
};

export interface LutActionInput {
  profilePath: string;
  channel: Channel;
  size?: LutSize;
}

export const lutAction = async (input: LutActionInput, ctx = createLasercalContext()): Promise<MaterializedLUT> => {
  const size = input.size ?? (await ctx.loadSettings()).lutSize;
  const store = new ControlPointStore(await readProfile(input.profilePath));
  return store.materialize(input.channel, size);
};

export interface ExportActionInput {
  profilePath: string;
  outputPath: string;
  size?: LutSize;
}

export const exportAction = async (
  input: ExportActionInput,
  ctx = createLasercalContext()
): Promise<{ outputPath: string; size: LutSize }> => {
  const settings = await ctx.loadSettings();
  const profile = await readProfile(input.profilePath);
  const size = input.size ?? settings.lutSize;

  const queue = new JobQueue();
  const jobId = queue.enqueue(
    createExportJob(profile, {
      size,
      outputPath: input.outputPath,
      header: { attribute: settings.export.attribute, valuesPerRow: settings.export.valuesPerRow }
    })
  );
  const result = await queue.waitForJob(jobId);
  return { outputPath: result.outputPath ?? input.outputPath, size };
};

export const listPortsAction = (ctx = createLasercalContext()): Promise<string[]> => ctx.listPorts();

export interface DeviceActionInput {
  port?: string;
  holdMs: number;
  signal?: AbortSignal;
}

export interface SendActionInput extends DeviceActionInput {
  red: number;
  green: number;
  blue: number;
}

/**
 * Write raw PWM values, keep them on for `holdMs`, then release the port
 * (closing blacks the laser out)
 */
export const sendAction = async (input: SendActionInput, ctx = createLasercalContext()): Promise<Uint8Array> => {
  const settings = await ctx.loadSettings();
  return withTransport(
    () => ctx.openTransport(serialOptions(input.port, settings)),
    async transport => {
      const packet = await new PreviewChannel(transport).sendTestValues(input.red, input.green, input.blue);
      await hold(input.holdMs, input.signal);
      return packet;
    }
  );
};

export interface TestPointActionInput extends DeviceActionInput {
  profilePath: string;
  channel: Channel;
  input: number;
}

/** Show the calibrated output for one input; resolves with the value sent */
export const testPointAction = async (input: TestPointActionInput, ctx = createLasercalContext()): Promise<number> => {
  const settings = await ctx.loadSettings();
  const profile = await readProfile(input.profilePath);
  return withTransport(
    () => ctx.openTransport(serialOptions(input.port, settings)),
    async transport => {
      const session = new CalibrationSession({
        preview: new PreviewChannel(transport),
        store: new ControlPointStore(profile)
      });
      const value = await session.testPoint(input.channel, input.input);
      await hold(input.holdMs, input.signal);
      return value;
    }
  );
};

export interface SweepActionInput {
  profilePath: string;
  port?: string;
  channel: Channel;
  from?: number;
  to?: number;
  step?: number;
  intervalMs?: number;
  repeat?: SweepRepeat;
  raw?: boolean;
  signal?: AbortSignal;
  onStep?: (step: SweepStep) => void;
}

/**
 * Run a sweep until it ends or `signal` fires. Missing bounds cover the whole
 * input range; step and interval default to the settings.
 */
export const sweepAction = async (input: SweepActionInput, ctx = createLasercalContext()): Promise<WriteSweepResult> => {
  const settings = await ctx.loadSettings();
  const profile = await readProfile(input.profilePath);
  const request: SweepRequest = {
    channel: input.channel,
    from: input.from ?? 0,
    to: input.to ?? maxForBitDepth(profile.bitDepth),
    step: input.step ?? settings.sweep.step,
    intervalMs: input.intervalMs ?? settings.sweep.intervalMs,
    repeat: input.repeat ?? 'once',
    raw: input.raw ?? false
  };

  return withTransport(
    () => ctx.openTransport(serialOptions(input.port, settings)),
    async transport => {
      const session = new CalibrationSession({
        preview: new PreviewChannel(transport),
        store: new ControlPointStore(profile)
      });
      let written = 0;
      const jobId = await session.startSweep(request, {
        onStep: step => {
          written += 1;
          input.onStep?.(step);
        }
      });
      const stop = () => {
        session.queue.cancel(jobId, 'Sweep stopped');
      };
      if (input.signal?.aborted) {
        stop();
      }
      input.signal?.addEventListener('abort', stop, { once: true });

      try {
        await session.queue.waitForJob(jobId);
        return { written, cancelled: false };
      } catch (error) {
        if (isJobCancelledError(error)) {
          return { written, cancelled: true };
        }
        throw error;
      } finally {
        input.signal?.removeEventListener('abort', stop);
        await session.close();
      }
    }
  );
};

export interface FindThresholdInput {
  profilePath: string;
  port?: string;
  channel: Channel;
  to?: number;
  step?: number;
  intervalMs?: number;
  signal?: AbortSignal;
  onStep?: (step: SweepStep) => void;
}

export interface FindThresholdResult extends WriteSweepResult {
  /** Last PWM value sent before the sweep ended, null when nothing was sent */
  lastValue: number | null;
}

/**
 * Slow raw ramp from 0 for spotting where the diode starts to emit. Stop it
 * when the laser lights up; `lastValue` is then the threshold to set.
 */
export const findThresholdAction = async (
  input: FindThresholdInput,
  ctx = createLasercalContext()
): Promise<FindThresholdResult> => {
  let lastValue: number | null = null;
  const result = await sweepAction(
    {
      profilePath: input.profilePath,
      port: input.port,
      channel: input.channel,
      from: 0,
      to: input.to ?? 2000,
      step: input.step ?? 10,
      intervalMs: input.intervalMs ?? 50,
      raw: true,
      signal: input.signal,
      onStep: step => {
        lastValue = step.value;
        input.onStep?.(step);
      }
    },
    ctx
  );
  return { ...result, lastValue };
};

export const showSettingsAction = async (ctx = createLasercalContext()): Promise<LasercalSettings> =>
  ctx.loadSettings();

export const setSettingAction = async (
  input: { key: string; value: string },
  ctx = createLasercalContext()
): Promise<{ key: string; value: string | number | null }> => {
  const { key } = input;
  if (!isSettingKey(key)) {
    throw new UsageError(`Unknown setting '${key}'. Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  const updated = await ctx.updateSettings(current => applySetting(current, key, input.value));
  return { key, value: getSetting(updated, key) };
};
