import { CHANNELS, INTERPOLATION_MODES, LUT_SIZES, isBitDepth, isChannel, isInterpolationMode, isLutSize } from '@lasercal/curves';
import type { BitDepth, Channel, InterpolationMode, LutSize } from '@lasercal/curves';
import type { SweepRepeat } from '@lasercal/device';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const isUsageError = (error: unknown): error is UsageError => error instanceof UsageError;

const SWEEP_REPEATS: readonly SweepRepeat[] = ['once', 'wrap', 'bounce'];

export const parseInteger = (label: string, raw: string, min = 0): number => {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value) || value < min) {
    throw new UsageError(`${label} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
};

export const parseChannel = (raw: string): Channel => {
  const value = raw.trim().toLowerCase();
  if (!isChannel(value)) {
    throw new UsageError(`channel must be one of ${CHANNELS.join(', ')}, got '${raw}'`);
  }
  return value;
};

export const parseMode = (raw: string): InterpolationMode => {
  const value = raw.trim().toLowerCase();
  if (!isInterpolationMode(value)) {
    throw new UsageError(`mode must be one of ${INTERPOLATION_MODES.join(', ')}, got '${raw}'`);
  }
  return value;
};

export const parseBitDepth = (raw: string): BitDepth => {
  const value = parseInteger('bit depth', raw);
  if (!isBitDepth(value)) {
    throw new UsageError(`bit depth must be 12 or 16, got '${raw}'`);
  }
  return value;
};

export const parseLutSize = (raw: string): LutSize => {
  const value = parseInteger('LUT size', raw);
  if (!isLutSize(value)) {
    throw new UsageError(`LUT size must be one of ${LUT_SIZES.join(', ')}, got '${raw}'`);
  }
  return value;
};

export const parseRepeat = (raw: string): SweepRepeat => {
  const value = raw.trim().toLowerCase();
  const repeat = SWEEP_REPEATS.find(candidate => candidate === value);
  if (!repeat) {
    throw new UsageError(`repeat must be one of ${SWEEP_REPEATS.join(', ')}, got '${raw}'`);
  }
  return repeat;
};
