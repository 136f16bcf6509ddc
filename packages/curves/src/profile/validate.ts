import { InvalidProfileError } from '../errors';
import { CHANNELS, isBitDepth, isInterpolationMode, maxForBitDepth } from '../curves/types';
import type { CalibrationProfile, ChannelCurve } from '../curves/types';

const isIntegerIn = (value: number, max: number) => Number.isInteger(value) && value >= 0 && value <= max;

export function collectCurveIssues(label: string, curve: ChannelCurve, max: number): string[] {
  const issues: string[] = [];

  if (!isInterpolationMode(curve.mode)) {
    issues.push(`${label}: unknown mode '${String(curve.mode)}'`);
  }
  if (!Number.isInteger(curve.threshold) || curve.threshold < 0 || curve.threshold >= max) {
    issues.push(`${label}: threshold ${curve.threshold} is outside [0, ${max - 1}]`);
  }
  if (curve.points.length < 2) {
    issues.push(`${label}: needs at least 2 points, found ${curve.points.length}`);
  }

  const seen = new Set<number>();
  curve.points.forEach((point, index) => {
    if (!isIntegerIn(point.input, max)) {
      issues.push(`${label}.points[${index}]: input ${point.input} is outside [0, ${max}]`);
    }
    if (!isIntegerIn(point.output, max)) {
      issues.push(`${label}.points[${index}]: output ${point.output} is outside [0, ${max}]`);
    }
    if (seen.has(point.input)) {
      issues.push(`${label}.points[${index}]: duplicate input ${point.input}`);
    }
    seen.add(point.input);
  });

  return issues;
}

export function collectProfileIssues(profile: CalibrationProfile): string[] {
  if (!isBitDepth(profile.bitDepth)) {
    return [`bitDepth ${String(profile.bitDepth)} is not 12 or 16`];
  }
  const max = maxForBitDepth(profile.bitDepth);
  return CHANNELS.flatMap(channel => collectCurveIssues(channel, profile[channel], max));
}

/**
 * Throws InvalidProfileError listing every problem found
 */
export function assertValidProfile(profile: CalibrationProfile): void {
  const issues = collectProfileIssues(profile);
  if (issues.length > 0) {
    throw new InvalidProfileError(issues);
  }
}
