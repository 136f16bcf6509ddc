import type { Channel } from './curves/types';

export class DuplicateInputError extends Error {
  constructor(public readonly channel: Channel, public readonly input: number) {
    super(`${channel} already has a point at input ${input}`);
    this.name = 'DuplicateInputError';
  }
}

export const isDuplicateInputError = (error: unknown): error is DuplicateInputError =>
  error instanceof DuplicateInputError;

export class OutOfRangeError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: number,
    public readonly max: number
  ) {
    super(`${field} ${value} is outside [0, ${max}]`);
    this.name = 'OutOfRangeError';
  }
}

export const isOutOfRangeError = (error: unknown): error is OutOfRangeError => error instanceof OutOfRangeError;

export class MinimumPointsError extends Error {
  constructor(public readonly channel: Channel) {
    super(`${channel} must keep at least 2 points`);
    this.name = 'MinimumPointsError';
  }
}

export const isMinimumPointsError = (error: unknown): error is MinimumPointsError =>
  error instanceof MinimumPointsError;

export class PointNotFoundError extends Error {
  constructor(public readonly channel: Channel, public readonly pointId: string) {
    super(`${channel} has no point '${pointId}'`);
    this.name = 'PointNotFoundError';
  }
}

export const isPointNotFoundError = (error: unknown): error is PointNotFoundError =>
  error instanceof PointNotFoundError;

export class InvalidProfileError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid profile: ${issues.join('; ')}`);
    this.name = 'InvalidProfileError';
  }
}

export const isInvalidProfileError = (error: unknown): error is InvalidProfileError =>
  error instanceof InvalidProfileError;

/**
 * Raised when a state the store makes impossible reaches the interpolator.
 * Callers are not expected to recover from it.
 */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalConsistencyError';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InternalConsistencyError(message);
  }
}
