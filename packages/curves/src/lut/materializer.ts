/**
 * LUT materializer
 * Samples a channel curve at every index of a firmware table
 */

import { curvesLogger as logger } from '@lasercal/logger';

import { evaluatePrepared, prepareCurve, roundHalfUp } from '../curves/interpolator';
import { maxForBitDepth } from '../curves/types';
import type { BitDepth, CalibrationPoint, Channel, ChannelCurve } from '../curves/types';
import type { LutSize, MaterializedLUT } from './types';

export interface MaterializeOptions {
    channel: Channel;
    bitDepth: BitDepth;
}

/**
 * Input in the curve's native domain for LUT index i.
 * Sizes other than max + 1 are resampled with round-half-up.
 */
export function lutIndexToInput(index: number, size: LutSize, bitDepth: BitDepth): number {
    const max = maxForBitDepth(bitDepth);
    if (size === max + 1) {
        return index;
    }
    return roundHalfUp((index * max) / (size - 1));
}

/**
 * Lift a non-zero input's value into [threshold, max] so the laser never
 * receives a PWM value below its lasing threshold
 */
export function applyThreshold(value: number, input: number, threshold: number, max: number): number {
    if (threshold <= 0 || input <= 0) {
        return value;
    }
    return roundHalfUp(threshold + (value * (max - threshold)) / max);
}

const clampOutput = (value: number, max: number): number => Math.max(0, Math.min(max, value));

/**
 * Prepare a curve once and map inputs to final PWM values: interpolation,
 * threshold and clamp
 */
export function channelEvaluator(curve: ChannelCurve, bitDepth: BitDepth): (input: number) => number {
    const max = maxForBitDepth(bitDepth);
    const prepared = prepareCurve(curve);
    return input => clampOutput(applyThreshold(evaluatePrepared(prepared, input), input, curve.threshold, max), max);
}

/** Final PWM value for a single input */
export function evaluateChannel(curve: ChannelCurve, input: number, bitDepth: BitDepth): number {
    return channelEvaluator(curve, bitDepth)(input);
}

/**
 * true when outputs never decrease as inputs increase
 */
export function isNonDecreasing(points: readonly CalibrationPoint[]): boolean {
    const sorted = [...points].sort((a, b) => a.input - b.input);
    for (let i = 1; i < sorted.length; i++) {
        if (sorted[i].output < sorted[i - 1].output) {
            return false;
        }
    }
    return true;
}

function tableIsNonDecreasing(table: Uint16Array): boolean {
    for (let i = 1; i < table.length; i++) {
        if (table[i] < table[i - 1]) {
            return false;
        }
    }
    return true;
}

/**
 * Build the dense table for one channel
 *
 * @example
 * ```ts
 * const lut = materialize(profile.red, 4096, { channel: 'red', bitDepth: profile.bitDepth });
 * lut.table[4095]; // output at full drive
 * ```
 */
export function materialize(curve: ChannelCurve, size: LutSize, options: MaterializeOptions): MaterializedLUT {
    const evaluateInput = channelEvaluator(curve, options.bitDepth);
    const table = new Uint16Array(size);

    for (let i = 0; i < size; i++) {
        table[i] = evaluateInput(lutIndexToInput(i, size, options.bitDepth));
    }

    const monotonic = tableIsNonDecreasing(table);
    if (!monotonic) {
        logger.warn(
            { channel: options.channel, size, pointsMonotonic: isNonDecreasing(curve.points) },
            `${options.channel} LUT decreases somewhere; check the calibration points`
        );
    }

    return { channel: options.channel, size, table, monotonic };
}
