import { invariant } from '../errors';
import type { CalibrationPoint, ChannelCurve, InterpolationMode } from './types';

/**
 * Fritsch-Carlson limit: tangent/secant ratios above this allow overshoot
 */
const MONOTONE_TANGENT_LIMIT = 3;

/**
 * Curve with sorted coordinate arrays and, for monotone-cubic, its tangents.
 * Building a LUT prepares once and evaluates thousands of times.
 */
export interface PreparedCurve {
    mode: InterpolationMode;
    xs: number[];
    ys: number[];
    tangents: number[] | null;
}

/**
 * Round to the nearest integer, halves away from zero for the non-negative
 * values used here (2.5 -> 3)
 */
export const roundHalfUp = (value: number): number => Math.floor(value + 0.5);

/**
 * Secant slope of every segment
 */
export function computeSecants(xs: readonly number[], ys: readonly number[]): number[] {
    const secants: number[] = [];
    for (let i = 0; i < xs.length - 1; i++) {
        secants.push((ys[i + 1] - ys[i]) / (xs[i + 1] - xs[i]));
    }
    return secants;
}

/**
 * Tangents for a shape-preserving cubic Hermite curve (Fritsch-Carlson)
 *
 * Interior tangents start as the mean of the adjacent secants (0 at a local
 * extremum), endpoints take their single secant. A flat segment pins both of
 * its tangents to 0 and any tangent steeper than 3x its segment's secant is
 * cut back to 3x, which keeps each segment monotone.
 */
export function computeMonotoneTangents(xs: readonly number[], ys: readonly number[]): number[] {
    const n = xs.length;
    const secants = computeSecants(xs, ys);
    const tangents = new Array<number>(n).fill(0);

    tangents[0] = secants[0];
    tangents[n - 1] = secants[n - 2];
    for (let i = 1; i < n - 1; i++) {
        const before = secants[i - 1];
        const after = secants[i];
        tangents[i] = before * after <= 0 ? 0 : (before + after) / 2;
    }

    for (let i = 0; i < n - 1; i++) {
        const secant = secants[i];
        if (secant === 0) {
            tangents[i] = 0;
            tangents[i + 1] = 0;
            continue;
        }

        const alpha = tangents[i] / secant;
        const beta = tangents[i + 1] / secant;
        if (alpha > MONOTONE_TANGENT_LIMIT) {
            tangents[i] = MONOTONE_TANGENT_LIMIT * secant;
        }
        if (beta > MONOTONE_TANGENT_LIMIT) {
            tangents[i + 1] = MONOTONE_TANGENT_LIMIT * secant;
        }
    }

    return tangents;
}

export function prepareCurve(curve: Pick<ChannelCurve, 'points' | 'mode'>): PreparedCurve {
    invariant(curve.points.length >= 2, `curve needs at least 2 points, got ${curve.points.length}`);

    const sorted: CalibrationPoint[] = [...curve.points].sort((a, b) => a.input - b.input);
    const xs = sorted.map(point => point.input);
    const ys = sorted.map(point => point.output);
    for (let i = 1; i < xs.length; i++) {
        invariant(xs[i] > xs[i - 1], `duplicate input ${xs[i]} reached the interpolator`);
    }

    return {
        mode: curve.mode,
        xs,
        ys,
        tangents: curve.mode === 'monotone-cubic' ? computeMonotoneTangents(xs, ys) : null,
    };
}

/**
 * Index of the segment [xs[i], xs[i + 1]] containing x, for xs[0] < x < xs[n - 1]
 */
function findSegment(xs: readonly number[], x: number): number {
    let lo = 0;
    let hi = xs.length - 1;
    while (hi - lo > 1) {
        const mid = (lo + hi) >> 1;
        if (xs[mid] <= x) {
            lo = mid;
        } else {
            hi = mid;
        }
    }
    return lo;
}

function hermite(prepared: PreparedCurve, tangents: readonly number[], i: number, x: number): number {
    const { xs, ys } = prepared;
    const x0 = xs[i];
    const y0 = ys[i];
    const y1 = ys[i + 1];
    const h = xs[i + 1] - x0;

    const t = (x - x0) / h;
    const t2 = t * t;
    const t3 = t2 * t;

    const value =
        (2 * t3 - 3 * t2 + 1) * y0 +
        (t3 - 2 * t2 + t) * h * tangents[i] +
        (-2 * t3 + 3 * t2) * y1 +
        (t3 - t2) * h * tangents[i + 1];

    // floating point noise must not push past the segment's own outputs
    return Math.max(Math.min(y0, y1), Math.min(Math.max(y0, y1), value));
}

/**
 * Evaluate a prepared curve at x
 *
 * Inputs outside the point range take the nearest endpoint's output and
 * control-point inputs return their output unchanged.
 */
export function evaluatePrepared(prepared: PreparedCurve, x: number): number {
    const { xs, ys } = prepared;
    const last = xs.length - 1;
    invariant(last >= 1, 'prepared curve has fewer than 2 points');

    if (x <= xs[0]) return ys[0];
    if (x >= xs[last]) return ys[last];

    const i = findSegment(xs, x);
    if (xs[i] === x) return ys[i];

    if (prepared.tangents) {
        return roundHalfUp(hermite(prepared, prepared.tangents, i, x));
    }

    const x0 = xs[i];
    const y0 = ys[i];
    return roundHalfUp(y0 + ((ys[i + 1] - y0) * (x - x0)) / (xs[i + 1] - x0));
}

/**
 * Interpolated output of a curve at input x, rounded to an integer
 */
export function evaluate(curve: Pick<ChannelCurve, 'points' | 'mode'>, x: number): number {
    return evaluatePrepared(prepareCurve(curve), x);
}
