import { describe, it, expect } from 'vitest';

import { InternalConsistencyError } from '../../errors';
import {
    computeMonotoneTangents,
    evaluate,
    evaluatePrepared,
    prepareCurve,
    roundHalfUp
} from '../../curves/interpolator';
import type { ChannelCurve, InterpolationMode } from '../../curves/types';

const curveOf = (mode: InterpolationMode, points: Array<[number, number]>): ChannelCurve => ({
    mode,
    threshold: 0,
    points: points.map(([input, output]) => ({ input, output }))
});

const MODES: InterpolationMode[] = ['linear', 'monotone-cubic'];

describe('roundHalfUp', () => {
    it('rounds halves up', () => {
        expect(roundHalfUp(2.5)).toBe(3);
        expect(roundHalfUp(2.4999)).toBe(2);
        expect(roundHalfUp(0)).toBe(0);
    });
});

describe('evaluate', () => {
    it.each(MODES)('passes a 16-bit identity curve through unchanged (%s)', mode => {
        const curve = curveOf(mode, [[0, 0], [65535, 65535]]);

        expect(evaluate(curve, 32768)).toBe(32768);
        expect(evaluate(curve, 1)).toBe(1);
        expect(evaluate(curve, 65534)).toBe(65534);
    });

    it.each(MODES)('returns the exact output at every control point (%s)', mode => {
        const curve = curveOf(mode, [[0, 0], [1000, 200], [2000, 2500], [3000, 2600], [4095, 4095]]);

        for (const point of curve.points) {
            expect(evaluate(curve, point.input)).toBe(point.output);
        }
    });

    it.each(MODES)('clamps outside the control point range to the boundary outputs (%s)', mode => {
        const curve = curveOf(mode, [[100, 300], [3000, 3500]]);

        expect(evaluate(curve, 0)).toBe(300);
        expect(evaluate(curve, 99)).toBe(300);
        expect(evaluate(curve, 3001)).toBe(3500);
        expect(evaluate(curve, 4095)).toBe(3500);
    });

    it('rounds linear results to the nearest integer', () => {
        expect(evaluate(curveOf('linear', [[0, 0], [3, 1]]), 1)).toBe(0);
        expect(evaluate(curveOf('linear', [[0, 0], [3, 1]]), 2)).toBe(1);
        expect(evaluate(curveOf('linear', [[0, 0], [2, 1]]), 1)).toBe(1);
    });

    it('interpolates a linear segment', () => {
        const curve = curveOf('linear', [[0, 0], [1000, 100], [4095, 4095]]);
        expect(evaluate(curve, 500)).toBe(50);
    });

    it('bends a monotone-cubic segment below its chord where the next segment is steeper', () => {
        const curve = curveOf('monotone-cubic', [[0, 0], [1000, 100], [4095, 4095]]);
        expect(evaluate(curve, 500)).toBe(25);
    });

    it('keeps flat runs flat in monotone-cubic mode', () => {
        const curve = curveOf('monotone-cubic', [[0, 0], [100, 0], [200, 4000], [4095, 4095]]);

        for (let x = 0; x <= 100; x++) {
            expect(evaluate(curve, x)).toBe(0);
        }
    });

    it('never overshoots on sparse, steep monotone data', () => {
        const curve = curveOf('monotone-cubic', [[0, 0], [100, 0], [200, 4000], [4095, 4095]]);
        const prepared = prepareCurve(curve);

        let previous = -1;
        for (let x = 0; x <= 4095; x++) {
            const value = evaluatePrepared(prepared, x);
            expect(value).toBeGreaterThanOrEqual(previous);
            expect(value).toBeLessThanOrEqual(4095);
            previous = value;
        }
    });

    it('accepts unsorted points', () => {
        const curve = curveOf('linear', [[4095, 4095], [0, 0], [1000, 100]]);
        expect(evaluate(curve, 500)).toBe(50);
    });

    it('treats fewer than two points as an internal consistency failure', () => {
        expect(() => evaluate(curveOf('linear', [[0, 0]]), 0)).toThrow(InternalConsistencyError);
        expect(() => evaluate(curveOf('monotone-cubic', []), 0)).toThrow(InternalConsistencyError);
    });

    it('treats duplicate inputs as an internal consistency failure', () => {
        expect(() => evaluate(curveOf('linear', [[0, 0], [0, 5], [10, 10]]), 3)).toThrow(
            InternalConsistencyError
        );
    });
});

describe('computeMonotoneTangents', () => {
    it('zeroes both tangents of a flat segment and at a plateau start', () => {
        expect(computeMonotoneTangents([0, 1, 2], [0, 1, 1])).toEqual([1, 0, 0]);
    });

    it('limits a tangent to three times its segment secant', () => {
        expect(computeMonotoneTangents([0, 1, 2], [0, 1, 10])).toEqual([1, 3, 9]);
    });

    it('flattens the tangent at a local extremum', () => {
        expect(computeMonotoneTangents([0, 1, 2], [0, 2, 0])).toEqual([2, 0, -2]);
    });
});
