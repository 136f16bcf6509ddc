import { describe, it, expect } from 'vitest';

import {
    DuplicateInputError,
    InvalidProfileError,
    MinimumPointsError,
    OutOfRangeError,
    PointNotFoundError
} from '../../errors';
import { ControlPointStore } from '../../store/point-store';
import type { CurveChangedEvent } from '../../store/point-store';
import { createDefaultProfile } from '../../curves/types';

const createStore = (bitDepth: 12 | 16 = 16) => {
    let next = 0;
    return new ControlPointStore(createDefaultProfile(bitDepth), { idFactory: () => `p${++next}` });
};

describe('ControlPointStore', () => {
    it('starts every channel with the identity endpoints', () => {
        const store = createStore();

        expect(store.bitDepth).toBe(16);
        expect(store.listPoints('red')).toEqual([
            { id: 'p1', input: 0, output: 0 },
            { id: 'p2', input: 65535, output: 65535 }
        ]);
        expect(store.getProfile()).toEqual(createDefaultProfile(16));
    });

    it('keeps points sorted by input on add', () => {
        const store = createStore();
        store.add('green', { input: 40000, output: 30000 });
        store.add('green', { input: 1000, output: 500 });

        expect(store.listPoints('green').map(point => point.input)).toEqual([0, 1000, 40000, 65535]);
    });

    it('rejects a duplicate input and keeps the first point', () => {
        const store = createStore();
        store.add('red', { input: 100, output: 50 });

        expect(() => store.add('red', { input: 100, output: 75 })).toThrow(DuplicateInputError);
        expect(store.getCurve('red').points).toEqual([
            { input: 0, output: 0 },
            { input: 100, output: 50 },
            { input: 65535, output: 65535 }
        ]);
    });

    it('rejects inputs and outputs outside the bit depth', () => {
        const store = createStore(12);

        expect(() => store.add('blue', { input: 4096, output: 10 })).toThrow(OutOfRangeError);
        expect(() => store.add('blue', { input: 10, output: -1 })).toThrow(OutOfRangeError);
        expect(() => store.add('blue', { input: 10.5, output: 10 })).toThrow(OutOfRangeError);
        expect(store.listPoints('blue')).toHaveLength(2);
    });

    it('re-sorts after an input update', () => {
        const store = createStore();
        const point = store.add('red', { input: 1000, output: 900 });
        store.add('red', { input: 2000, output: 1800 });

        const updated = store.update('red', point.id, { input: 3000 });

        expect(updated).toEqual({ id: point.id, input: 3000, output: 900 });
        expect(store.getCurve('red').points).toEqual([
            { input: 0, output: 0 },
            { input: 2000, output: 1800 },
            { input: 3000, output: 900 },
            { input: 65535, output: 65535 }
        ]);
    });

    it('validates updates before changing anything', () => {
        const store = createStore();
        const point = store.add('red', { input: 1000, output: 900 });
        const before = store.getProfile();

        expect(() => store.update('red', point.id, { input: 0 })).toThrow(DuplicateInputError);
        expect(() => store.update('red', point.id, { output: 70000 })).toThrow(OutOfRangeError);
        expect(() => store.update('red', 'missing', { output: 1 })).toThrow(PointNotFoundError);
        expect(store.getProfile()).toEqual(before);
    });

    it('allows an update that keeps the same input', () => {
        const store = createStore();
        const point = store.add('red', { input: 1000, output: 900 });

        expect(store.update('red', point.id, { input: 1000, output: 950 }).output).toBe(950);
    });

    it('refuses to drop below two points', () => {
        const store = createStore();
        const [first] = store.listPoints('blue');

        expect(() => store.remove('blue', first.id)).toThrow(MinimumPointsError);
        expect(store.listPoints('blue')).toHaveLength(2);
    });

    it('removes a point when enough remain', () => {
        const store = createStore();
        const added = store.add('blue', { input: 500, output: 500 });

        store.remove('blue', added.id);
        expect(store.listPoints('blue').map(point => point.input)).toEqual([0, 65535]);
    });

    it('splits a segment at its midpoint', () => {
        const store = createStore();
        const [low, high] = store.listPoints('red');

        const inserted = store.splitSegment('red', high.id, low.id);

        expect(inserted).toEqual({ id: 'p7', input: 32767, output: 32767 });
    });

    it('returns null when no integer lies between two points', () => {
        const store = createStore();
        const a = store.add('red', { input: 100, output: 10 });
        const b = store.add('red', { input: 101, output: 20 });

        expect(store.splitSegment('red', a.id, b.id)).toBeNull();
        expect(store.listPoints('red')).toHaveLength(4);
    });

    it('returns null when the midpoint is already a point', () => {
        const store = createStore();
        const [low, high] = store.listPoints('red');
        store.add('red', { input: 32767, output: 100 });

        expect(store.splitSegment('red', low.id, high.id)).toBeNull();
        expect(store.listPoints('red').map(point => point.input)).toEqual([0, 32767, 65535]);
    });

    it('drops cached tables only for the edited channel', () => {
        const store = createStore(12);
        store.materialize('red', 4096);
        store.materialize('green', 4096);
        store.materialize('red', 4096);
        expect(store.cachedTableCount).toBe(2);

        store.add('red', { input: 2048, output: 1000 });
        expect(store.cachedTableCount).toBe(1);

        expect(store.materialize('red', 4096).table[2048]).toBe(1000);
        expect(store.cachedTableCount).toBe(2);
    });

    it('keeps the cached table intact when a caller writes into a result', () => {
        const store = createStore(12);
        const first = store.materialize('red', 4096);

        first.table[100] = 9;

        expect(store.materialize('red', 4096).table[100]).toBe(100);
    });

    it('emits curve:changed for each mutation', () => {
        const store = createStore();
        const events: CurveChangedEvent[] = [];
        store.on('curve:changed', (event: CurveChangedEvent) => events.push(event));

        const point = store.add('red', { input: 10, output: 10 });
        store.update('red', point.id, { output: 12 });
        store.remove('red', point.id);
        store.setMode('green', 'linear');
        store.setMode('green', 'linear');
        store.setThreshold('blue', 300);

        expect(events).toEqual([
            { channel: 'red', reason: 'add' },
            { channel: 'red', reason: 'update' },
            { channel: 'red', reason: 'remove' },
            { channel: 'green', reason: 'mode' },
            { channel: 'blue', reason: 'threshold' }
        ]);
    });

    it('rejects thresholds outside [0, max)', () => {
        const store = createStore(12);

        expect(() => store.setThreshold('red', 4095)).toThrow(OutOfRangeError);
        expect(() => store.setThreshold('red', -1)).toThrow(OutOfRangeError);
        expect(store.getCurve('red').threshold).toBe(0);
    });

    it('cycles through points for spot testing', () => {
        const store = createStore();
        store.add('red', { input: 100, output: 100 });

        expect([1, 2, 3, 4].map(() => store.nextPoint('red').input)).toEqual([0, 100, 65535, 0]);
    });

    it('replaces the whole profile and clears caches', () => {
        const store = createStore();
        store.materialize('red', 4096);
        const replacement = createDefaultProfile(12);
        replacement.red.points.splice(1, 0, { input: 10, output: 20 });

        store.replaceProfile(replacement);

        expect(store.bitDepth).toBe(12);
        expect(store.getProfile()).toEqual(replacement);
        expect(store.cachedTableCount).toBe(0);
        expect(store.materialize('red', 4096).table[10]).toBe(20);
    });

    it('refuses an invalid starting profile', () => {
        const profile = createDefaultProfile(12);
        profile.green.points.push({ input: 0, output: 5 });

        expect(() => new ControlPointStore(profile)).toThrow(InvalidProfileError);
    });
});
