import { describe, it, expect } from 'vitest';

import { InvalidProfileError } from '../../errors';
import { PROFILE_SCHEMA_VERSION, loadProfile, saveProfile } from '../../profile/codec';
import { createDefaultCurve, createDefaultProfile } from '../../curves/types';
import type { CalibrationProfile } from '../../curves/types';

const sample: CalibrationProfile = {
    bitDepth: 12,
    red: {
        mode: 'monotone-cubic',
        threshold: 40,
        points: [
            { input: 0, output: 0 },
            { input: 1200, output: 900 },
            { input: 4095, output: 4095 }
        ]
    },
    green: createDefaultCurve(12, 'linear'),
    blue: createDefaultCurve(12)
};

const profileJson = (overrides: Record<string, unknown>) =>
    JSON.stringify({
        schemaVersion: PROFILE_SCHEMA_VERSION,
        bitDepth: 12,
        red: { mode: 'linear', threshold: 0, points: [{ input: 0, output: 0 }, { input: 4095, output: 4095 }] },
        green: { mode: 'linear', threshold: 0, points: [{ input: 0, output: 0 }, { input: 4095, output: 4095 }] },
        blue: { mode: 'linear', threshold: 0, points: [{ input: 0, output: 0 }, { input: 4095, output: 4095 }] },
        ...overrides
    });

const issuesOf = (text: string): string[] => {
    try {
        loadProfile(text);
    } catch (error) {
        if (error instanceof InvalidProfileError) {
            return error.issues;
        }
        throw error;
    }
    throw new Error('expected the profile to be rejected');
};

describe('saveProfile / loadProfile', () => {
    it('restores the saved control points', () => {
        expect(loadProfile(saveProfile(sample))).toEqual(sample);
    });

    it('writes a versioned, indented document', () => {
        const text = saveProfile(createDefaultProfile(16));

        expect(text.endsWith('}\n')).toBe(true);
        expect(JSON.parse(text)).toEqual({
            schemaVersion: 1,
            bitDepth: 16,
            red: { mode: 'monotone-cubic', threshold: 0, points: [{ input: 0, output: 0 }, { input: 65535, output: 65535 }] },
            green: { mode: 'monotone-cubic', threshold: 0, points: [{ input: 0, output: 0 }, { input: 65535, output: 65535 }] },
            blue: { mode: 'monotone-cubic', threshold: 0, points: [{ input: 0, output: 0 }, { input: 65535, output: 65535 }] }
        });
    });

    it('sorts points by input on save and on load', () => {
        const unsorted: CalibrationProfile = {
            ...sample,
            red: { ...sample.red, points: [...sample.red.points].reverse() }
        };
        const saved = JSON.parse(saveProfile(unsorted));
        expect(saved.red.points.map((point: { input: number }) => point.input)).toEqual([0, 1200, 4095]);

        const loaded = loadProfile(
            profileJson({
                green: { mode: 'linear', points: [{ input: 4095, output: 4095 }, { input: 0, output: 0 }] }
            })
        );
        expect(loaded.green.points).toEqual([
            { input: 0, output: 0 },
            { input: 4095, output: 4095 }
        ]);
        expect(loaded.green.threshold).toBe(0);
    });

    it('rejects duplicate inputs', () => {
        const text = profileJson({
            red: {
                mode: 'linear',
                threshold: 0,
                points: [
                    { input: 0, output: 0 },
                    { input: 10, output: 5 },
                    { input: 10, output: 6 },
                    { input: 4095, output: 4095 }
                ]
            }
        });

        expect(issuesOf(text)).toEqual(['red.points[2]: duplicate input 10']);
    });

    it('rejects values outside the bit depth', () => {
        const text = profileJson({
            green: {
                mode: 'linear',
                threshold: 0,
                points: [
                    { input: 0, output: 0 },
                    { input: 100, output: 5000 },
                    { input: 4095, output: 4095 }
                ]
            }
        });

        expect(issuesOf(text)).toEqual(['green.points[1]: output 5000 is outside [0, 4095]']);
    });

    it('collects every problem before rejecting', () => {
        const text = profileJson({
            red: { mode: 'linear', threshold: 0, points: [{ input: 0, output: 0 }] },
            blue: { mode: 'linear', threshold: 4095, points: [{ input: 0, output: 0 }, { input: 4095, output: 4095 }] }
        });

        expect(issuesOf(text)).toEqual([
            'red: needs at least 2 points, found 1',
            'blue: threshold 4095 is outside [0, 4094]'
        ]);
    });

    it('rejects an unsupported bit depth', () => {
        const issues = issuesOf(profileJson({ bitDepth: 14 }));

        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('bitDepth: ')).toBe(true);
    });

    it('rejects an unknown mode', () => {
        const issues = issuesOf(
            profileJson({ red: { mode: 'spline', points: [{ input: 0, output: 0 }, { input: 1, output: 1 }] } })
        );

        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('red.mode: ')).toBe(true);
    });

    it('rejects text that is not a JSON object', () => {
        expect(issuesOf('{ nope')[0].startsWith('not valid JSON: ')).toBe(true);
        expect(issuesOf('[1, 2]')).toEqual(['profile must be a JSON object']);
        expect(issuesOf('null')).toEqual(['profile must be a JSON object']);
    });
});

describe('legacy percent-keyed files', () => {
    it('migrates percent keys to 16-bit inputs', () => {
        const profile = loadProfile(
            JSON.stringify({
                red: { name: 'Red', threshold: 120, use_smooth: false, points: { '100': 65535, '0': 0, '50': 20000 } },
                green: { points: { '0': 0, '100': 60000 } }
            })
        );

        expect(profile.bitDepth).toBe(16);
        expect(profile.red).toEqual({
            mode: 'linear',
            threshold: 120,
            points: [
                { input: 0, output: 0 },
                { input: 32768, output: 20000 },
                { input: 65535, output: 65535 }
            ]
        });
        expect(profile.green.mode).toBe('monotone-cubic');
        expect(profile.green.points).toEqual([
            { input: 0, output: 0 },
            { input: 65535, output: 60000 }
        ]);
        expect(profile.blue).toEqual(createDefaultCurve(16));
    });

    it('rejects keys that are not whole percentages', () => {
        const text = JSON.stringify({ red: { points: { '0': 0, '12.5': 100, '100': 65535 } } });

        expect(issuesOf(text)).toEqual(['red.points.12.5: percent key must be an integer 0-100']);
    });
});
