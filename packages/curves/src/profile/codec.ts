/**
 * Profile codec
 * Persists the editable control points, never the materialized tables.
 *
 * File format (schemaVersion 1):
 * {
 *   "schemaVersion": 1,
 *   "bitDepth": 16,
 *   "red": { "mode": "monotone-cubic", "threshold": 0, "points": [{ "input": 0, "output": 0 }, ...] },
 *   "green": { ... },
 *   "blue": { ... }
 * }
 *
 * Files written by the earlier wizard (no schemaVersion, points keyed by
 * brightness percent) are migrated on load.
 */

import { z } from 'zod';

import { curvesLogger as logger } from '@lasercal/logger';

import { InvalidProfileError } from '../errors';
import { roundHalfUp } from '../curves/interpolator';
import { CHANNELS, createDefaultCurve, maxForBitDepth } from '../curves/types';
import type { CalibrationPoint, CalibrationProfile, Channel, ChannelCurve } from '../curves/types';
import { assertValidProfile } from './validate';

export const PROFILE_SCHEMA_VERSION = 1;

const LEGACY_BIT_DEPTH = 16;

const PointSchema = z.object({
    input: z.number(),
    output: z.number(),
});

const ChannelSchema = z.object({
    mode: z.enum(['linear', 'monotone-cubic']),
    threshold: z.number().default(0),
    points: z.array(PointSchema),
});

const ProfileFileSchema = z.object({
    schemaVersion: z.literal(PROFILE_SCHEMA_VERSION),
    bitDepth: z.union([z.literal(12), z.literal(16)]),
    red: ChannelSchema,
    green: ChannelSchema,
    blue: ChannelSchema,
});

const LegacyChannelSchema = z.object({
    name: z.string().optional(),
    threshold: z.number().default(0),
    use_smooth: z.boolean().default(true),
    points: z.record(z.string(), z.number()),
});

const LegacyProfileSchema = z.object({
    red: LegacyChannelSchema.optional(),
    green: LegacyChannelSchema.optional(),
    blue: LegacyChannelSchema.optional(),
});

export type ProfileFile = z.infer<typeof ProfileFileSchema>;

const byInput = (a: CalibrationPoint, b: CalibrationPoint) => a.input - b.input;

const formatZodIssues = (error: z.ZodError): string[] =>
    error.issues.map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);

const sortCurve = (curve: ChannelCurve): ChannelCurve => ({
    mode: curve.mode,
    threshold: curve.threshold,
    points: curve.points.map(point => ({ input: point.input, output: point.output })).sort(byInput),
});

/**
 * Serialize the editable state of a profile
 */
export function saveProfile(profile: CalibrationProfile): string {
    const file: ProfileFile = {
        schemaVersion: PROFILE_SCHEMA_VERSION,
        bitDepth: profile.bitDepth,
        red: sortCurve(profile.red),
        green: sortCurve(profile.green),
        blue: sortCurve(profile.blue),
    };
    return `${JSON.stringify(file, null, 2)}\n`;
}

function migrateLegacyChannel(
    channel: Channel,
    legacy: z.infer<typeof LegacyChannelSchema> | undefined,
    issues: string[]
): ChannelCurve {
    if (!legacy) {
        return createDefaultCurve(LEGACY_BIT_DEPTH);
    }

    const max = maxForBitDepth(LEGACY_BIT_DEPTH);
    const points: CalibrationPoint[] = [];
    for (const [key, output] of Object.entries(legacy.points)) {
        const percent = Number(key);
        if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
            issues.push(`${channel}.points.${key}: percent key must be an integer 0-100`);
            continue;
        }
        points.push({ input: roundHalfUp((percent * max) / 100), output });
    }

    return {
        mode: legacy.use_smooth ? 'monotone-cubic' : 'linear',
        threshold: legacy.threshold,
        points: points.sort(byInput),
    };
}

function fromLegacy(data: unknown): CalibrationProfile {
    const parsed = LegacyProfileSchema.safeParse(data);
    if (!parsed.success) {
        throw new InvalidProfileError(formatZodIssues(parsed.error));
    }

    const issues: string[] = [];
    const profile: CalibrationProfile = {
        bitDepth: LEGACY_BIT_DEPTH,
        red: migrateLegacyChannel('red', parsed.data.red, issues),
        green: migrateLegacyChannel('green', parsed.data.green, issues),
        blue: migrateLegacyChannel('blue', parsed.data.blue, issues),
    };
    if (issues.length > 0) {
        throw new InvalidProfileError(issues);
    }

    logger.info('migrated legacy percent-keyed calibration file');
    return profile;
}

function fromCurrent(data: unknown): CalibrationProfile {
    const parsed = ProfileFileSchema.safeParse(data);
    if (!parsed.success) {
        throw new InvalidProfileError(formatZodIssues(parsed.error));
    }

    const file = parsed.data;
    return {
        bitDepth: file.bitDepth,
        red: sortCurve(file.red),
        green: sortCurve(file.green),
        blue: sortCurve(file.blue),
    };
}

/**
 * Parse and fully validate profile text. Any problem rejects the whole file
 * with InvalidProfileError listing every issue found.
 */
export function loadProfile(text: string): CalibrationProfile {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidProfileError([`not valid JSON: ${reason}`]);
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new InvalidProfileError(['profile must be a JSON object']);
    }

    const profile = 'schemaVersion' in data ? fromCurrent(data) : fromLegacy(data);
    assertValidProfile(profile);

    logger.debug(
        { bitDepth: profile.bitDepth, points: CHANNELS.map(channel => profile[channel].points.length) },
        'profile loaded'
    );
    return profile;
}
