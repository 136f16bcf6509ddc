/**
 * Calibration curve types
 */

/**
 * PWM resolution of a profile
 * - 12: 4096 levels (0 ~ 4095)
 * - 16: 65536 levels (0 ~ 65535)
 */
export type BitDepth = 12 | 16;

export const BIT_DEPTHS: readonly BitDepth[] = [12, 16];

export type Channel = 'red' | 'green' | 'blue';

/** Fixed channel order used by packets and exported headers */
export const CHANNELS: readonly Channel[] = ['red', 'green', 'blue'];

export type InterpolationMode = 'linear' | 'monotone-cubic';

export const INTERPOLATION_MODES: readonly InterpolationMode[] = ['linear', 'monotone-cubic'];

/**
 * One known-correct mapping from a drive level to the PWM value that produces it
 */
export interface CalibrationPoint {
    /** Requested level (0 ~ max) */
    input: number;
    /** PWM value sent to the driver (0 ~ max) */
    output: number;
}

/**
 * Calibration point owned by a store, addressable by id
 */
export interface ControlPoint extends CalibrationPoint {
    id: string;
}

/**
 * Curve for a single channel, points sorted by input
 */
export interface ChannelCurve {
    points: CalibrationPoint[];
    mode: InterpolationMode;
    /** Lowest PWM value for any non-zero input; 0 disables it */
    threshold: number;
}

export interface CalibrationProfile {
    bitDepth: BitDepth;
    red: ChannelCurve;
    green: ChannelCurve;
    blue: ChannelCurve;
}

export const maxForBitDepth = (bitDepth: BitDepth): number => 2 ** bitDepth - 1;

export const isBitDepth = (value: unknown): value is BitDepth => value === 12 || value === 16;

export const isChannel = (value: unknown): value is Channel =>
    CHANNELS.some(channel => channel === value);

export const isInterpolationMode = (value: unknown): value is InterpolationMode =>
    INTERPOLATION_MODES.some(mode => mode === value);

/**
 * Identity curve: (0, 0) and (max, max)
 */
export function createDefaultCurve(bitDepth: BitDepth, mode: InterpolationMode = 'monotone-cubic'): ChannelCurve {
    const max = maxForBitDepth(bitDepth);
    return {
        points: [
            { input: 0, output: 0 },
            { input: max, output: max },
        ],
        mode,
        threshold: 0,
    };
}

export function createDefaultProfile(bitDepth: BitDepth = 16): CalibrationProfile {
    return {
        bitDepth,
        red: createDefaultCurve(bitDepth),
        green: createDefaultCurve(bitDepth),
        blue: createDefaultCurve(bitDepth),
    };
}

export function cloneCurve(curve: ChannelCurve): ChannelCurve {
    return {
        points: curve.points.map(point => ({ input: point.input, output: point.output })),
        mode: curve.mode,
        threshold: curve.threshold,
    };
}

export function cloneProfile(profile: CalibrationProfile): CalibrationProfile {
    return {
        bitDepth: profile.bitDepth,
        red: cloneCurve(profile.red),
        green: cloneCurve(profile.green),
        blue: cloneCurve(profile.blue),
    };
}
