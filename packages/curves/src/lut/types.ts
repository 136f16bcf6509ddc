/**
 * Firmware LUT types
 */

import type { Channel } from '../curves/types';

/**
 * Supported LUT sizes
 * - 256 / 1024: small MCUs with little flash
 * - 4096: one entry per 12-bit level
 * - 65536: one entry per 16-bit level (~128KB per channel)
 */
export type LutSize = 256 | 1024 | 4096 | 65536;

export const LUT_SIZES: readonly LutSize[] = [256, 1024, 4096, 65536];

export const isLutSize = (value: unknown): value is LutSize =>
    LUT_SIZES.some(size => size === value);

/**
 * Dense table for one channel, entry i is the PWM value for LUT index i
 */
export interface MaterializedLUT {
    channel: Channel;
    size: LutSize;
    table: Uint16Array;
    /** false when some entry is lower than the one before it */
    monotonic: boolean;
}

export interface HeaderExportOptions {
    /** Placement attribute after the declarator, '' to omit */
    attribute?: string;
    /** Values per source line */
    valuesPerRow?: number;
    /** Tool name in the banner comment */
    generator?: string;
}
