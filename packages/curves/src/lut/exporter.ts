/**
 * Firmware header exporter
 * Writes one read-only uint16_t array per channel for the driver firmware
 */

import { CHANNELS } from '../curves/types';
import type { CalibrationProfile, Channel, ChannelCurve } from '../curves/types';
import { materialize } from './materializer';
import type { HeaderExportOptions, LutSize, MaterializedLUT } from './types';

const DEFAULT_ATTRIBUTE = 'PROGMEM';
const DEFAULT_VALUES_PER_ROW = 8;
const DEFAULT_GENERATOR = 'lasercal';
const VALUE_WIDTH = 5;

export const lutArrayName = (channel: Channel): string => `${channel.toUpperCase()}_LUT`;

/**
 * Array body, index-ascending, `valuesPerRow` right-aligned values per line
 */
export function formatLutRows(table: Uint16Array, valuesPerRow = DEFAULT_VALUES_PER_ROW): string[] {
    const lines: string[] = [];
    for (let start = 0; start < table.length; start += valuesPerRow) {
        const row = Array.from(table.subarray(start, start + valuesPerRow), value =>
            value.toString().padStart(VALUE_WIDTH, ' ')
        );
        const isLastRow = start + valuesPerRow >= table.length;
        lines.push(`    ${row.join(', ')}${isLastRow ? '' : ','}`);
    }
    return lines;
}

function formatChannel(
    channel: Channel,
    curve: ChannelCurve,
    lut: MaterializedLUT,
    attribute: string,
    valuesPerRow: number
): string[] {
    const name = lutArrayName(channel);
    const placement = attribute ? ` ${attribute}` : '';
    return [
        `// ${channel.toUpperCase()}: mode=${curve.mode}, threshold=${curve.threshold}, points=${curve.points.length}`,
        `const uint16_t ${name}[${lut.size}]${placement} = {`,
        ...formatLutRows(lut.table, valuesPerRow),
        '};',
        '',
    ];
}

/**
 * Render already materialized tables; `luts` must hold every channel
 */
export function renderHeader(
    profile: CalibrationProfile,
    luts: Record<Channel, MaterializedLUT>,
    options: HeaderExportOptions = {}
): string {
    const attribute = options.attribute ?? DEFAULT_ATTRIBUTE;
    const valuesPerRow = Math.max(1, Math.floor(options.valuesPerRow ?? DEFAULT_VALUES_PER_ROW));
    const generator = options.generator ?? DEFAULT_GENERATOR;
    const size = luts.red.size;

    const lines = [
        `// Laser Calibration LUTs (${size} entries each)`,
        `// Generated by ${generator}`,
        '#pragma once',
        '#include <stdint.h>',
        '',
    ];

    for (const channel of CHANNELS) {
        lines.push(...formatChannel(channel, profile[channel], luts[channel], attribute, valuesPerRow));
    }

    return lines.join('\n');
}

/**
 * Export a profile as a C header with RED_LUT, GREEN_LUT and BLUE_LUT
 *
 * Output depends only on (profile, size, options) so firmware builds are
 * reproducible.
 */
export function exportHeader(
    profile: CalibrationProfile,
    size: LutSize,
    options: HeaderExportOptions = {}
): string {
    const luts: Record<Channel, MaterializedLUT> = {
        red: materialize(profile.red, size, { channel: 'red', bitDepth: profile.bitDepth }),
        green: materialize(profile.green, size, { channel: 'green', bitDepth: profile.bitDepth }),
        blue: materialize(profile.blue, size, { channel: 'blue', bitDepth: profile.bitDepth }),
    };
    return renderHeader(profile, luts, options);
}
