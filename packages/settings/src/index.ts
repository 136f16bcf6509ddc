import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

import { z } from 'zod';

const SETTINGS_SCHEMA_VERSION = '1.0.0';
const SETTINGS_FILE_NAME = 'settings.json';

export type SettingsBitDepth = 12 | 16;
export type SettingsLutSize = 256 | 1024 | 4096 | 65536;

const LUT_SIZES: readonly SettingsLutSize[] = [256, 1024, 4096, 65536];

export interface LasercalSettings {
  schemaVersion: string;
  /** Bit depth of new profiles */
  bitDepth: SettingsBitDepth;
  /** Default table size for `curve lut` and `export` */
  lutSize: SettingsLutSize;
  serial: {
    path: string | null;
    baudRate: number;
  };
  sweep: {
    step: number;
    intervalMs: number;
  };
  export: {
    attribute: string;
    valuesPerRow: number;
  };
  createdAt: string;
  updatedAt: string;
}

interface SettingsFileShape {
  version: string;
  data: LasercalSettings;
}

const defaultSettings = (): LasercalSettings => {
  const now = new Date().toISOString();
  return {
    schemaVersion: SETTINGS_SCHEMA_VERSION,
    bitDepth: 16,
    lutSize: 4096,
    serial: {
      path: null,
      baudRate: 250000
    },
    sweep: {
      step: 256,
      intervalMs: 50
    },
    export: {
      attribute: 'PROGMEM',
      valuesPerRow: 8
    },
    createdAt: now,
    updatedAt: now
  };
};

const DEFAULTS = defaultSettings();

const positiveInt = z.number().int().positive();

// every field falls back to its default on its own, so one bad value never
// throws away the rest of the file
const SettingsDataSchema = z.object({
  bitDepth: z.union([z.literal(12), z.literal(16)]).catch(DEFAULTS.bitDepth),
  lutSize: z
    .union([z.literal(256), z.literal(1024), z.literal(4096), z.literal(65536)])
    .catch(DEFAULTS.lutSize),
  serial: z
    .object({
      path: z.string().min(1).nullable().catch(DEFAULTS.serial.path),
      baudRate: positiveInt.catch(DEFAULTS.serial.baudRate)
    })
    .catch(DEFAULTS.serial),
  sweep: z
    .object({
      step: positiveInt.catch(DEFAULTS.sweep.step),
      intervalMs: z.number().int().nonnegative().catch(DEFAULTS.sweep.intervalMs)
    })
    .catch(DEFAULTS.sweep),
  export: z
    .object({
      attribute: z.string().catch(DEFAULTS.export.attribute),
      valuesPerRow: positiveInt.max(64).catch(DEFAULTS.export.valuesPerRow)
    })
    .catch(DEFAULTS.export),
  createdAt: z.string().catch(() => new Date().toISOString()),
  updatedAt: z.string().catch(() => new Date().toISOString())
});

const SettingsFileSchema = z.object({
  version: z.string().optional(),
  data: z.unknown().optional()
});

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}

export const getSettingsDirectory = (): string =>
  process.env.LASERCAL_SETTINGS_DIR ?? path.join(os.homedir(), '.lasercal');

export const getSettingsFilePath = (): string =>
  process.env.LASERCAL_SETTINGS_FILE ?? path.join(getSettingsDirectory(), SETTINGS_FILE_NAME);

const sanitizeSettings = (input: unknown): LasercalSettings => {
  const source = typeof input === 'object' && input !== null && !Array.isArray(input) ? input : {};
  return {
    ...SettingsDataSchema.parse(source),
    schemaVersion: SETTINGS_SCHEMA_VERSION
  };
};

const serialize = (settings: LasercalSettings): string =>
  JSON.stringify(
    {
      version: SETTINGS_SCHEMA_VERSION,
      data: settings
    } satisfies SettingsFileShape,
    null,
    2
  );

async function ensureDirectoryExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

async function readSettingsFile(filePath: string): Promise<unknown | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new SettingsValidationError(`Could not read settings file ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SettingsValidationError(`Settings file ${filePath} is not valid JSON`);
  }

  const file = SettingsFileSchema.safeParse(parsed);
  if (!file.success) {
    throw new SettingsValidationError(`Settings file ${filePath} must hold a JSON object`);
  }
  return file.data.data ?? {};
}

export async function loadSettings(): Promise<LasercalSettings> {
  const filePath = getSettingsFilePath();
  await ensureDirectoryExists(path.dirname(filePath));

  const stored = await readSettingsFile(filePath);
  if (stored === null) {
    const defaults = defaultSettings();
    await fs.writeFile(filePath, serialize(defaults), 'utf-8');
    return defaults;
  }

  return sanitizeSettings(stored);
}

export async function saveSettings(settings: LasercalSettings): Promise<LasercalSettings> {
  const filePath = getSettingsFilePath();
  await ensureDirectoryExists(path.dirname(filePath));
  const payload = {
    ...settings,
    updatedAt: new Date().toISOString()
  } satisfies LasercalSettings;

  await fs.writeFile(filePath, serialize(payload), 'utf-8');
  return payload;
}

export type SettingsUpdater = (current: LasercalSettings) => Partial<LasercalSettings>;

export async function updateSettings(updater: SettingsUpdater): Promise<LasercalSettings> {
  const current = await loadSettings();
  const merged = sanitizeSettings({
    ...current,
    ...updater(current)
  });

  return saveSettings({
    ...merged,
    createdAt: current.createdAt
  });
}

export const SETTING_KEYS = [
  'bitDepth',
  'lutSize',
  'serial.path',
  'serial.baudRate',
  'sweep.step',
  'sweep.intervalMs',
  'export.attribute',
  'export.valuesPerRow'
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export const isSettingKey = (value: string): value is SettingKey => SETTING_KEYS.some(key => key === value);

const parseInteger = (key: SettingKey, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number => {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new SettingsValidationError(`${key} must be an integer ${range}, got '${raw}'`);
  }
  return value;
};

const isLutSize = (value: number): value is SettingsLutSize => LUT_SIZES.some(size => size === value);

const isBitDepth = (value: number): value is SettingsBitDepth => value === 12 || value === 16;

/**
 * Apply one `key value` pair as typed on the command line
 */
export function applySetting(settings: LasercalSettings, key: string, raw: string): LasercalSettings {
  if (!isSettingKey(key)) {
    throw new SettingsValidationError(`Unknown setting '${key}'. Known settings: ${SETTING_KEYS.join(', ')}`);
  }

  switch (key) {
    case 'bitDepth': {
      const value = parseInteger(key, raw, 12, 16);
      if (!isBitDepth(value)) {
        throw new SettingsValidationError(`bitDepth must be 12 or 16, got '${raw}'`);
      }
      return { ...settings, bitDepth: value };
    }
    case 'lutSize': {
      const value = parseInteger(key, raw, 1);
      if (!isLutSize(value)) {
        throw new SettingsValidationError(`lutSize must be one of ${LUT_SIZES.join(', ')}, got '${raw}'`);
      }
      return { ...settings, lutSize: value };
    }
    case 'serial.path': {
      const trimmed = raw.trim();
      return { ...settings, serial: { ...settings.serial, path: trimmed === '' || trimmed === 'none' ? null : trimmed } };
    }
    case 'serial.baudRate':
      return { ...settings, serial: { ...settings.serial, baudRate: parseInteger(key, raw, 1) } };
    case 'sweep.step':
      return { ...settings, sweep: { ...settings.sweep, step: parseInteger(key, raw, 1) } };
    case 'sweep.intervalMs':
      return { ...settings, sweep: { ...settings.sweep, intervalMs: parseInteger(key, raw, 0) } };
    case 'export.attribute':
      return { ...settings, export: { ...settings.export, attribute: raw.trim() } };
    case 'export.valuesPerRow':
      return { ...settings, export: { ...settings.export, valuesPerRow: parseInteger(key, raw, 1, 64) } };
  }
}

export function getSetting(settings: LasercalSettings, key: SettingKey): string | number | null {
  switch (key) {
    case 'bitDepth':
      return settings.bitDepth;
    case 'lutSize':
      return settings.lutSize;
    case 'serial.path':
      return settings.serial.path;
    case 'serial.baudRate':
      return settings.serial.baudRate;
    case 'sweep.step':
      return settings.sweep.step;
    case 'sweep.intervalMs':
      return settings.sweep.intervalMs;
    case 'export.attribute':
      return settings.export.attribute;
    case 'export.valuesPerRow':
      return settings.export.valuesPerRow;
  }
}
