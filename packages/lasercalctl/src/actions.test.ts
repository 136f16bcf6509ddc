import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MinimumPointsError, OutOfRangeError, PointNotFoundError, loadProfile } from '@lasercal/curves';
import type { ClosableTransport } from '@lasercal/device';
import type { LasercalSettings, SettingsUpdater } from '@lasercal/settings';

import {
  addPointAction,
  evalCurveAction,
  exportAction,
  findThresholdAction,
  initProfileAction,
  listPortsAction,
  lutAction,
  removePointAction,
  sendAction,
  setModeAction,
  setPointAction,
  setSettingAction,
  setThresholdAction,
  showProfileAction,
  showSettingsAction,
  splitPointAction,
  sweepAction,
  testPointAction
} from './actions';
import { UsageError } from './parse';

class FakeTransport implements ClosableTransport {
  connected = true;
  closed = false;
  readonly packets: number[][] = [];

  async write(bytes: Uint8Array): Promise<void> {
    this.packets.push(Array.from(bytes));
  }

  async close(): Promise<void> {
    this.connected = false;
    this.closed = true;
  }
}

const createSettings = (): LasercalSettings => {
  const timestamp = new Date().toISOString();
  return {
    schemaVersion: '1.0.0',
    bitDepth: 12,
    lutSize: 256,
    serial: {
      path: '/dev/ttyACM0',
      baudRate: 250000
    },
    sweep: {
      step: 256,
      intervalMs: 0
    },
    export: {
      attribute: 'PROGMEM',
      valuesPerRow: 8
    },
    createdAt: timestamp,
    updatedAt: timestamp
  };
};

const createContext = () => {
  let settings = createSettings();
  const transport = new FakeTransport();
  const loadSettings = vi.fn(async () => settings);
  const updateSettings = vi.fn(async (updater: SettingsUpdater) => {
    settings = {
      ...settings,
      ...updater(settings),
      updatedAt: new Date().toISOString()
    };
    return settings;
  });
  const openTransport = vi.fn(async () => transport);
  const listPorts = vi.fn(async () => ['/dev/cu.usbmodem1101', '/dev/ttyACM0']);

  return {
    ctx: {
      loadSettings,
      updateSettings,
      openTransport,
      listPorts
    },
    transport,
    openTransport,
    updateSettings
  };
};

const tick = () => new Promise(resolve => setImmediate(resolve));

describe('lasercal actions', () => {
  let context: ReturnType<typeof createContext>;
  let dir: string;
  let profilePath: string;

  beforeEach(async () => {
    context = createContext();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lasercal-cli-'));
    profilePath = path.join(dir, 'laser_profile.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const readSaved = async () => loadProfile(await fs.readFile(profilePath, 'utf8'));

  describe('profiles', () => {
    it('creates a profile at the configured bit depth', async () => {
      const created = await initProfileAction({ profilePath, force: false }, context.ctx);

      expect(created.bitDepth).toBe(12);
      expect((await readSaved()).red.points).toEqual([
        { input: 0, output: 0 },
        { input: 4095, output: 4095 }
      ]);
    });

    it('refuses to overwrite a profile unless forced', async () => {
      await initProfileAction({ profilePath, force: false }, context.ctx);

      await expect(initProfileAction({ profilePath, force: false }, context.ctx)).rejects.toThrow(UsageError);
      await expect(initProfileAction({ profilePath, bitDepth: 16, force: true }, context.ctx)).resolves.toMatchObject({
        bitDepth: 16
      });
      expect((await showProfileAction(profilePath)).bitDepth).toBe(16);
    });

    it('points at profile init when the file is missing', async () => {
      await expect(showProfileAction(profilePath)).rejects.toThrow(
        `Profile ${profilePath} not found. Run 'lasercal profile init' first`
      );
    });
  });

  describe('points and curves', () => {
    beforeEach(async () => {
      await initProfileAction({ profilePath, force: false }, context.ctx);
    });

    it('adds, moves and removes points by input', async () => {
      await expect(addPointAction({ profilePath, channel: 'red', input: 1000, output: 700 })).resolves.toEqual({
        input: 1000,
        output: 700
      });
      await expect(
        setPointAction({ profilePath, channel: 'red', input: 1000, changes: { input: 1200, output: 900 } })
      ).resolves.toEqual({ input: 1200, output: 900 });
      expect((await readSaved()).red.points).toEqual([
        { input: 0, output: 0 },
        { input: 1200, output: 900 },
        { input: 4095, output: 4095 }
      ]);

      await removePointAction({ profilePath, channel: 'red', input: 1200 });
      expect((await readSaved()).red.points).toHaveLength(2);
    });

    it('leaves the file alone when an edit is rejected', async () => {
      const before = await fs.readFile(profilePath, 'utf8');

      await expect(removePointAction({ profilePath, channel: 'green', input: 0 })).rejects.toThrow(MinimumPointsError);
      await expect(removePointAction({ profilePath, channel: 'green', input: 5 })).rejects.toThrow(PointNotFoundError);
      await expect(addPointAction({ profilePath, channel: 'green', input: 5000, output: 1 })).rejects.toThrow(
        OutOfRangeError
      );

      expect(await fs.readFile(profilePath, 'utf8')).toBe(before);
    });

    it('splits a segment at its midpoint', async () => {
      await expect(splitPointAction({ profilePath, channel: 'blue', lower: 0, upper: 4095 })).resolves.toEqual({
        input: 2047,
        output: 2047
      });

      await addPointAction({ profilePath, channel: 'blue', input: 1, output: 1 });
      await expect(splitPointAction({ profilePath, channel: 'blue', lower: 0, upper: 1 })).resolves.toBeNull();
    });

    it('stores mode and threshold changes', async () => {
      await setModeAction({ profilePath, channel: 'green', mode: 'linear' });
      await setThresholdAction({ profilePath, channel: 'red', threshold: 100 });

      const saved = await readSaved();
      expect(saved.green.mode).toBe('linear');
      expect(saved.red.threshold).toBe(100);
      await expect(setThresholdAction({ profilePath, channel: 'red', threshold: 4095 })).rejects.toThrow(
        OutOfRangeError
      );
    });

    it('evaluates inputs through the threshold', async () => {
      await setThresholdAction({ profilePath, channel: 'red', threshold: 100 });

      await expect(evalCurveAction({ profilePath, channel: 'red', inputs: [0, 2000, 4095] })).resolves.toEqual([
        { input: 0, value: 0 },
        { input: 2000, value: 2051 },
        { input: 4095, value: 4095 }
      ]);
      await expect(evalCurveAction({ profilePath, channel: 'red', inputs: [5000] })).rejects.toThrow(
        'input 5000 is outside [0, 4095]'
      );
    });

    it('materializes a table at the configured size', async () => {
      const lut = await lutAction({ profilePath, channel: 'green' }, context.ctx);

      expect(lut.size).toBe(256);
      expect(lut.table[1]).toBe(16);
      expect(lut.table[255]).toBe(4095);
      expect(lut.monotonic).toBe(true);
    });

    it('exports a header with the configured layout', async () => {
      const outputPath = path.join(dir, 'laser_lut.h');

      await expect(exportAction({ profilePath, outputPath }, context.ctx)).resolves.toEqual({ outputPath, size: 256 });

      const lines = (await fs.readFile(outputPath, 'utf8')).split('\n');
      const start = lines.indexOf('const uint16_t RED_LUT[256] PROGMEM = {');
      expect(start).toBeGreaterThan(0);
      expect(lines[start + 1]).toBe('        0,    16,    32,    48,    64,    80,    96,   112,');
    });
  });

  describe('device', () => {
    beforeEach(async () => {
      await initProfileAction({ profilePath, force: false }, context.ctx);
    });

    it('lists ports through the context', async () => {
      await expect(listPortsAction(context.ctx)).resolves.toEqual(['/dev/cu.usbmodem1101', '/dev/ttyACM0']);
    });

    it('sends raw values on the configured port and closes it', async () => {
      const packet = await sendAction({ red: 16, green: 32, blue: 256, holdMs: 0 }, context.ctx);

      expect(Array.from(packet)).toEqual([16, 0, 32, 0, 0, 1]);
      expect(context.openTransport).toHaveBeenCalledWith({ path: '/dev/ttyACM0', baudRate: 250000 });
      expect(context.transport.closed).toBe(true);
    });

    it('prefers an explicit port and cuts the hold short on abort', async () => {
      const controller = new AbortController();
      const sending = sendAction(
        { port: '/dev/ttyUSB1', red: 0, green: 0, blue: 1, holdMs: 60_000, signal: controller.signal },
        context.ctx
      );
      await tick();
      controller.abort();

      await sending;
      expect(context.openTransport).toHaveBeenCalledWith({ path: '/dev/ttyUSB1', baudRate: 250000 });
      expect(context.transport.closed).toBe(true);
    });

    it('needs a port from the option or the settings', async () => {
      await context.ctx.updateSettings(current => ({ serial: { ...current.serial, path: null } }));

      await expect(sendAction({ red: 0, green: 0, blue: 0, holdMs: 0 }, context.ctx)).rejects.toThrow(UsageError);
      expect(context.openTransport).not.toHaveBeenCalled();
    });

    it('tests a point with the calibrated value', async () => {
      await setThresholdAction({ profilePath, channel: 'red', threshold: 100 });

      await expect(
        testPointAction({ profilePath, channel: 'red', input: 2000, holdMs: 0 }, context.ctx)
      ).resolves.toBe(2051);
      expect(context.transport.packets).toEqual([[0x03, 0x08, 0, 0, 0, 0]]);
    });

    it('runs a sweep and blacks out at the end', async () => {
      const inputs: number[] = [];
      const result = await sweepAction(
        {
          profilePath,
          channel: 'green',
          from: 0,
          to: 20,
          step: 10,
          onStep: step => inputs.push(step.input)
        },
        context.ctx
      );

      expect(result).toEqual({ written: 3, cancelled: false });
      expect(inputs).toEqual([0, 10, 20]);
      expect(context.transport.packets).toEqual([
        [0, 0, 0, 0, 0, 0],
        [0, 0, 10, 0, 0, 0],
        [0, 0, 20, 0, 0, 0],
        [0, 0, 0, 0, 0, 0]
      ]);
      expect(context.transport.closed).toBe(true);
    });

    it('stops a sweep when the signal fires', async () => {
      const controller = new AbortController();
      const sweeping = sweepAction(
        {
          profilePath,
          channel: 'blue',
          from: 100,
          step: 1,
          intervalMs: 60_000,
          repeat: 'wrap',
          signal: controller.signal
        },
        context.ctx
      );
      while (context.transport.packets.length === 0) {
        await tick();
      }
      controller.abort();

      await expect(sweeping).resolves.toEqual({ written: 1, cancelled: true });
      expect(context.transport.packets).toEqual([
        [0, 0, 0, 0, 100, 0],
        [0, 0, 0, 0, 0, 0]
      ]);
    });

    it('sends inputs as PWM values on a raw sweep', async () => {
      await setThresholdAction({ profilePath, channel: 'blue', threshold: 100 });

      await expect(
        sweepAction({ profilePath, channel: 'blue', from: 0, to: 20, step: 10, raw: true }, context.ctx)
      ).resolves.toEqual({ written: 3, cancelled: false });
      expect(context.transport.packets.map(packet => packet[4])).toEqual([0, 10, 20, 0]);
    });

    it('ramps raw values when finding the threshold', async () => {
      await setThresholdAction({ profilePath, channel: 'red', threshold: 100 });

      await expect(
        findThresholdAction({ profilePath, channel: 'red', to: 30, intervalMs: 0 }, context.ctx)
      ).resolves.toEqual({ written: 4, cancelled: false, lastValue: 30 });
      expect(context.transport.packets).toEqual([
        [0, 0, 0, 0, 0, 0],
        [10, 0, 0, 0, 0, 0],
        [20, 0, 0, 0, 0, 0],
        [30, 0, 0, 0, 0, 0],
        [0, 0, 0, 0, 0, 0]
      ]);
    });

    it('reports where the threshold ramp was stopped', async () => {
      const controller = new AbortController();
      const finding = findThresholdAction(
        { profilePath, channel: 'green', intervalMs: 60_000, signal: controller.signal },
        context.ctx
      );
      while (context.transport.packets.length === 0) {
        await tick();
      }
      controller.abort();

      await expect(finding).resolves.toEqual({ written: 1, cancelled: true, lastValue: 0 });
    });
  });

  describe('settings', () => {
    it('shows settings via the helper', async () => {
      const result = await showSettingsAction(context.ctx);
      expect(result.serial.path).toBe('/dev/ttyACM0');
    });

    it('sets a single key', async () => {
      await expect(setSettingAction({ key: 'sweep.step', value: '64' }, context.ctx)).resolves.toEqual({
        key: 'sweep.step',
        value: 64
      });
      expect(context.updateSettings).toHaveBeenCalledTimes(1);
      expect((await showSettingsAction(context.ctx)).sweep.step).toBe(64);
    });

    it('rejects unknown keys before touching the file', async () => {
      await expect(setSettingAction({ key: 'laser.power', value: '1' }, context.ctx)).rejects.toThrow(
        "Unknown setting 'laser.power'"
      );
      expect(context.updateSettings).not.toHaveBeenCalled();
    });
  });
});
