#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';

import { CHANNELS, formatLutRows } from '@lasercal/curves';
import type { PointUpdate } from '@lasercal/curves';

import {
  addPointAction,
  createLasercalContext,
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
import { parseBitDepth, parseChannel, parseInteger, parseLutSize, parseMode, parseRepeat } from './parse';

const ctx = createLasercalContext();

const handleError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`lasercal error: ${message}`));
  process.exitCode = 1;
};

const withInterrupt = async <T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
};

const program = new Command();
program
  .name('lasercal')
  .description('Laser diode brightness calibration')
  .version('0.1.0')
  .option('-p, --profile <file>', 'Calibration profile JSON', 'laser_profile.json');

const profilePath = (): string => program.opts<{ profile: string }>().profile;

const profile = program.command('profile').description('Calibration profile files');

profile
  .command('init')
  .option('-b, --bit-depth <bits>', 'PWM resolution, 12 or 16 (defaults to the bitDepth setting)')
  .option('-f, --force', 'Overwrite an existing profile', false)
  .action(async (options: { bitDepth?: string; force?: boolean }) => {
    try {
      const created = await initProfileAction(
        {
          profilePath: profilePath(),
          bitDepth: options.bitDepth === undefined ? undefined : parseBitDepth(options.bitDepth),
          force: Boolean(options.force)
        },
        ctx
      );
      console.log(pc.green(`Created ${profilePath()} (${created.bitDepth}-bit).`));
    } catch (error) {
      handleError(error);
    }
  });

profile
  .command('show')
  .description('Print every channel with its control points')
  .action(async () => {
    try {
      const current = await showProfileAction(profilePath());
      console.log(pc.bold(`${profilePath()}: ${current.bitDepth}-bit`));
      for (const channel of CHANNELS) {
        const curve = current[channel];
        console.log(`${channel}: ${curve.mode}, threshold ${curve.threshold}`);
        for (const point of curve.points) {
          console.log(pc.dim(`  ${point.input} -> ${point.output}`));
        }
      }
    } catch (error) {
      handleError(error);
    }
  });

const point = program.command('point').description('Edit control points (addressed by input)');

point
  .command('add')
  .argument('<channel>', 'red, green or blue')
  .argument('<input>', 'Input value')
  .argument('<output>', 'PWM output')
  .action(async (channel: string, input: string, output: string) => {
    try {
      const added = await addPointAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        input: parseInteger('input', input),
        output: parseInteger('output', output)
      });
      console.log(pc.green(`Added ${channel} ${added.input} -> ${added.output}.`));
    } catch (error) {
      handleError(error);
    }
  });

point
  .command('set')
  .argument('<channel>', 'red, green or blue')
  .argument('<input>', 'Input of the point to change')
  .option('-i, --input <value>', 'New input')
  .option('-o, --output <value>', 'New output')
  .action(async (channel: string, input: string, options: { input?: string; output?: string }) => {
    try {
      const changes: PointUpdate = {};
      if (options.input !== undefined) {
        changes.input = parseInteger('input', options.input);
      }
      if (options.output !== undefined) {
        changes.output = parseInteger('output', options.output);
      }
      const updated = await setPointAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        input: parseInteger('input', input),
        changes
      });
      console.log(pc.green(`Updated ${channel} point to ${updated.input} -> ${updated.output}.`));
    } catch (error) {
      handleError(error);
    }
  });

point
  .command('remove')
  .argument('<channel>', 'red, green or blue')
  .argument('<input>', 'Input of the point to remove')
  .action(async (channel: string, input: string) => {
    try {
      await removePointAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        input: parseInteger('input', input)
      });
      console.log(pc.yellow(`Removed ${channel} point at ${input}.`));
    } catch (error) {
      handleError(error);
    }
  });

point
  .command('split')
  .description('Insert a point halfway between two neighbouring points')
  .argument('<channel>', 'red, green or blue')
  .argument('<lower>', 'Input of the lower point')
  .argument('<upper>', 'Input of the upper point')
  .action(async (channel: string, lower: string, upper: string) => {
    try {
      const inserted = await splitPointAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        lower: parseInteger('lower', lower),
        upper: parseInteger('upper', upper)
      });
      if (!inserted) {
        console.log(pc.yellow(`No room between ${lower} and ${upper}.`));
        return;
      }
      console.log(pc.green(`Added ${channel} ${inserted.input} -> ${inserted.output}.`));
    } catch (error) {
      handleError(error);
    }
  });

const curve = program.command('curve').description('Channel curves and lookup tables');

curve
  .command('mode')
  .argument('<channel>', 'red, green or blue')
  .argument('<mode>', 'linear or monotone-cubic')
  .action(async (channel: string, mode: string) => {
    try {
      await setModeAction({ profilePath: profilePath(), channel: parseChannel(channel), mode: parseMode(mode) });
      console.log(pc.green(`${channel} now uses ${mode}.`));
    } catch (error) {
      handleError(error);
    }
  });

curve
  .command('threshold')
  .argument('<channel>', 'red, green or blue')
  .argument('<value>', 'Lowest output for any non-zero input')
  .action(async (channel: string, value: string) => {
    try {
      await setThresholdAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        threshold: parseInteger('threshold', value)
      });
      console.log(pc.green(`${channel} threshold set to ${value}.`));
    } catch (error) {
      handleError(error);
    }
  });

curve
  .command('eval')
  .argument('<channel>', 'red, green or blue')
  .argument('<inputs...>', 'Input values')
  .action(async (channel: string, inputs: string[]) => {
    try {
      const results = await evalCurveAction({
        profilePath: profilePath(),
        channel: parseChannel(channel),
        inputs: inputs.map(raw => parseInteger('input', raw))
      });
      for (const result of results) {
        console.log(`${result.input} -> ${result.value}`);
      }
    } catch (error) {
      handleError(error);
    }
  });

curve
  .command('lut')
  .argument('<channel>', 'red, green or blue')
  .option('-s, --size <entries>', 'Table size (defaults to the lutSize setting)')
  .action(async (channel: string, options: { size?: string }) => {
    try {
      const lut = await lutAction(
        {
          profilePath: profilePath(),
          channel: parseChannel(channel),
          size: options.size === undefined ? undefined : parseLutSize(options.size)
        },
        ctx
      );
      for (const line of formatLutRows(lut.table)) {
        console.log(line);
      }
      if (!lut.monotonic) {
        console.log(pc.yellow(`${channel} table is not monotonic; check the control points.`));
      }
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('export')
  .description('Write RED_LUT, GREEN_LUT and BLUE_LUT to a C header')
  .argument('[output]', 'Header path', 'laser_lut.h')
  .option('-s, --size <entries>', 'Table size (defaults to the lutSize setting)')
  .action(async (output: string, options: { size?: string }) => {
    try {
      const written = await exportAction(
        {
          profilePath: profilePath(),
          outputPath: output,
          size: options.size === undefined ? undefined : parseLutSize(options.size)
        },
        ctx
      );
      console.log(pc.green(`Wrote ${written.outputPath} (${written.size} entries per channel).`));
    } catch (error) {
      handleError(error);
    }
  });

const device = program.command('device').description('Live preview on the laser driver');

device
  .command('ports')
  .description('List serial ports that look like a laser driver')
  .action(async () => {
    try {
      const ports = await listPortsAction(ctx);
      if (!ports.length) {
        console.log('No serial ports found.');
        return;
      }
      for (const port of ports) {
        console.log(`- ${port}`);
      }
    } catch (error) {
      handleError(error);
    }
  });

device
  .command('send')
  .description('Send raw PWM values')
  .argument('<red>', 'Red PWM')
  .argument('<green>', 'Green PWM')
  .argument('<blue>', 'Blue PWM')
  .option('--port <path>', 'Serial port (defaults to the serial.path setting)')
  .option('--hold <ms>', 'Keep the values on before blacking out', '1000')
  .action(async (red: string, green: string, blue: string, options: { port?: string; hold: string }) => {
    try {
      const packet = await withInterrupt(signal =>
        sendAction(
          {
            port: options.port,
            holdMs: parseInteger('hold', options.hold),
            signal,
            red: parseInteger('red', red),
            green: parseInteger('green', green),
            blue: parseInteger('blue', blue)
          },
          ctx
        )
      );
      console.log(pc.dim(Array.from(packet, byte => byte.toString(16).padStart(2, '0')).join(' ')));
    } catch (error) {
      handleError(error);
    }
  });

device
  .command('test')
  .description('Show the calibrated output for one input')
  .argument('<channel>', 'red, green or blue')
  .argument('<input>', 'Input value')
  .option('--port <path>', 'Serial port (defaults to the serial.path setting)')
  .option('--hold <ms>', 'Keep the value on before blacking out', '2000')
  .action(async (channel: string, input: string, options: { port?: string; hold: string }) => {
    try {
      const value = await withInterrupt(signal =>
        testPointAction(
          {
            profilePath: profilePath(),
            port: options.port,
            holdMs: parseInteger('hold', options.hold),
            signal,
            channel: parseChannel(channel),
            input: parseInteger('input', input)
          },
          ctx
        )
      );
      console.log(`${channel} ${input} -> ${value}`);
    } catch (error) {
      handleError(error);
    }
  });

device
  .command('sweep')
  .description('Step one channel through its calibrated range (Ctrl+C stops)')
  .argument('<channel>', 'red, green or blue')
  .option('--port <path>', 'Serial port (defaults to the serial.path setting)')
  .option('--from <input>', 'First input (default 0)')
  .option('--to <input>', 'Last input (default: the maximum input)')
  .option('--step <inputs>', 'Input increment (defaults to the sweep.step setting)')
  .option('--interval <ms>', 'Delay between packets (defaults to the sweep.intervalMs setting)')
  .option('--repeat <mode>', 'once, wrap or bounce', 'once')
  .option('--raw', 'Send inputs as PWM values, skipping the curve and threshold', false)
  .action(
    async (
      channel: string,
      options: {
        port?: string;
        from?: string;
        to?: string;
        step?: string;
        interval?: string;
        repeat: string;
        raw: boolean;
      }
    ) => {
      try {
        const optional = (label: string, raw: string | undefined, min = 0) =>
          raw === undefined ? undefined : parseInteger(label, raw, min);
        const result = await withInterrupt(signal =>
          sweepAction(
            {
              profilePath: profilePath(),
              port: options.port,
              channel: parseChannel(channel),
              from: optional('from', options.from),
              to: optional('to', options.to),
              step: optional('step', options.step, 1),
              intervalMs: optional('interval', options.interval),
              repeat: parseRepeat(options.repeat),
              raw: options.raw,
              signal,
              onStep: step => console.log(pc.dim(`${step.input} -> ${step.value}`))
            },
            ctx
          )
        );
        const summary = `Sweep ${result.cancelled ? 'stopped' : 'finished'} after ${result.written} packets.`;
        console.log(result.cancelled ? pc.yellow(summary) : pc.green(summary));
      } catch (error) {
        handleError(error);
      }
    }
  );

device
  .command('threshold')
  .description('Ramp raw PWM up from 0; press Ctrl+C when the laser lights up')
  .argument('<channel>', 'red, green or blue')
  .option('--port <path>', 'Serial port (defaults to the serial.path setting)')
  .option('--to <value>', 'Highest value to try', '2000')
  .option('--step <value>', 'Increment per packet', '10')
  .option('--interval <ms>', 'Delay between packets', '50')
  .action(async (channel: string, options: { port?: string; to: string; step: string; interval: string }) => {
    try {
      const parsedChannel = parseChannel(channel);
      const result = await withInterrupt(signal =>
        findThresholdAction(
          {
            profilePath: profilePath(),
            port: options.port,
            channel: parsedChannel,
            to: parseInteger('to', options.to),
            step: parseInteger('step', options.step, 1),
            intervalMs: parseInteger('interval', options.interval),
            signal,
            onStep: step => console.log(pc.dim(String(step.value)))
          },
          ctx
        )
      );
      if (result.cancelled && result.lastValue !== null) {
        console.log(pc.green(`Stopped at ${result.lastValue}.`));
        console.log(`Set it with: lasercal curve threshold ${parsedChannel} ${result.lastValue}`);
      } else {
        console.log(pc.yellow(`Ramp ended at ${result.lastValue ?? 0} without a stop.`));
      }
    } catch (error) {
      handleError(error);
    }
  });

const settings = program.command('settings').description('Settings helpers');

settings
  .command('show')
  .description('Print the current settings JSON')
  .action(async () => {
    try {
      const data = await showSettingsAction(ctx);
      console.log(JSON.stringify(data, null, 2));
    } catch (error) {
      handleError(error);
    }
  });

settings
  .command('set')
  .argument('<key>', 'Setting key, e.g. serial.path')
  .argument('<value>', "New value ('none' clears serial.path)")
  .action(async (key: string, value: string) => {
    try {
      const updated = await setSettingAction({ key, value }, ctx);
      console.log(pc.green(`${updated.key} set to ${updated.value ?? 'none'}`));
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
