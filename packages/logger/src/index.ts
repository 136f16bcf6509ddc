import pino from 'pino';

export type LogLevelName = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevelName[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const isLogLevel = (value: string): value is LogLevelName => LOG_LEVELS.some(level => level === value);

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevelName => {
  const requested = env.LASERCAL_LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  // keep test output readable unless a level is asked for explicitly
  return env.VITEST ? 'silent' : 'info';
};

const baseOptions: pino.LoggerOptions = {
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: label => ({ level: label })
  },
  serializers: {
    err: pino.stdSerializers.err
  }
};

const prettyTransport =
  process.env.LASERCAL_LOG_PRETTY === 'true'
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          errorLikeObjectKeys: ['err', 'error']
        }
      })
    : undefined;

export const logger = prettyTransport ? pino(baseOptions, prettyTransport) : pino(baseOptions);

export type Logger = pino.Logger;

export const createLogger = (component: string): Logger => logger.child({ component });

export const curvesLogger = createLogger('curves');
export const deviceLogger = createLogger('device');
export const engineLogger = createLogger('engine');
export const cliLogger = createLogger('cli');
