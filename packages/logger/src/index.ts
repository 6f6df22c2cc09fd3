import pino, { Logger as PinoLogger, LoggerOptions as PinoLoggerOptions } from 'pino';
import { logConfig, parseConfig } from '@tiered/config';

export type LogFormat = 'json' | 'pretty';

export interface RootLoggerOptions {
  level: string;
  format: LogFormat;
  name: string;
}

/** Connection strings may carry credentials. */
const REDACTED_PATHS = ['connectionString', '*.connectionString'];

function rootOptions(options: RootLoggerOptions): PinoLoggerOptions {
  return {
    level: options.level,
    name: options.name,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

export function createRootLogger(options: RootLoggerOptions): PinoLogger {
  if (options.format === 'json') {
    return pino(rootOptions(options));
  }

  // level formatters and transports do not mix
  const { formatters: _formatters, ...base } = rootOptions(options);
  return pino({
    ...base,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });
}

/** Level and format from the environment; an invalid environment logs at info as JSON. */
export function loggerOptionsFromEnv(
  env: Record<string, string | undefined>
): Pick<RootLoggerOptions, 'level' | 'format'> {
  const parsed = parseConfig(env);
  return parsed.success ? logConfig(parsed.data) : { level: 'info', format: 'json' };
}

export const logger = createRootLogger({ ...loggerOptionsFromEnv(process.env), name: 'tiered-trader' });

/** Child logger for one component; repository components add `{ repository }`. */
export function createServiceLogger(
  serviceName: string,
  bindings: Record<string, unknown> = {}
): PinoLogger {
  return logger.child({ service: serviceName, ...bindings });
}

export type { PinoLogger as Logger };
