import { join } from 'node:path';
import { Cause, Layer, Logger, LogLevel, Predicate, Schema } from 'effect';
import pino from 'pino';
import pinoPretty from 'pino-pretty';

import { LogLevelSchema } from '../core/Config';

import type { ReadonlyRecord } from 'effect/Record';
import type { DestinationStream, StreamEntry } from 'pino';

export const PINO_LEVEL_MAP: ReadonlyRecord<string, LogLevel.LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
  fatal: LogLevel.Fatal,
  silent: LogLevel.None,
};

export const EFFECT_LEVEL_MAP: ReadonlyRecord<LogLevel.LogLevel['_tag'], pino.LevelWithSilent> = {
  All: 'trace',
  Trace: 'trace',
  Debug: 'debug',
  Info: 'info',
  Warning: 'warn',
  Error: 'error',
  Fatal: 'fatal',
  None: 'silent',
};

export const LoggerOptions = Schema.Struct({
  dir: Schema.optional(Schema.String),
  level: Schema.optional(LogLevelSchema),
  trace: Schema.optional(Schema.Boolean),
  pretty: Schema.optional(Schema.Boolean),
});

export type LoggerOptions = Schema.Schema.Type<typeof LoggerOptions> & {
  /**
   * Replaces the console stream, e.g. with an in-memory sink.
   */
  readonly destination?: DestinationStream;
};

/**
 * Creates the pino instance behind the Effect logger. File streams are only
 * opened when `dir` is given: `errors.log` receives warnings and above, and
 * `traces.log` everything when `trace` is set.
 */
export const makeLoggerClient = (options: LoggerOptions = {}): pino.Logger => {
  const { dir, level = process.env.NODE_ENV === 'development' ? 'debug' : 'info', trace = false, pretty = true, destination } = options;

  const fileStreams: StreamEntry[] = dir
    ? [
        { level: 'warn', stream: pino.destination({ mkdir: true, dest: join(dir, 'errors.log') }) },
        ...(trace ? [{ level: 'trace' as const, stream: pino.destination({ mkdir: true, dest: join(dir, 'traces.log') }) }] : []),
      ]
    : [];

  const consoleStream: DestinationStream = destination
    ? destination
    : pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          sync: process.env.NODE_ENV === 'development',
          singleLine: process.env.NODE_ENV === 'production',
        })
      : process.stdout;

  const streams: StreamEntry[] = [...fileStreams, { level: level === 'silent' ? 'fatal' : level, stream: consoleStream }];

  return pino(
    {
      level,
      base: undefined,
      nestedKey: 'payload',
      hooks: {
        logMethod(args, method) {
          if (args.length >= 2) {
            const [arg0, arg1, ...rest] = args;
            if (typeof arg0 === 'string' && typeof arg1 === 'object') {
              return method.apply(this, [arg1, arg0, ...rest]);
            }

            if (args.every((r) => typeof r === 'string')) {
              return method.apply(this, [args.join(' ')]);
            }
          }
          return method.apply(this, args);
        },
      },
    },
    pino.multistream(streams),
  );
};

/**
 * Replaces `self` (usually `Logger.defaultLogger`) with one that writes to `logger`,
 * carrying log annotations and the failure cause into the pino payload.
 */
export const LoggerClientLayer = (self: Logger.Logger<unknown, void>, logger: pino.Logger): Layer.Layer<never> =>
  Layer.mergeAll(
    Logger.replace(
      self,
      Logger.make(({ logLevel, message, cause, annotations }) => {
        const level = EFFECT_LEVEL_MAP[logLevel._tag] ?? 'info';
        const payload: unknown[] = Array.isArray(message) ? [...message] : [message];
        const context = Object.fromEntries(annotations);

        if (cause && !Cause.isEmptyType(cause)) {
          const [failure] = Cause.failures(cause);
          const causePretty = { ...context, cause: Cause.pretty(cause) };

          if (Predicate.hasProperty(failure, 'cause') && Predicate.isObject(failure.cause)) {
            payload.push({ ...failure.cause, ...causePretty });
          } else {
            payload.push(causePretty);
          }
        } else if (Object.keys(context).length > 0) {
          payload.push(context);
        }

        const logMethod = logger[level] as (...args: readonly unknown[]) => void;
        logMethod.call(logger, ...payload);
      }),
    ),
    Logger.minimumLogLevel(PINO_LEVEL_MAP[logger.level] ?? LogLevel.Info),
  );
