import { Effect, Layer, Logger, ManagedRuntime } from 'effect';

import { loadEnv } from '../core/Config';
import { TwitchApiLayer } from '../services/TwitchApi';
import { HttpClientLayer } from './HttpClient';
import { LoggerClientLayer, makeLoggerClient } from './LoggerClient';

import type { ConfigError, Env } from '../core/Config';
import type { TwitchApiTag } from '../services/TwitchApi';
import type { LoggerOptions } from './LoggerClient';

/**
 * Everything a campaign needs at run time: the pino-backed logger and the
 * GraphQL client over got.
 */
export const makeRuntimeLayer = (env: Env, options: LoggerOptions = {}): Layer.Layer<TwitchApiTag> => {
  const logger = makeLoggerClient({ level: env.LOG_LEVEL ?? (env.IS_DEBUG ? 'debug' : undefined), ...options });
  const loggerLayer = LoggerClientLayer(Logger.defaultLogger, logger);
  const apiLayer = TwitchApiLayer(env).pipe(Layer.provide(HttpClientLayer));

  return Layer.merge(apiLayer, loggerLayer);
};

/**
 * A runtime for callers outside Effect, e.g. a plain async polling loop:
 * `await runtime.runPromise(drop.claim())`. Dispose it when done.
 */
export const makeRuntime = (env: Env, options: LoggerOptions = {}): ManagedRuntime.ManagedRuntime<TwitchApiTag, never> =>
  ManagedRuntime.make(makeRuntimeLayer(env, options));

/**
 * Builds the runtime from the process environment.
 */
export const makeRuntimeFromEnv = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: LoggerOptions = {},
): Effect.Effect<ManagedRuntime.ManagedRuntime<TwitchApiTag, never>, ConfigError> =>
  loadEnv(env).pipe(Effect.map((decoded) => makeRuntime(decoded, options)));
