import { Data, Effect, Schema } from 'effect';

import { Twitch } from './Constants';

export class ConfigError extends Data.TaggedError('ConfigError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const BooleanLike = Schema.Union(
  Schema.Boolean,
  Schema.transform(Schema.String, Schema.Boolean, {
    decode: (s) => s === 'true',
    encode: (b) => String(b),
  }),
);

export const LogLevelSchema = Schema.Literal('trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent');

export const EnvSchema = Schema.Struct({
  AUTH_TOKEN: Schema.NonEmptyString,
  CLIENT_ID: Schema.optionalWith(Schema.NonEmptyString, { default: () => Twitch.ClientId }),
  IS_DEBUG: Schema.optionalWith(BooleanLike, { default: () => false }),
  LOG_LEVEL: Schema.optional(LogLevelSchema),
});

export type Env = Schema.Schema.Type<typeof EnvSchema>;

/**
 * Decodes the process environment (or any record of the same shape).
 */
export const loadEnv = (env: Readonly<Record<string, string | undefined>> = process.env): Effect.Effect<Env, ConfigError> =>
  Schema.decodeUnknown(EnvSchema)(env, { onExcessProperty: 'ignore' }).pipe(
    Effect.mapError((cause) => new ConfigError({ message: 'Invalid environment configuration', cause })),
  );
