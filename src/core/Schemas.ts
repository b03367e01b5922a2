import { ParseResult, Schema } from 'effect';

const UTC_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

/**
 * An ISO-8601 UTC timestamp such as `2024-05-01T17:00:00Z`, decoded into a `Date`.
 */
export const UtcTimestamp = Schema.transformOrFail(Schema.String.pipe(Schema.pattern(UTC_TIMESTAMP)), Schema.DateFromSelf, {
  strict: true,
  decode: (value, _, ast) => {
    const date = new Date(value);
    // Date rolls impossible calendar days over, e.g. Feb 31 into March
    const isExact = !Number.isNaN(date.getTime()) && date.toISOString().replace(/\.\d{3}Z$/, 'Z') === value.replace(/\.\d+Z$/, 'Z');
    return isExact ? ParseResult.succeed(date) : ParseResult.fail(new ParseResult.Type(ast, value, `Invalid timestamp: ${value}`));
  },
  encode: (date) => ParseResult.succeed(date.toISOString().replace(/\.\d{3}Z$/, 'Z')),
});

export const GameIdSchema = Schema.Union(Schema.Int, Schema.NumberFromString.pipe(Schema.int())).pipe(Schema.lessThanOrEqualTo(Number.MAX_SAFE_INTEGER));

export const GameSnapshotSchema = Schema.Struct({
  id: GameIdSchema,
  name: Schema.optional(Schema.String),
  displayName: Schema.optional(Schema.String),
  slug: Schema.optional(Schema.String),
}).pipe(Schema.filter((game) => game.name !== undefined || game.displayName !== undefined || 'game requires a name or displayName'));

export type GameSnapshot = Schema.Schema.Type<typeof GameSnapshotSchema>;

export const DropSelfSchema = Schema.Struct({
  isClaimed: Schema.Boolean,
  currentMinutesWatched: Schema.Int,
  dropInstanceID: Schema.NullOr(Schema.String),
  hasPreconditionsMet: Schema.optional(Schema.Boolean),
});

export const TimeBasedDropSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  startAt: UtcTimestamp,
  endAt: UtcTimestamp,
  requiredMinutesWatched: Schema.Int.pipe(Schema.positive()),
  benefitEdges: Schema.Array(
    Schema.Struct({
      benefit: Schema.Struct({
        id: Schema.optional(Schema.String),
        name: Schema.String,
      }),
    }),
  ),
  self: Schema.optional(Schema.NullOr(DropSelfSchema)),
  preconditionDrops: Schema.optional(Schema.NullOr(Schema.Array(Schema.Struct({ id: Schema.String })))),
});

/**
 * Schema for the `dropCampaign` record of a DropCampaignDetails response.
 */
export const CampaignSnapshotSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  game: GameSnapshotSchema,
  startAt: UtcTimestamp,
  endAt: UtcTimestamp,
  allow: Schema.optional(
    Schema.NullOr(
      Schema.Struct({
        channels: Schema.NullOr(Schema.Array(Schema.Struct({ name: Schema.String }))),
      }),
    ),
  ),
  timeBasedDrops: Schema.Array(TimeBasedDropSchema),
});

export type CampaignSnapshot = Schema.Schema.Type<typeof CampaignSnapshotSchema>;

export type CampaignSnapshotInput = Schema.Schema.Encoded<typeof CampaignSnapshotSchema>;

export const GqlErrorSchema = Schema.Struct({
  message: Schema.String,
  path: Schema.optional(Schema.Array(Schema.Union(Schema.String, Schema.Number))),
});

export type GqlError = Schema.Schema.Type<typeof GqlErrorSchema>;

export const GqlExtensionsSchema = Schema.Struct({
  durationMilliseconds: Schema.Number,
  operationName: Schema.String,
  requestID: Schema.String,
});

/**
 * Factory for a GraphQL response envelope whose `data` field is decoded with `data`.
 * Errors are kept on the envelope so callers can decide what they mean.
 */
export const GqlResponseSchema = <A, I, R>(data: Schema.Schema<A, I, R>) =>
  Schema.Struct({
    data: Schema.optional(Schema.NullOr(data)),
    errors: Schema.optional(Schema.NullOr(Schema.Array(GqlErrorSchema))),
    extensions: Schema.optional(GqlExtensionsSchema),
  });

export interface GqlResponse<T = unknown> {
  readonly data?: T | null;
  readonly errors?: ReadonlyArray<GqlError> | null;
  readonly extensions?: Schema.Schema.Type<typeof GqlExtensionsSchema>;
}

/**
 * Schema for the DropsPage_ClaimDropRewards response data. Some gateways nest the
 * business errors inside `data`, so both places are honoured.
 */
export const ClaimDropsSchema = Schema.Struct({
  claimDropRewards: Schema.optional(
    Schema.NullOr(
      Schema.Struct({
        status: Schema.optional(Schema.NullOr(Schema.String)),
      }),
    ),
  ),
  errors: Schema.optional(Schema.NullOr(Schema.Array(Schema.Unknown))),
});

export type ClaimDrops = Schema.Schema.Type<typeof ClaimDropsSchema>;

/**
 * Schema for the DropCampaignDetails response data. `dropCampaign` is null when the
 * campaign no longer exists for the user.
 */
export const CampaignDetailsSchema = Schema.Struct({
  user: Schema.NullOr(
    Schema.Struct({
      dropCampaign: Schema.NullOr(CampaignSnapshotSchema),
    }),
  ),
});

export type CampaignDetails = Schema.Schema.Type<typeof CampaignDetailsSchema>;
