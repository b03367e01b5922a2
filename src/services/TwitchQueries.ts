import { Schema } from 'effect';

export const GraphqlRequestSchema = Schema.Struct({
  operationName: Schema.String,
  variables: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  query: Schema.optional(Schema.String),
  hash: Schema.optional(Schema.String),
});

export type GraphqlRequest = Schema.Schema.Type<typeof GraphqlRequestSchema>;

export const GqlQueries = {
  campaignDetails: (dropID: string, channelLogin: string): GraphqlRequest => ({
    operationName: 'DropCampaignDetails',
    hash: '039277bf98f3130929262cc7c6efd9c141ca3749cb6dca442fc8ead9a53f77c1',
    variables: { dropID, channelLogin },
  }),
  claimDrops: (dropInstanceID: string): GraphqlRequest => ({
    operationName: 'DropsPage_ClaimDropRewards',
    hash: 'a455deea71bdc9015b78eb49f4acfbce8baa7ccbedd28e549bb025bd0f751930',
    variables: { input: { dropInstanceID } },
  }),
} as const;
