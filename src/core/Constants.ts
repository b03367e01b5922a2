import { Data, Schema } from 'effect';

export const Twitch = Data.struct({
  ApiUrl: 'https://gql.twitch.tv/gql',
  ClientId: 'kimne78kx3ncx6brgo4mv6wki5h1ko',
} as const);

/**
 * Claim statuses the server reports for a successful (or already successful) claim.
 * Anything else, including statuses added later, counts as a failure.
 */
export const CLAIM_SUCCESS_STATUSES: ReadonlySet<string> = new Set(['ELIGIBLE_FOR_ALL', 'DROP_INSTANCE_ALREADY_CLAIMED']);

export const DropClaimState = Data.struct({
  Unclaimable: 'Unclaimable',
  Claimable: 'Claimable',
  Claiming: 'Claiming',
  Claimed: 'Claimed',
} as const);

export type DropClaimState = (typeof DropClaimState)[keyof typeof DropClaimState];

export const CampaignStatus = Schema.Literal('ACTIVE', 'UPCOMING', 'EXPIRED');

export type CampaignStatus = Schema.Schema.Type<typeof CampaignStatus>;
