import chalk from 'chalk';
import { Effect, Option } from 'effect';

import { Campaign } from '../struct/Campaign';
import { TwitchApiTag } from './TwitchApi';

import type { CampaignParseError } from '../struct/Campaign';
import type { TwitchApiError } from './TwitchApi';

/**
 * Fetches a campaign's details and builds a fresh graph from them. `None` when the
 * campaign no longer exists for the user.
 */
export const loadCampaign = (
  campaignId: string,
  channelLogin: string,
): Effect.Effect<Option.Option<Campaign>, TwitchApiError | CampaignParseError, TwitchApiTag> =>
  Effect.gen(function* () {
    const api = yield* TwitchApiTag;
    const snapshot = yield* api.campaignDetails(campaignId, channelLogin);
    if (Option.isNone(snapshot)) {
      yield* Effect.logDebug(`Campaign ${campaignId} is no longer available`);
      return Option.none();
    }

    const campaign = yield* Campaign.make(snapshot.value);
    yield* Effect.logDebug(`${chalk.green(campaign.name)} | ${chalk.yellow(`${campaign.claimedDrops}/${campaign.totalDrops} drops claimed`)}`);
    return Option.some(campaign);
  }).pipe(Effect.annotateLogs({ service: 'CampaignLoader', campaignId }));
