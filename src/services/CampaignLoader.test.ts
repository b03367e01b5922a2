import { Effect, Logger, LogLevel, Option, Schema } from 'effect';
import { describe, expect, it } from 'vitest';

import { CampaignSnapshotSchema } from '../core/Schemas';
import { makeCampaignInput, makeDropInput, makeFakeTwitchApi } from '../testing/fakes';
import { loadCampaign } from './CampaignLoader';

import type { CampaignSnapshot } from '../core/Schemas';
import type { TwitchApiTag } from './TwitchApi';

const decode = Schema.decodeUnknownSync(CampaignSnapshotSchema);

const run = <A, E>(campaigns: ReadonlyMap<string, CampaignSnapshot>, effect: Effect.Effect<A, E, TwitchApiTag>) =>
  Effect.runPromise(
    effect.pipe(
      Effect.provide(makeFakeTwitchApi(() => Effect.dieMessage('no claims expected'), campaigns).layer),
      Effect.provide(Logger.minimumLogLevel(LogLevel.None)),
    ),
  );

describe('loadCampaign', () => {
  it('builds the campaign from its details', async () => {
    const snapshot = decode(
      makeCampaignInput({
        timeBasedDrops: [makeDropInput('a', { self: { isClaimed: true, currentMinutesWatched: 0, dropInstanceID: null } }), makeDropInput('b')],
      }),
    );
    const result = await run(new Map([['campaign-1', snapshot]]), loadCampaign('campaign-1', 'streamer'));

    expect(Option.isSome(result)).toBe(true);
    expect(Option.map(result, (c) => [c.name, c.claimedDrops, c.totalDrops])).toEqual(Option.some(['Spring Event', 1, 2]));
  });

  it('returns none when the campaign is gone', async () => {
    await expect(run(new Map(), loadCampaign('campaign-1', 'streamer'))).resolves.toEqual(Option.none());
  });

  it('fails on a broken drop graph', async () => {
    const snapshot = decode(makeCampaignInput({ timeBasedDrops: [makeDropInput('a', { preconditionDrops: [{ id: 'ghost' }] })] }));
    const error = await run(new Map([['campaign-1', snapshot]]), Effect.flip(loadCampaign('campaign-1', 'streamer')));

    expect(error._tag).toBe('CampaignParseError');
    expect(error.message).toBe('Drop a has unknown precondition ghost');
  });
});
