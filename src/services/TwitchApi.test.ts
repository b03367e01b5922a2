import { Effect, Layer, Logger, LogLevel, Option } from 'effect';
import { describe, expect, it } from 'vitest';

import { Twitch } from '../core/Constants';
import { ClaimDropsSchema } from '../core/Schemas';
import { HttpClientError } from '../structures/HttpClient';
import { makeCampaignInput, makeDropInput, makeFakeHttpClient } from '../testing/fakes';
import { TwitchApiError, TwitchApiLayer, TwitchApiTag } from './TwitchApi';
import { GqlQueries } from './TwitchQueries';

import type { HttpResponse } from '../structures/HttpClient';
import type { TwitchApi } from './TwitchApi';

const env = { AUTH_TOKEN: 'test-secret', CLIENT_ID: 'test-client', IS_DEBUG: false };

const ok = (body: unknown, statusCode = 200): Effect.Effect<HttpResponse<unknown>> => Effect.succeed({ statusCode, headers: {}, body });

const setup = (respond: Parameters<typeof makeFakeHttpClient>[0]) => {
  const http = makeFakeHttpClient(respond);
  const layer = TwitchApiLayer(env).pipe(Layer.provide(http.layer));
  const run = <A, E>(f: (api: TwitchApi) => Effect.Effect<A, E>): Promise<A> =>
    Effect.runPromise(
      Effect.flatMap(TwitchApiTag, f).pipe(Effect.provide(layer), Effect.provide(Logger.minimumLogLevel(LogLevel.None))),
    );
  const runError = <A, E>(f: (api: TwitchApi) => Effect.Effect<A, E>): Promise<E> => run((api) => Effect.flip(f(api)));
  return { requests: http.requests, run, runError };
};

describe('TwitchApi.claimDrops', () => {
  it('sends a single persisted mutation without retries', async () => {
    const { requests, run } = setup(() => ok({ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } } }));

    await expect(run((api) => api.claimDrops('token-a'))).resolves.toEqual({ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } } });
    expect(requests).toHaveLength(1);

    const [request] = requests;
    expect(request.url).toBe(Twitch.ApiUrl);
    expect(request.method).toBe('POST');
    expect(request.retry).toBe(0);
    expect(request.headers).toEqual({
      authorization: 'OAuth test-secret',
      'client-id': 'test-client',
      'content-type': 'application/json',
    });
    expect(typeof request.body === 'string' ? JSON.parse(request.body) : undefined).toEqual([
      {
        operationName: 'DropsPage_ClaimDropRewards',
        variables: { input: { dropInstanceID: 'token-a' } },
        extensions: {
          persistedQuery: {
            version: 1,
            sha256Hash: 'a455deea71bdc9015b78eb49f4acfbce8baa7ccbedd28e549bb025bd0f751930',
          },
        },
      },
    ]);
  });

  it('rejects an invalid token', async () => {
    const { runError } = setup(() => ok({}, 401));
    const error = await runError((api) => api.claimDrops('token-a'));

    expect(error).toBeInstanceOf(TwitchApiError);
    expect(error.status).toBe(401);
    expect(error.message).toBe('Unauthorized: Invalid OAuth token');
  });

  it('fails on other error statuses', async () => {
    const { runError } = setup(() => ok({}, 500));
    const error = await runError((api) => api.claimDrops('token-a'));

    expect(error.status).toBe(500);
    expect(error.message).toBe('GraphQL request failed with status 500');
  });

  it('maps transport failures', async () => {
    const { runError } = setup(() => Effect.fail(new HttpClientError({ message: 'socket hang up', code: 'ECONNRESET' })));
    const error = await runError((api) => api.claimDrops('token-a'));

    expect(error.message).toBe('socket hang up');
    expect(error.cause).toBeInstanceOf(HttpClientError);
  });

  it('fails on a response that does not decode', async () => {
    const { runError } = setup(() => ok({ data: { claimDropRewards: { status: 5 } } }));

    expect((await runError((api) => api.claimDrops('token-a'))).message).toBe('GraphQL Validation Error');
  });

  it('fails on an empty batch', async () => {
    const { runError } = setup(() => ok([]));

    expect((await runError((api) => api.claimDrops('token-a'))).message).toBe('Empty GraphQL response for DropsPage_ClaimDropRewards');
  });
});

describe('TwitchApi.graphql', () => {
  it('sends batches and decodes each response', async () => {
    const { requests, run } = setup(() =>
      ok([{ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } } }, { data: null, errors: [{ message: 'not found' }] }]),
    );

    const responses = await run((api) => api.graphql([GqlQueries.claimDrops('token-a'), GqlQueries.claimDrops('token-b')], ClaimDropsSchema));

    expect(responses).toEqual([{ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } } }, { data: null, errors: [{ message: 'not found' }] }]);
    expect(requests[0].retry).toBeUndefined();
  });
});

describe('TwitchApi.campaignDetails', () => {
  it('decodes the campaign', async () => {
    const { requests, run } = setup(() => ok({ data: { user: { dropCampaign: makeCampaignInput() } } }));
    const result = await run((api) => api.campaignDetails('campaign-1', 'streamer'));

    expect(Option.map(result, (c) => c.startAt.getTime())).toEqual(Option.some(Date.UTC(2024, 4, 1)));
    expect(typeof requests[0].body === 'string' ? JSON.parse(requests[0].body) : undefined).toMatchObject([
      { operationName: 'DropCampaignDetails', variables: { dropID: 'campaign-1', channelLogin: 'streamer' } },
    ]);
  });

  it('returns none for a missing campaign', async () => {
    const { run } = setup(() => ok({ data: { user: { dropCampaign: null } } }));

    await expect(run((api) => api.campaignDetails('campaign-1', 'streamer'))).resolves.toEqual(Option.none());
  });

  it('fails on GraphQL errors', async () => {
    const { runError } = setup(() => ok({ data: null, errors: [{ message: 'service timeout' }] }));

    expect((await runError((api) => api.campaignDetails('campaign-1', 'streamer'))).message).toBe('GraphQL Error: service timeout');
  });

  it('fails on a malformed campaign', async () => {
    const { runError } = setup(() =>
      ok({ data: { user: { dropCampaign: makeCampaignInput({ timeBasedDrops: [makeDropInput('a', { requiredMinutesWatched: 0 })] }) } } }),
    );

    expect((await runError((api) => api.campaignDetails('campaign-1', 'streamer'))).message).toBe('GraphQL Validation Error');
  });
});
