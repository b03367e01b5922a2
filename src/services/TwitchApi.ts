import chalk from 'chalk';
import { Context, Data, Effect, Layer, Option, Schema } from 'effect';

import { Twitch } from '../core/Constants';
import { CampaignDetailsSchema, ClaimDropsSchema, GqlResponseSchema } from '../core/Schemas';
import { HttpClientTag } from '../structures/HttpClient';
import { GqlQueries } from './TwitchQueries';

import type { Env } from '../core/Config';
import type { CampaignSnapshot, ClaimDrops, GqlResponse } from '../core/Schemas';
import type { HttpClientError } from '../structures/HttpClient';
import type { GraphqlRequest } from './TwitchQueries';

export class TwitchApiError extends Data.TaggedError('TwitchApiError')<{
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

export interface GraphqlOptions {
  /**
   * Transport-level retries for network failures. Mutations pass 0 so a request
   * is sent at most once.
   */
  readonly retry?: number;
}

export interface TwitchApi {
  readonly graphql: <A, I, R>(
    requests: GraphqlRequest | ReadonlyArray<GraphqlRequest>,
    schema: Schema.Schema<A, I, R>,
    options?: GraphqlOptions,
  ) => Effect.Effect<ReadonlyArray<GqlResponse<A>>, TwitchApiError, R>;
  readonly claimDrops: (dropInstanceID: string) => Effect.Effect<GqlResponse<ClaimDrops>, TwitchApiError>;
  readonly campaignDetails: (dropID: string, channelLogin: string) => Effect.Effect<Option.Option<CampaignSnapshot>, TwitchApiError>;
}

export class TwitchApiTag extends Context.Tag('@services/TwitchApi')<TwitchApiTag, TwitchApi>() {}

const isBatch = (requests: GraphqlRequest | ReadonlyArray<GraphqlRequest>): requests is ReadonlyArray<GraphqlRequest> => Array.isArray(requests);

const toRequestBody = (requests: ReadonlyArray<GraphqlRequest>): string =>
  JSON.stringify(
    requests.map((r) => ({
      operationName: r.operationName,
      variables: r.variables,
      query: r.query,
      extensions: r.hash
        ? {
            persistedQuery: {
              version: 1,
              sha256Hash: r.hash,
            },
          }
        : undefined,
    })),
  );

export const TwitchApiLayer = (env: Pick<Env, 'AUTH_TOKEN' | 'CLIENT_ID' | 'IS_DEBUG'>): Layer.Layer<TwitchApiTag, never, HttpClientTag> =>
  Layer.effect(
    TwitchApiTag,
    Effect.gen(function* () {
      const http = yield* HttpClientTag;
      const headers = {
        authorization: `OAuth ${env.AUTH_TOKEN}`,
        'client-id': env.CLIENT_ID,
        'content-type': 'application/json',
      };

      const graphql = <A, I, R>(
        requests: GraphqlRequest | ReadonlyArray<GraphqlRequest>,
        schema: Schema.Schema<A, I, R>,
        options: GraphqlOptions = {},
      ): Effect.Effect<ReadonlyArray<GqlResponse<A>>, TwitchApiError, R> =>
        Effect.gen(function* () {
          const batch = isBatch(requests) ? requests : [requests];
          const response = yield* http
            .request<unknown>({
              method: 'POST',
              url: Twitch.ApiUrl,
              headers,
              body: toRequestBody(batch),
              responseType: 'json',
              retry: options.retry,
            })
            .pipe(Effect.mapError((e: HttpClientError) => new TwitchApiError({ message: e.message, status: e.status, cause: e })));

          if (env.IS_DEBUG) {
            yield* Effect.logDebug(`API: ${chalk.bold(response.statusCode)} POST ${batch.map((r) => r.operationName).join(',')}`);
          }

          if (response.statusCode === 401) {
            yield* Effect.logError(chalk.red('Unauthorized: Invalid OAuth token detected during request'));
            return yield* Effect.fail(new TwitchApiError({ message: 'Unauthorized: Invalid OAuth token', status: 401 }));
          }

          if (response.statusCode >= 400) {
            return yield* Effect.fail(new TwitchApiError({ message: `GraphQL request failed with status ${response.statusCode}`, status: response.statusCode }));
          }

          const body = Array.isArray(response.body) ? response.body : [response.body];
          const decode = Schema.decodeUnknown(GqlResponseSchema(schema));

          return yield* Effect.forEach(body, (res) =>
            decode(res).pipe(Effect.mapError((cause) => new TwitchApiError({ message: 'GraphQL Validation Error', cause }))),
          );
        }).pipe(Effect.annotateLogs({ service: 'TwitchApi', operation: 'graphql' }));

      const first = <A>(responses: ReadonlyArray<A>, operationName: string): Effect.Effect<A, TwitchApiError> =>
        responses.length > 0 ? Effect.succeed(responses[0]) : Effect.fail(new TwitchApiError({ message: `Empty GraphQL response for ${operationName}` }));

      const claimDrops = (dropInstanceID: string): Effect.Effect<GqlResponse<ClaimDrops>, TwitchApiError> =>
        graphql(GqlQueries.claimDrops(dropInstanceID), ClaimDropsSchema, { retry: 0 }).pipe(
          Effect.flatMap((responses) => first(responses, 'DropsPage_ClaimDropRewards')),
        );

      const campaignDetails = (dropID: string, channelLogin: string): Effect.Effect<Option.Option<CampaignSnapshot>, TwitchApiError> =>
        graphql(GqlQueries.campaignDetails(dropID, channelLogin), CampaignDetailsSchema).pipe(
          Effect.flatMap((responses) => first(responses, 'DropCampaignDetails')),
          Effect.flatMap((res) =>
            res.errors && res.errors.length > 0
              ? Effect.fail(new TwitchApiError({ message: `GraphQL Error: ${res.errors[0].message}`, cause: res.errors }))
              : Effect.succeed(Option.fromNullable(res.data?.user?.dropCampaign)),
          ),
        );

      return {
        graphql,
        claimDrops,
        campaignDetails,
      } satisfies TwitchApi;
    }),
  );
