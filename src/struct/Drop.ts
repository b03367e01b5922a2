import chalk from 'chalk';
import { Deferred, Effect, Exit, Option } from 'effect';

import { DropClaimState } from '../core/Constants';
import { interpretClaimResponse, isWithinWindow } from '../helpers/TwitchHelper';
import { TwitchApiTag } from '../services/TwitchApi';
import { Memo } from '../structures/Memo';

import type { ClaimOutcome } from '../helpers/TwitchHelper';

/**
 * What every claimable reward unit exposes, whatever tracks its progress.
 */
export interface RewardUnit {
  readonly id: string;
  readonly name: string;
  readonly rewards: readonly string[];
  readonly startAt: Date;
  readonly endAt: Date;
  readonly claimToken: string | undefined;
  readonly isClaimed: boolean;
  readonly preconditionIds: ReadonlySet<string>;
  readonly state: DropClaimState;
  readonly preconditionsMet: boolean;
  readonly canClaim: boolean;
  readonly canEarn: (nowMs?: number) => boolean;
  readonly claim: () => Effect.Effect<boolean, never, TwitchApiTag>;
}

/**
 * The owning campaign, as seen from one of its drops. Lookups only; the drop never
 * owns its parent.
 */
export interface DropParent {
  readonly isActive: (nowMs?: number) => boolean;
  readonly getDrop: (id: string) => Pick<RewardUnit, 'isClaimed'> | undefined;
  readonly onDropClaimed: (drop: RewardUnit) => void;
}

export interface DropInit {
  readonly id: string;
  readonly name: string;
  readonly rewards: readonly string[];
  readonly startAt: Date;
  readonly endAt: Date;
  readonly claimToken?: string | undefined;
  readonly isClaimed: boolean;
  readonly preconditionIds?: Iterable<string>;
}

export interface DropHooks {
  /**
   * Runs inside the successful claim transition, after `isClaimed` is set and
   * before the parent is notified.
   */
  readonly onClaimed?: () => void;
  /**
   * The unit reported to the parent, when the drop is embedded in a larger one.
   */
  readonly owner?: () => RewardUnit;
}

type ClaimPlan =
  | { readonly _tag: 'Done'; readonly result: boolean }
  | { readonly _tag: 'Join'; readonly deferred: Deferred.Deferred<boolean> }
  | { readonly _tag: 'Start'; readonly token: string; readonly deferred: Deferred.Deferred<boolean> };

export class Drop implements RewardUnit {
  public readonly id: string;
  public readonly name: string;
  public readonly rewards: readonly string[];
  public readonly startAt: Date;
  public readonly endAt: Date;
  public readonly preconditionIds: ReadonlySet<string>;

  private token: string | undefined;
  private claimed: boolean;
  private inflight: Option.Option<Deferred.Deferred<boolean>> = Option.none();

  private readonly lock = Effect.unsafeMakeSemaphore(1);
  private readonly preconditions = new Memo(() => Array.from(this.preconditionIds).every((id) => this.parent.getDrop(id)?.isClaimed ?? false));

  public constructor(
    private readonly parent: DropParent,
    data: DropInit,
    private readonly hooks: DropHooks = {},
  ) {
    this.id = data.id;
    this.name = data.name;
    this.rewards = [...data.rewards];
    this.startAt = data.startAt;
    this.endAt = data.endAt;
    this.token = data.claimToken || undefined;
    this.claimed = data.isClaimed;
    this.preconditionIds = new Set(data.preconditionIds ?? []);
  }

  public get claimToken(): string | undefined {
    return this.token;
  }

  public get isClaimed(): boolean {
    return this.claimed;
  }

  public get state(): DropClaimState {
    if (this.claimed) return DropClaimState.Claimed;
    if (Option.isSome(this.inflight)) return DropClaimState.Claiming;
    return this.token ? DropClaimState.Claimable : DropClaimState.Unclaimable;
  }

  public get preconditionsMet(): boolean {
    return this.preconditions.value;
  }

  /**
   * Claiming only needs a claim token; the server accepts claims slightly outside
   * the watch window.
   */
  public get canClaim(): boolean {
    return this.token !== undefined;
  }

  public canEarn(nowMs: number = Date.now()): boolean {
    return this.preconditionsMet && !this.claimed && this.parent.isActive(nowMs) && isWithinWindow(this.startAt, this.endAt, nowMs);
  }

  public rewardsText(delimiter = ', '): string {
    return this.rewards.join(delimiter);
  }

  /**
   * Records a claim token allocated after the snapshot was taken.
   */
  public setClaimToken(token: string): void {
    if (this.claimed || !token) return;
    this.token = token;
  }

  public invalidatePreconditions(): void {
    this.preconditions.invalidate();
  }

  /**
   * Claims the drop. Resolves `true` when the drop is (or already was) claimed and
   * `false` otherwise; failures are logged, never retried. Concurrent calls share
   * the request in flight.
   *
   * Only the request and the wait on a shared request are interruptible; once a
   * claim is started it always settles.
   */
  public claim(): Effect.Effect<boolean, never, TwitchApiTag> {
    return Effect.uninterruptibleMask((restore) =>
      Effect.gen(this, function* () {
        const plan = yield* this.lock.withPermits(1)(this.planClaim());
        switch (plan._tag) {
          case 'Done':
            return plan.result;
          case 'Join':
            return yield* restore(Deferred.await(plan.deferred));
          case 'Start':
            yield* Effect.logDebug(`${chalk.green(this.name)} | Claiming`);
            return yield* this.runClaim(plan.token, plan.deferred, restore);
        }
      }),
    ).pipe(Effect.annotateLogs({ service: 'Drop', dropId: this.id }));
  }

  private planClaim(): Effect.Effect<ClaimPlan> {
    return Effect.gen(this, function* () {
      if (this.token === undefined) return { _tag: 'Done', result: false } as const;
      if (this.claimed) return { _tag: 'Done', result: true } as const;
      if (Option.isSome(this.inflight)) return { _tag: 'Join', deferred: this.inflight.value } as const;

      const deferred = yield* Deferred.make<boolean>();
      this.inflight = Option.some(deferred);
      return { _tag: 'Start', token: this.token, deferred } as const;
    });
  }

  private runClaim(
    token: string,
    deferred: Deferred.Deferred<boolean>,
    restore: <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>,
  ): Effect.Effect<boolean, never, TwitchApiTag> {
    return Effect.gen(this, function* () {
      const api = yield* TwitchApiTag;
      const outcome = yield* restore(api.claimDrops(token)).pipe(
        Effect.map(interpretClaimResponse),
        Effect.catchAll((error) => Effect.succeed<ClaimOutcome>({ success: false, reason: error.message })),
      );

      if (outcome.success) {
        yield* Effect.logInfo(`${chalk.green(this.name)} | ${chalk.yellow('Drops claimed')}`);
      } else {
        yield* Effect.logWarning(`${chalk.green(this.name)} | ${chalk.red(`Claim failed: ${outcome.reason}`)}`);
      }
      return outcome.success;
    }).pipe(
      Effect.onExit((exit) => {
        const success = Exit.isSuccess(exit) && exit.value;
        return this.lock.withPermits(1)(Effect.sync(() => this.settle(success))).pipe(Effect.zipRight(Deferred.succeed(deferred, success)));
      }),
    );
  }

  private settle(success: boolean): void {
    this.inflight = Option.none();
    if (!success || this.claimed) return;

    this.claimed = true;
    this.hooks.onClaimed?.();
    this.parent.onDropClaimed(this.hooks.owner?.() ?? this);
  }
}
