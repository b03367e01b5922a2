import type { Effect } from 'effect';

import { Drop } from './Drop';
import { WatchProgress } from './WatchProgress';

import type { DropClaimState } from '../core/Constants';
import type { TwitchApiTag } from '../services/TwitchApi';
import type { DropInit, DropParent, RewardUnit } from './Drop';
import type { TimeTracked } from './WatchProgress';

export interface TimedDropParent extends DropParent {
  readonly onMinutesChanged: (drop: TimedDrop) => void;
}

export interface TimedDropInit extends DropInit {
  readonly currentMinutes: number;
  readonly requiredMinutes: number;
}

/**
 * Read-only state of a drop for whatever renders progress.
 */
export interface DropProgressView {
  readonly id: string;
  readonly name: string;
  readonly rewards: string;
  readonly state: DropClaimState;
  readonly currentMinutes: number;
  readonly requiredMinutes: number;
  readonly remainingMinutes: number;
  readonly progress: number;
  readonly canClaim: boolean;
  readonly canEarn: boolean;
  readonly endAt: Date;
}

/**
 * A drop earned by watch time: a {@link Drop} for the claim, a {@link WatchProgress}
 * for the minutes.
 */
export class TimedDrop implements RewardUnit, TimeTracked {
  public readonly drop: Drop;
  public readonly watch: WatchProgress;

  public constructor(parent: TimedDropParent, data: TimedDropInit) {
    // claimed drops report 0 watched minutes
    const currentMinutes = data.isClaimed ? data.requiredMinutes : data.currentMinutes;
    this.watch = new WatchProgress(data.requiredMinutes, currentMinutes, () => parent.onMinutesChanged(this));
    this.drop = new Drop(parent, data, {
      onClaimed: () => this.watch.saturate(),
      owner: () => this,
    });
  }

  public get id(): string {
    return this.drop.id;
  }

  public get name(): string {
    return this.drop.name;
  }

  public get rewards(): readonly string[] {
    return this.drop.rewards;
  }

  public get startAt(): Date {
    return this.drop.startAt;
  }

  public get endAt(): Date {
    return this.drop.endAt;
  }

  public get claimToken(): string | undefined {
    return this.drop.claimToken;
  }

  public get isClaimed(): boolean {
    return this.drop.isClaimed;
  }

  public get preconditionIds(): ReadonlySet<string> {
    return this.drop.preconditionIds;
  }

  public get state(): DropClaimState {
    return this.drop.state;
  }

  public get preconditionsMet(): boolean {
    return this.drop.preconditionsMet;
  }

  public get canClaim(): boolean {
    return this.drop.canClaim;
  }

  public get currentMinutes(): number {
    return this.watch.currentMinutes;
  }

  public get requiredMinutes(): number {
    return this.watch.requiredMinutes;
  }

  public get progress(): number {
    return this.watch.progress;
  }

  public get remainingMinutes(): number {
    return this.watch.remainingMinutes;
  }

  public canEarn(nowMs: number = Date.now()): boolean {
    return this.drop.canEarn(nowMs);
  }

  public rewardsText(delimiter = ', '): string {
    return this.drop.rewardsText(delimiter);
  }

  public setClaimToken(token: string): void {
    this.drop.setClaimToken(token);
  }

  public invalidatePreconditions(): void {
    this.drop.invalidatePreconditions();
  }

  /**
   * Ignored once claimed: a claimed drop always counts as fully watched.
   */
  public setMinutes(minutes: number): boolean {
    if (this.drop.isClaimed) return false;
    return this.watch.setMinutes(minutes);
  }

  public incrementMinute(): boolean {
    return this.watch.incrementMinute();
  }

  public claim(): Effect.Effect<boolean, never, TwitchApiTag> {
    return this.drop.claim();
  }

  public view(nowMs: number = Date.now()): DropProgressView {
    return {
      id: this.id,
      name: this.name,
      rewards: this.rewardsText(),
      state: this.state,
      currentMinutes: this.currentMinutes,
      requiredMinutes: this.requiredMinutes,
      remainingMinutes: this.remainingMinutes,
      progress: this.progress,
      canClaim: this.canClaim,
      canEarn: this.canEarn(nowMs),
      endAt: this.endAt,
    };
  }
}
