import { Data, Effect, Schema } from 'effect';

import { CampaignSnapshotSchema } from '../core/Schemas';
import { getWindowStatus, isWithinWindow } from '../helpers/TwitchHelper';
import { Memo } from '../structures/Memo';
import { Game } from './Game';
import { TimedDrop } from './TimedDrop';

import type { CampaignStatus } from '../core/Constants';
import type { CampaignSnapshot } from '../core/Schemas';
import type { RewardUnit } from './Drop';
import type { DropProgressView, TimedDropParent } from './TimedDrop';

export class CampaignParseError extends Data.TaggedError('CampaignParseError')<{
  readonly message: string;
  readonly campaignId?: string;
  readonly cause?: unknown;
}> {}

export interface CampaignProgressView {
  readonly id: string;
  readonly name: string;
  readonly game: string;
  readonly status: CampaignStatus;
  readonly totalDrops: number;
  readonly claimedDrops: number;
  readonly remainingDrops: number;
  readonly remainingMinutes: number;
  readonly progress: number;
  readonly drops: readonly DropProgressView[];
}

const findContractViolation = (snapshot: CampaignSnapshot): string | undefined => {
  const ids = new Set<string>();
  for (const drop of snapshot.timeBasedDrops) {
    if (ids.has(drop.id)) return `Duplicate drop id ${drop.id}`;
    ids.add(drop.id);
  }

  for (const drop of snapshot.timeBasedDrops) {
    for (const precondition of drop.preconditionDrops ?? []) {
      if (precondition.id === drop.id) return `Drop ${drop.id} lists itself as a precondition`;
      if (!ids.has(precondition.id)) return `Drop ${drop.id} has unknown precondition ${precondition.id}`;
    }
  }
  return undefined;
};

/**
 * A drop campaign and its time-based drops. The graph is built once from a
 * snapshot; afterwards only watched minutes and claims change it, and the
 * aggregates below are recomputed on the next read after either.
 */
export class Campaign implements TimedDropParent {
  public readonly id: string;
  public readonly name: string;
  public readonly game: Game;
  public readonly startAt: Date;
  public readonly endAt: Date;
  public readonly allowedChannels: readonly string[];

  private readonly drops = new Map<string, TimedDrop>();

  private readonly claimedMemo = new Memo(() => this.dropList.filter((d) => d.isClaimed).length);
  private readonly remainingDropsMemo = new Memo(() => this.dropList.filter((d) => !d.isClaimed).length);
  private readonly remainingMinutesMemo = new Memo(() => this.dropList.reduce((sum, d) => sum + d.remainingMinutes, 0));
  private readonly progressMemo = new Memo(() =>
    this.drops.size === 0 ? 0 : this.dropList.reduce((sum, d) => sum + d.progress, 0) / this.drops.size,
  );

  private constructor(snapshot: CampaignSnapshot) {
    this.id = snapshot.id;
    this.name = snapshot.name.trim();
    this.game = Game.fromSnapshot(snapshot.game);
    this.startAt = snapshot.startAt;
    this.endAt = snapshot.endAt;
    this.allowedChannels = snapshot.allow?.channels?.map((c) => c.name) ?? [];

    for (const data of snapshot.timeBasedDrops) {
      const drop = new TimedDrop(this, {
        id: data.id,
        name: data.name.trim(),
        rewards: data.benefitEdges.map((edge) => edge.benefit.name),
        startAt: data.startAt,
        endAt: data.endAt,
        claimToken: data.self?.dropInstanceID ?? undefined,
        isClaimed: data.self?.isClaimed ?? false,
        preconditionIds: (data.preconditionDrops ?? []).map((p) => p.id),
        currentMinutes: data.self?.currentMinutesWatched ?? 0,
        requiredMinutes: data.requiredMinutesWatched,
      });
      this.drops.set(drop.id, drop);
    }
  }

  /**
   * Builds the graph from an already decoded snapshot.
   */
  public static make(snapshot: CampaignSnapshot): Effect.Effect<Campaign, CampaignParseError> {
    const violation = findContractViolation(snapshot);
    if (violation !== undefined) {
      return Effect.fail(new CampaignParseError({ message: violation, campaignId: snapshot.id }));
    }

    return Effect.try({
      try: () => new Campaign(snapshot),
      catch: (cause) => new CampaignParseError({ message: `Failed to build campaign ${snapshot.id}`, campaignId: snapshot.id, cause }),
    });
  }

  /**
   * Decodes a raw `dropCampaign` record and builds the graph.
   */
  public static fromSnapshot(raw: unknown): Effect.Effect<Campaign, CampaignParseError> {
    return Schema.decodeUnknown(CampaignSnapshotSchema)(raw).pipe(
      Effect.mapError((cause) => new CampaignParseError({ message: 'Malformed campaign snapshot', cause })),
      Effect.flatMap((snapshot) => Campaign.make(snapshot)),
    );
  }

  public get dropList(): readonly TimedDrop[] {
    return Array.from(this.drops.values());
  }

  public get totalDrops(): number {
    return this.drops.size;
  }

  public get claimedDrops(): number {
    return this.claimedMemo.value;
  }

  public get remainingDrops(): number {
    return this.remainingDropsMemo.value;
  }

  public get remainingMinutes(): number {
    return this.remainingMinutesMemo.value;
  }

  /**
   * Mean progress over all drops; 0 for a campaign without drops.
   */
  public get progress(): number {
    return this.progressMemo.value;
  }

  public get claimableDrops(): readonly TimedDrop[] {
    return this.dropList.filter((d) => d.canClaim && !d.isClaimed);
  }

  public earnableDrops(nowMs: number = Date.now()): readonly TimedDrop[] {
    return this.dropList.filter((d) => d.canEarn(nowMs));
  }

  public getDrop(id: string): TimedDrop | undefined {
    return this.drops.get(id);
  }

  public isActive(nowMs: number = Date.now()): boolean {
    return isWithinWindow(this.startAt, this.endAt, nowMs);
  }

  public isUpcoming(nowMs: number = Date.now()): boolean {
    return nowMs < this.startAt.getTime();
  }

  public isExpired(nowMs: number = Date.now()): boolean {
    return this.endAt.getTime() <= nowMs;
  }

  public status(nowMs: number = Date.now()): CampaignStatus {
    return getWindowStatus(this.startAt, this.endAt, nowMs);
  }

  /**
   * An empty allow-list means any channel streaming the game counts.
   */
  public isChannelAllowed(login: string): boolean {
    if (this.allowedChannels.length === 0) return true;
    const needle = login.toLowerCase();
    return this.allowedChannels.some((channel) => channel.toLowerCase() === needle);
  }

  public onDropClaimed(_drop: RewardUnit): void {
    this.claimedMemo.invalidate();
    this.remainingDropsMemo.invalidate();
    // any drop may list the claimed one as a precondition
    for (const drop of this.drops.values()) {
      drop.invalidatePreconditions();
    }
  }

  public onMinutesChanged(_drop: TimedDrop): void {
    this.progressMemo.invalidate();
    this.remainingMinutesMemo.invalidate();
  }

  public view(nowMs: number = Date.now()): CampaignProgressView {
    return {
      id: this.id,
      name: this.name,
      game: this.game.name,
      status: this.status(nowMs),
      totalDrops: this.totalDrops,
      claimedDrops: this.claimedDrops,
      remainingDrops: this.remainingDrops,
      remainingMinutes: this.remainingMinutes,
      progress: this.progress,
      drops: this.dropList.map((d) => d.view(nowMs)),
    };
  }
}
