import { Memo } from '../structures/Memo';

/**
 * Progress measured in watched minutes. Implemented by anything earned through
 * watch time, independently of how it is claimed.
 */
export interface TimeTracked {
  readonly currentMinutes: number;
  readonly requiredMinutes: number;
  readonly progress: number;
  readonly remainingMinutes: number;
  readonly setMinutes: (minutes: number) => boolean;
  readonly incrementMinute: () => boolean;
}

export class WatchProgress implements TimeTracked {
  private minutes: number;

  private readonly progressMemo = new Memo(() => this.minutes / this.requiredMinutes);
  private readonly remainingMemo = new Memo(() => this.requiredMinutes - this.minutes);

  /**
   * @param onChange - Called after the cached values are invalidated.
   */
  public constructor(
    public readonly requiredMinutes: number,
    currentMinutes: number,
    private readonly onChange: () => void,
  ) {
    if (!Number.isInteger(requiredMinutes) || requiredMinutes <= 0) {
      throw new RangeError(`Required minutes must be a positive integer, got ${requiredMinutes}`);
    }
    this.minutes = this.clamp(currentMinutes);
  }

  public get currentMinutes(): number {
    return this.minutes;
  }

  public get progress(): number {
    return this.progressMemo.value;
  }

  public get remainingMinutes(): number {
    return this.remainingMemo.value;
  }

  /**
   * Sets the watched minutes, clamped to `[0, requiredMinutes]`. Returns whether
   * the value changed.
   */
  public setMinutes(minutes: number): boolean {
    const next = this.clamp(minutes);
    if (next === this.minutes) return false;

    this.minutes = next;
    this.changed();
    return true;
  }

  /**
   * Adds one watched minute. Does nothing once the requirement is met.
   */
  public incrementMinute(): boolean {
    if (this.minutes >= this.requiredMinutes) return false;

    this.minutes += 1;
    this.changed();
    return true;
  }

  public saturate(): void {
    this.setMinutes(this.requiredMinutes);
  }

  private changed(): void {
    this.progressMemo.invalidate();
    this.remainingMemo.invalidate();
    this.onChange();
  }

  private clamp(minutes: number): number {
    if (!Number.isFinite(minutes)) {
      throw new RangeError(`Watched minutes must be finite, got ${minutes}`);
    }
    return Math.min(this.requiredMinutes, Math.max(0, Math.floor(minutes)));
  }
}
