import { Option } from 'effect';

/**
 * A derived value computed on first read and kept until {@link Memo.invalidate}.
 * There is no time-based expiry; whoever mutates an input invalidates the cell.
 */
export class Memo<A> {
  private cached: Option.Option<A> = Option.none();

  public constructor(private readonly compute: () => A) {}

  public get value(): A {
    if (Option.isSome(this.cached)) {
      return this.cached.value;
    }

    const value = this.compute();
    this.cached = Option.some(value);
    return value;
  }

  public get isCached(): boolean {
    return Option.isSome(this.cached);
  }

  public invalidate(): void {
    this.cached = Option.none();
  }
}
