import { Equal, Hash } from 'effect';

import type { GameSnapshot } from '../core/Schemas';

/**
 * The game a campaign belongs to. Two games are equal when their ids are, whatever
 * name the server reported at the time.
 */
export class Game implements Equal.Equal {
  public constructor(
    public readonly id: number,
    public readonly name: string,
  ) {}

  public static fromSnapshot(game: GameSnapshot): Game {
    return new Game(game.id, game.name ?? game.displayName ?? '');
  }

  public [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Game && that.id === this.id;
  }

  public [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.number(this.id))(Hash.string('Game')));
  }

  public toString(): string {
    return this.name;
  }
}
