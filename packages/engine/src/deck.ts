import type { DeckCategory, EventCard, TileRecord } from '@pocket-horde/shared';
import { createRandom } from './random';
import { Tile } from './tile';

export const shuffleItems = <T>(items: readonly T[], seed: string | number): T[] => {
  const random = createRandom(seed);
  const shuffled = [...items];

  // Fisher-Yates from the back.
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j] as T, shuffled[i] as T];
  }

  return shuffled;
};

/**
 * Ordered, destructively drawn collection. The order is fixed when the deck is
 * built; nothing is ever put back.
 */
export class Deck<T> {
  private readonly items: T[];

  constructor(
    readonly name: string,
    items: readonly T[],
    private readonly nameOf: (item: T) => string,
  ) {
    this.items = [...items];
  }

  get count(): number {
    return this.items.length;
  }

  peek(): readonly T[] {
    return [...this.items];
  }

  draw(): T | undefined {
    return this.items.shift();
  }

  drawByName(name: string): T | undefined {
    const index = this.items.findIndex((item) => this.nameOf(item) === name);
    if (index === -1) {
      return undefined;
    }
    const [found] = this.items.splice(index, 1);
    return found;
  }
}

export interface TileDeckConfig {
  name: DeckCategory;
  tiles: readonly TileRecord[];
  seed: string | number;
  shuffle?: boolean | undefined;
}

export const createTileDeck = (config: TileDeckConfig): Deck<Tile> => {
  const ordered = config.shuffle === false ? [...config.tiles] : shuffleItems(config.tiles, `${config.seed}:${config.name}`);
  return new Deck(
    config.name,
    ordered.map((record) => new Tile(record)),
    (tile) => tile.name,
  );
};

export const createEventDeck = (
  cards: readonly EventCard[],
  seed: string | number,
  shuffle?: boolean,
): Deck<EventCard> => {
  const ordered = shuffle === false ? [...cards] : shuffleItems(cards, seed);
  return new Deck('Development', ordered, (card) => card.item);
};
