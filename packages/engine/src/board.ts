import {
  DEFAULT_CLOCK,
  ROOMS,
  type Coordinate,
  type DeckCategory,
  type EventCard,
  type TileRecord,
} from '@pocket-horde/shared';
import { createEventDeck, createTileDeck, type Deck } from './deck';
import { coordinateKey, type Tile } from './tile';

export interface TileSupply {
  tilesFor(category: DeckCategory): readonly TileRecord[];
}

export interface BoardConfig {
  tiles: TileSupply;
  eventCards: readonly EventCard[];
  start: Coordinate;
  clock?: readonly string[] | undefined;
  seed: string | number;
  shuffle?: boolean | undefined;
}

export interface DrawnTile {
  tile: Tile | undefined;
  category: DeckCategory;
}

// Rooms whose neighbours come from a fixed deck regardless of their own category.
const NEIGHBOUR_DECK_BY_ROOM: Readonly<Record<string, DeckCategory>> = {
  [ROOMS.FOYER]: 'Indoor',
  [ROOMS.DINING_ROOM]: 'Indoor',
  [ROOMS.PATIO]: 'Outdoor',
};

const validateEventCards = (cards: readonly EventCard[], clock: readonly string[]): void => {
  if (cards.length === 0) {
    throw new Error('event deck needs at least one card');
  }
  for (const card of cards) {
    const missing = clock.find((label) => !card.events[label]);
    if (missing) {
      throw new Error(`event card "${card.item}" has no event for ${missing}`);
    }
  }
};

export class Board {
  readonly indoorDeck: Deck<Tile>;
  readonly outdoorDeck: Deck<Tile>;
  readonly foyer: Tile;
  private patio: Tile | undefined;
  private events: Deck<EventCard>;
  private readonly tileMap = new Map<string, Tile>();
  private readonly clock: readonly string[];
  private clockIndex = 0;

  constructor(private readonly config: BoardConfig) {
    this.clock = [...(config.clock ?? DEFAULT_CLOCK)];
    if (this.clock.length === 0) {
      throw new Error('clock needs at least one label');
    }
    validateEventCards(config.eventCards, this.clock);

    this.indoorDeck = createTileDeck({
      name: 'Indoor',
      tiles: config.tiles.tilesFor('Indoor'),
      seed: config.seed,
      shuffle: config.shuffle,
    });
    this.outdoorDeck = createTileDeck({
      name: 'Outdoor',
      tiles: config.tiles.tilesFor('Outdoor'),
      seed: config.seed,
      shuffle: config.shuffle,
    });

    const foyer = this.indoorDeck.drawByName(ROOMS.FOYER);
    if (!foyer) {
      throw new Error(`indoor tiles must include the ${ROOMS.FOYER}`);
    }
    this.foyer = foyer;
    this.patio = this.outdoorDeck.drawByName(ROOMS.PATIO);
    this.events = this.restockEvents();
    this.place(config.start, foyer);
  }

  get eventDeck(): Deck<EventCard> {
    return this.events;
  }

  get currentClock(): string {
    return this.clock[this.clockIndex] ?? '';
  }

  isFinalHour(): boolean {
    return this.clockIndex >= this.clock.length - 1;
  }

  /** Moves the clock one label forward and restocks the dev cards; no-op at the last label. */
  updateTime(): boolean {
    if (this.isFinalHour()) {
      return false;
    }
    this.clockIndex += 1;
    this.events = this.restockEvents();
    return true;
  }

  isExplored(location: Coordinate): boolean {
    return this.tileMap.has(coordinateKey(location));
  }

  tileAt(location: Coordinate): Tile | undefined {
    return this.tileMap.get(coordinateKey(location));
  }

  place(location: Coordinate, tile: Tile): void {
    this.tileMap.set(coordinateKey(location), tile);
  }

  get exploredCount(): number {
    return this.tileMap.size;
  }

  deckFor(fromRoom: Tile): DeckCategory {
    return NEIGHBOUR_DECK_BY_ROOM[fromRoom.name] ?? (fromRoom.category === 'Outdoor' ? 'Outdoor' : 'Indoor');
  }

  drawTile(fromRoom: Tile): DrawnTile {
    const category = this.deckFor(fromRoom);
    const deck = category === 'Outdoor' ? this.outdoorDeck : this.indoorDeck;
    return { tile: deck.draw(), category };
  }

  takePatio(): Tile | undefined {
    const patio = this.patio;
    this.patio = undefined;
    return patio;
  }

  private restockEvents(): Deck<EventCard> {
    return createEventDeck(this.config.eventCards, `${this.config.seed}:${this.clockIndex}`, this.config.shuffle);
  }
}
