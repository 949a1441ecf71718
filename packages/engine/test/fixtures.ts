import type { DeckCategory, Direction, EventCard, EventContent, ExitMap, TileCategory, TileRecord } from '@pocket-horde/shared';
import { ScriptedChoiceProvider, createGame, type GameEngine, type TileSupply } from '../src';

export const exits = (...open: Direction[]): ExitMap => ({
  N: open.includes('N'),
  E: open.includes('E'),
  S: open.includes('S'),
  W: open.includes('W'),
});

export const room = (name: string, category: TileCategory, ...open: Direction[]): TileRecord => ({
  name,
  category,
  exits: exits(...open),
});

export const indoor = (name: string, ...open: Direction[]): TileRecord => room(name, 'Indoor', ...open);
export const outdoor = (name: string, ...open: Direction[]): TileRecord => room(name, 'Outdoor', ...open);

export const FOYER = indoor('Foyer', 'N');

export const card = (item: string, content: EventContent): EventCard => ({
  item,
  events: { '9 PM': content, '10 PM': content, '11 PM': content },
});

export const quiet = (item = 'Candle'): EventCard => card(item, { kind: 'HEALTH', delta: 0, message: 'all quiet' });
export const zombies = (count: number, item = 'Candle'): EventCard =>
  card(item, { kind: 'ZOMBIES', count, message: `${count} zombies` });
export const itemFind = (item = 'Candle'): EventCard => card(item, { kind: 'ITEM', message: 'you search the room' });
export const health = (delta: number, item = 'Candle'): EventCard =>
  card(item, { kind: 'HEALTH', delta, message: `health ${delta}` });

export const quietCards = (count: number): EventCard[] => Array.from({ length: count }, () => quiet());

export class ListSupply implements TileSupply {
  constructor(
    private readonly indoorTiles: TileRecord[],
    private readonly outdoorTiles: TileRecord[] = [],
  ) {}

  tilesFor(category: DeckCategory): readonly TileRecord[] {
    return category === 'Indoor' ? this.indoorTiles : this.outdoorTiles;
  }
}

export interface GameSetup {
  indoor?: TileRecord[];
  outdoor?: TileRecord[];
  cards?: EventCard[];
  answers?: string[];
  health?: number;
  attack?: number;
  clock?: string[];
}

export const START = { row: 3, col: 3 };

export const setupGame = (setup: GameSetup = {}): { game: GameEngine; choices: ScriptedChoiceProvider } => {
  const choices = new ScriptedChoiceProvider(setup.answers ?? []);
  const game = createGame({
    tiles: new ListSupply([FOYER, ...(setup.indoor ?? [])], setup.outdoor ?? []),
    eventCards: setup.cards ?? quietCards(10),
    choices,
    start: START,
    seed: 'test-seed',
    shuffle: false,
    health: setup.health,
    attack: setup.attack,
    clock: setup.clock,
  });
  return { game, choices };
};
