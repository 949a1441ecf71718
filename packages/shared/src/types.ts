import type { DECK_CATEGORIES, DIRECTIONS, TILE_CATEGORIES } from './constants';
import type { ErrorCode } from './errors';

export type Direction = (typeof DIRECTIONS)[number];
export type DeckCategory = (typeof DECK_CATEGORIES)[number];
export type TileCategory = (typeof TILE_CATEGORIES)[number];

export type ExitMap = Record<Direction, boolean>;

export interface Coordinate {
  row: number;
  col: number;
}

export interface TileRecord {
  name: string;
  exits: ExitMap;
  category: TileCategory;
  visual?: unknown;
}

export interface TileView {
  name: string;
  exits: Direction[];
  category: TileCategory;
  rotation: number;
  visual?: unknown;
}

export type EventContent =
  | { kind: 'ZOMBIES'; count: number; message: string }
  | { kind: 'ITEM'; message: string }
  | { kind: 'HEALTH'; delta: number; message: string };

export interface EventCard {
  item: string;
  events: Record<string, EventContent>;
}

export type GameStatus = 'IN_PROGRESS' | 'WON' | 'LOST';
export type GameOutcomeReason = 'TOTEM_BURIED' | 'HEALTH' | 'TIME';

export interface PlayerView {
  health: number;
  attack: number;
  items: string[];
  location: Coordinate;
  hasTotem: boolean;
}

export interface GameSnapshot {
  eventCardsRemaining: number;
  clock: string;
  indoorTilesRemaining: number;
  outdoorTilesRemaining: number;
  player: PlayerView;
  status: GameStatus;
  outcome?: GameOutcomeReason | undefined;
}

export interface RoomDetails {
  player: PlayerView;
  room: TileView;
  possibleExits: Direction[];
}

export type ChoiceKind = 'ENTRY_SIDE' | 'FIGHT_OR_RUN' | 'ESCAPE_DIRECTION' | 'REPLACE_ITEM' | 'ITEM_TO_REPLACE';

export interface ChoiceRequest {
  kind: ChoiceKind;
  prompt: string;
  options: readonly string[];
}

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown | undefined;
}
