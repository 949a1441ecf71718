import type {
  ChoiceKind,
  ChoiceRequest,
  Coordinate,
  Direction,
  ErrorCode,
  EventCard,
  EventContent,
  GameOutcomeReason,
  GameSnapshot,
  ServiceError,
  TileView,
} from '@pocket-horde/shared';
import type { TileSupply } from './board';

export type EngineEffect =
  | {
      type: 'TILE_PLACED';
      tile: TileView;
      location: Coordinate;
    }
  | {
      type: 'SNAPSHOT';
      snapshot: GameSnapshot;
    }
  | {
      type: 'EVENT_RESOLVED';
      clock: string;
      content: EventContent;
    }
  | {
      type: 'ZOMBIES_FOUGHT';
      zombies: number;
      damage: number;
    }
  | {
      type: 'ESCAPED';
      direction: Direction;
      location: Coordinate;
      itemUsed?: string;
    }
  | {
      type: 'ITEM_FOUND';
      item: string;
    }
  | {
      type: 'ITEM_REPLACED';
      removed: string;
      added: string;
    }
  | {
      type: 'ITEM_DISCARDED';
      item: string;
    }
  | {
      type: 'COWERED';
      healed: number;
    }
  | {
      type: 'CLOCK_ADVANCED';
      clock: string;
    }
  | {
      type: 'TOTEM_FOUND';
    }
  | {
      type: 'INVALID_CHOICE';
      kind: ChoiceKind;
      answer: string;
      options: string[];
    }
  | {
      type: 'ACTION_REJECTED';
      error: ServiceError;
    }
  | {
      type: 'GAME_FINISHED';
      outcome: 'WON' | 'LOST';
      reason: GameOutcomeReason;
    };

export type EngineEffectType = EngineEffect['type'];

export type ValidationResult = { ok: true } | { ok: false; code: ErrorCode; message: string };

export interface EngineResult {
  effects: EngineEffect[];
  error?: ServiceError;
}

export interface ChoiceProvider {
  choose(request: ChoiceRequest): string;
}

export interface GameObserver {
  notify(effect: EngineEffect): void;
}

export interface CreateGameConfig {
  tiles: TileSupply;
  eventCards: readonly EventCard[];
  choices: ChoiceProvider;
  start?: Coordinate | undefined;
  clock?: readonly string[] | undefined;
  seed?: string | number | undefined;
  shuffle?: boolean | undefined;
  health?: number | undefined;
  attack?: number | undefined;
}
