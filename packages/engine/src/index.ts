export { Board, type BoardConfig, type DrawnTile, type TileSupply } from './board';
export { ChoicesExhaustedError, ScriptedChoiceProvider, matchOption } from './choices';
export { Deck, createEventDeck, createTileDeck, shuffleItems, type TileDeckConfig } from './deck';
export { GameEngine, createGame, zombieDamage } from './game';
export { Player, type PlayerConfig } from './player';
export { createRandom, pickOne, type Random } from './random';
export {
  InvalidDirectionError,
  ROTATION_STEPS,
  Tile,
  coordinateKey,
  isDirection,
  oppositeDirection,
  parseDirection,
  stepFrom,
} from './tile';
export { buildRoomDetails, buildSnapshot, renderTile } from './view';
export type {
  ChoiceProvider,
  CreateGameConfig,
  EngineEffect,
  EngineEffectType,
  EngineResult,
  GameObserver,
  ValidationResult,
} from './types';
