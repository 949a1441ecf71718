export const ERROR_CODES = [
  'INVALID_DIRECTION',
  'BLOCKED_BY_WALL',
  'NO_TILES_LEFT',
  'EXIT_ALREADY_OPEN',
  'TURN_SEQUENCE_INCOMPLETE',
  'WRONG_ROOM',
  'NO_TOTEM',
  'GAME_FINISHED',
  'INVALID_PAYLOAD',
  'SESSION_NOT_FOUND',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];
