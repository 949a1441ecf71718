import type { GameOutcomeReason, GameSnapshot, GameStatus, RoomDetails } from '@pocket-horde/shared';
import type { Board } from './board';
import type { Player } from './player';

export const buildSnapshot = (
  board: Board,
  player: Player,
  status: GameStatus,
  outcome: GameOutcomeReason | undefined,
): GameSnapshot => ({
  eventCardsRemaining: board.eventDeck.count,
  clock: board.currentClock,
  indoorTilesRemaining: board.indoorDeck.count,
  outdoorTilesRemaining: board.outdoorDeck.count,
  player: player.toView(),
  status,
  ...(outcome ? { outcome } : {}),
});

export const buildRoomDetails = (board: Board, player: Player): RoomDetails => {
  const room = board.tileAt(player.location);
  if (!room) {
    throw new Error(`no room at ${player.location.row},${player.location.col}`);
  }
  return {
    player: player.toView(),
    room: room.toView(),
    possibleExits: room.possibleExits(),
  };
};

/** ASCII rendering of a room with gaps where the doors are. */
export const renderTile = (view: { name: string; exits: readonly string[] }): string => {
  const width = Math.max(15, view.name.length);
  const open = (side: string, wall: string): string => (view.exits.includes(side) ? ' ' : wall);
  const padLeft = Math.floor((width - view.name.length) / 2);
  const padded = `${' '.repeat(padLeft)}${view.name}`.padEnd(width, ' ');

  return [
    ` ${open('N', '_').repeat(width + 2)} `,
    `+${' '.repeat(width + 2)}+`,
    `${open('W', '|')} ${padded} ${open('E', '|')}`,
    `+${open('S', '_').repeat(width + 2)}+`,
  ].join('\n');
};
