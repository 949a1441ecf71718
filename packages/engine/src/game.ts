import {
  BASH_ZOMBIES,
  CHOICE_OPTIONS,
  COWER_HEAL,
  DEFAULT_START_LOCATION,
  ESCAPE_DAMAGE,
  ESCAPE_ITEM,
  MAX_ZOMBIE_DAMAGE,
  ROOMS,
  ROOM_BONUS_HEAL,
  type ChoiceKind,
  type Direction,
  type ErrorCode,
  type EventCard,
  type GameOutcomeReason,
  type GameSnapshot,
  type GameStatus,
  type RoomDetails,
  type ServiceError,
} from '@pocket-horde/shared';
import { Board } from './board';
import { matchOption } from './choices';
import { Player } from './player';
import { oppositeDirection, parseDirection, stepFrom, type Tile } from './tile';
import type { ChoiceProvider, CreateGameConfig, EngineEffect, EngineResult, GameObserver, ValidationResult } from './types';
import { buildRoomDetails, buildSnapshot } from './view';

const engineError = (code: ErrorCode, message: string): ServiceError => ({ code, message });

const reject = (code: ErrorCode, message: string): ValidationResult => ({ ok: false, code, message });

const OK: ValidationResult = { ok: true };

/** Damage a zombie pack deals to a player with the given attack; never more than the cap. */
export const zombieDamage = (zombies: number, attack: number): number => {
  const damage = zombies - attack;
  return damage >= 0 ? Math.min(damage, MAX_ZOMBIE_DAMAGE) : 0;
};

export class GameEngine {
  readonly board: Board;
  readonly player: Player;
  private readonly choices: ChoiceProvider;
  private readonly observers = new Set<GameObserver>();
  private pending: EngineEffect[] = [];
  private gameStatus: GameStatus = 'IN_PROGRESS';
  private outcome: GameOutcomeReason | undefined;
  private completedTurnSequence = false;

  constructor(config: CreateGameConfig) {
    const start = config.start ?? DEFAULT_START_LOCATION;
    this.board = new Board({
      tiles: config.tiles,
      eventCards: config.eventCards,
      start,
      clock: config.clock,
      seed: config.seed ?? 'pocket-horde',
      shuffle: config.shuffle,
    });
    this.player = new Player({ location: start, health: config.health, attack: config.attack });
    this.choices = config.choices;
  }

  attach(observer: GameObserver): void {
    this.observers.add(observer);
  }

  detach(observer: GameObserver): void {
    this.observers.delete(observer);
  }

  get status(): GameStatus {
    return this.gameStatus;
  }

  get turnSequenceCompleted(): boolean {
    return this.completedTurnSequence;
  }

  snapshot(): GameSnapshot {
    return buildSnapshot(this.board, this.player, this.gameStatus, this.outcome);
  }

  inspect(): RoomDetails {
    return buildRoomDetails(this.board, this.player);
  }

  currentRoom(): Tile {
    const room = this.board.tileAt(this.player.location);
    if (!room) {
      throw new Error(`player is off the map at ${this.player.location.row},${this.player.location.col}`);
    }
    return room;
  }

  /** Announces the starting board: the foyer tile and a first snapshot. */
  start(): EngineResult {
    return this.run(() => {
      this.emit({ type: 'TILE_PLACED', tile: this.board.foyer.toView(), location: { ...this.player.location } });
      this.emitSnapshot();
      return OK;
    });
  }

  move(input: string): EngineResult {
    return this.run(() => {
      const direction = parseDirection(input);
      const room = this.currentRoom();
      if (!direction || !room.hasExit(direction)) {
        return reject('INVALID_DIRECTION', `Invalid direction. Choose from: ${room.possibleExits().join(', ')}`);
      }

      const target = stepFrom(this.player.location, direction);
      const explored = this.board.tileAt(target);
      if (explored) {
        if (!explored.hasExit(oppositeDirection(direction))) {
          return reject('BLOCKED_BY_WALL', 'This exit is blocked by a wall from another room.');
        }
        this.player.location = target;
        this.resolveEvent();
      } else {
        const { tile, category } = this.board.drawTile(room);
        if (!tile) {
          return reject('NO_TILES_LEFT', `No more ${category} tiles to draw.`);
        }
        this.board.place(target, tile);
        this.player.location = target;
        this.placeNewTile(direction, tile);
      }

      this.completedTurnSequence = true;
      return OK;
    });
  }

  bash(input: string): EngineResult {
    return this.run(() => {
      if (!this.completedTurnSequence) {
        return reject('TURN_SEQUENCE_INCOMPLETE', "You can't bash through a wall right after cowering.");
      }
      const direction = parseDirection(input);
      if (!direction) {
        return reject('INVALID_DIRECTION', "Invalid direction. Please enter 'N', 'E', 'S', or 'W'.");
      }
      const room = this.currentRoom();
      if (room.hasExit(direction)) {
        return reject('EXIT_ALREADY_OPEN', `No need to bash. A valid exit exists, move ${direction} instead.`);
      }

      const target = stepFrom(this.player.location, direction);
      const explored = this.board.tileAt(target);
      if (explored) {
        const back = oppositeDirection(direction);
        if (!explored.hasExit(back)) {
          explored.addExit(back);
        }
        room.addExit(direction);
        this.emitPlacement(this.player.location, room);
        this.emitPlacement(target, explored);
        this.player.location = target;
        this.combat(BASH_ZOMBIES);
      } else {
        const { tile, category } = this.board.drawTile(room);
        if (!tile) {
          return reject('NO_TILES_LEFT', `Can't bash out of the ${room.name}, no more ${category} tiles to explore.`);
        }
        room.addExit(direction);
        this.emitPlacement(this.player.location, room);
        this.board.place(target, tile);
        this.player.location = target;
        this.combat(BASH_ZOMBIES);
        this.placeNewTile(direction, tile);
      }

      this.checkGameOver();
      this.completedTurnSequence = true;
      this.emitSnapshot();
      return OK;
    });
  }

  cower(): EngineResult {
    return this.run(() => {
      if (!this.completedTurnSequence) {
        return reject('TURN_SEQUENCE_INCOMPLETE', 'You need to complete a turn sequence before cowering.');
      }
      this.completedTurnSequence = false;
      this.player.adjustHealth(COWER_HEAL);
      this.emit({ type: 'COWERED', healed: COWER_HEAL });
      this.drawEventCard();
      this.checkGameOver();
      this.emitSnapshot();
      return OK;
    });
  }

  findOrBuryTotem(): EngineResult {
    return this.run(() => {
      const room = this.currentRoom();
      if (room.name === ROOMS.EVIL_TEMPLE) {
        this.resolveEvent();
        if (!this.checkGameOver()) {
          this.player.hasTotem = true;
          this.emit({ type: 'TOTEM_FOUND' });
          this.emitSnapshot();
        }
        return OK;
      }

      if (room.name === ROOMS.GRAVEYARD) {
        if (!this.player.hasTotem) {
          return reject('NO_TOTEM', "You don't have the totem! Find it in the Evil Temple first.");
        }
        this.resolveEvent();
        if (!this.checkGameOver()) {
          this.finish('WON', 'TOTEM_BURIED');
          this.emitSnapshot();
        }
        return OK;
      }

      return reject(
        'WRONG_ROOM',
        `The totem is found in the ${ROOMS.EVIL_TEMPLE} and buried in the ${ROOMS.GRAVEYARD}, not the ${room.name}.`,
      );
    });
  }

  private run(action: () => ValidationResult): EngineResult {
    this.pending = [];
    if (this.gameStatus !== 'IN_PROGRESS') {
      return this.rejected(engineError('GAME_FINISHED', `the game is over (${this.outcome ?? this.gameStatus})`));
    }

    const validation = action();
    if (!validation.ok) {
      return this.rejected(engineError(validation.code, validation.message));
    }

    const effects = this.pending;
    this.pending = [];
    return { effects };
  }

  private rejected(error: ServiceError): EngineResult {
    this.emit({ type: 'ACTION_REJECTED', error });
    const effects = this.pending;
    this.pending = [];
    return { effects, error };
  }

  private emit(effect: EngineEffect): void {
    this.pending.push(effect);
    for (const observer of this.observers) {
      observer.notify(effect);
    }
  }

  private emitSnapshot(): void {
    this.emit({ type: 'SNAPSHOT', snapshot: this.snapshot() });
  }

  private emitPlacement(location: { row: number; col: number }, tile: Tile): void {
    this.emit({ type: 'TILE_PLACED', tile: tile.toView(), location: { ...location } });
  }

  private ask<T extends string>(kind: ChoiceKind, prompt: string, options: readonly T[]): T {
    for (;;) {
      const answer = this.choices.choose({ kind, prompt, options });
      const chosen = matchOption(answer, options);
      if (chosen !== undefined) {
        return chosen;
      }
      this.emit({ type: 'INVALID_CHOICE', kind, answer, options: [...options] });
    }
  }

  /**
   * Orients a tile already on the board under the player. Nobody is asked for an
   * entry side once the player is dead; the first exit is used instead.
   */
  private placeNewTile(arrival: Direction, tile: Tile): void {
    const entries = tile.possibleExits();
    const location = { ...this.player.location };
    const alive = this.gameStatus === 'IN_PROGRESS' && this.player.health > 0;

    if (entries.length > 1 && tile.name === ROOMS.DINING_ROOM) {
      this.placePatio(arrival, tile);
    } else if (entries.length > 1 && alive) {
      const entry = this.ask('ENTRY_SIDE', `You found the ${tile.name}, enter from: ${entries.join(', ')}`, entries);
      tile.rotate(entry, arrival);
    } else {
      const [first] = entries;
      if (first) {
        tile.rotate(first, arrival);
      }
    }

    this.emitPlacement(location, tile);
    if (!this.checkGameOver()) {
      this.resolveEvent();
    }
  }

  // The dining room's north door opens onto the patio unless that square is already explored.
  private placePatio(arrival: Direction, diningRoom: Tile): void {
    const { row, col } = this.player.location;
    const headingSouth = arrival === 'S';
    if (headingSouth) {
      diningRoom.rotate('S', 'S');
    }
    const patioLocation = { row: headingSouth ? row + 1 : row - 1, col };
    if (this.board.isExplored(patioLocation)) {
      return;
    }

    const patio = this.board.takePatio();
    if (!patio) {
      return;
    }
    if (!headingSouth) {
      patio.rotate('N', 'N');
    }
    this.board.place(patioLocation, patio);
    this.emitPlacement(patioLocation, patio);
  }

  private drawEventCard(): EventCard | undefined {
    if (this.board.eventDeck.count === 0 && this.checkGameOver()) {
      return undefined;
    }
    return this.board.eventDeck.draw();
  }

  private resolveEvent(): void {
    const card = this.drawEventCard();
    if (!card) {
      this.emitSnapshot();
      return;
    }
    const clock = this.board.currentClock;
    const content = card.events[clock];
    if (!content) {
      throw new Error(`event card "${card.item}" has no event for ${clock}`);
    }
    this.emit({ type: 'EVENT_RESOLVED', clock, content });

    let ranAway = false;
    switch (content.kind) {
      case 'ZOMBIES':
        ranAway = this.fightOrRun(content.count);
        break;
      case 'ITEM':
        this.findItem();
        break;
      case 'HEALTH':
        this.player.adjustHealth(content.delta);
        break;
      default: {
        const unreachable: never = content;
        throw new Error(`unknown event content ${JSON.stringify(unreachable)}`);
      }
    }

    if (!this.checkGameOver() && !ranAway) {
      const room = this.currentRoom();
      if (room.name === ROOMS.KITCHEN || room.name === ROOMS.GARDEN) {
        this.player.adjustHealth(ROOM_BONUS_HEAL);
      } else if (room.name === ROOMS.STORAGE) {
        this.findItem();
      }
    }

    this.emitSnapshot();
  }

  private escapeDirections(): Direction[] {
    return this.currentRoom()
      .possibleExits()
      .filter((direction) => this.board.isExplored(stepFrom(this.player.location, direction)));
  }

  /** Returns true when the player ran away. */
  private fightOrRun(zombies: number): boolean {
    const escapes = this.escapeDirections();
    if (escapes.length === 0) {
      this.combat(zombies);
      return false;
    }

    this.emitSnapshot();
    const action = this.ask(
      'FIGHT_OR_RUN',
      `${zombies} zombies! Fight or run away?`,
      CHOICE_OPTIONS.FIGHT_OR_RUN,
    );
    if (action === 'FIGHT') {
      this.combat(zombies);
      return false;
    }

    const direction = this.ask(
      'ESCAPE_DIRECTION',
      `You can only escape to rooms you have explored: ${escapes.join(', ')}`,
      escapes,
    );
    this.player.location = stepFrom(this.player.location, direction);
    if (this.player.hasItem(ESCAPE_ITEM)) {
      this.player.loseItem(ESCAPE_ITEM);
      this.emit({ type: 'ESCAPED', direction, location: { ...this.player.location }, itemUsed: ESCAPE_ITEM });
    } else {
      this.player.takeDamage(ESCAPE_DAMAGE);
      this.emit({ type: 'ESCAPED', direction, location: { ...this.player.location } });
    }
    return true;
  }

  private combat(zombies: number): void {
    const damage = zombieDamage(zombies, this.player.attack);
    this.player.takeDamage(damage);
    this.emit({ type: 'ZOMBIES_FOUGHT', zombies, damage });
  }

  private findItem(): void {
    if (this.checkGameOver()) {
      return;
    }
    const card = this.drawEventCard();
    if (!card) {
      return;
    }
    const found = card.item;
    this.emit({ type: 'ITEM_FOUND', item: found });

    if (this.player.hasFreeSlot) {
      this.player.gainItem(found);
      return;
    }

    const carried = [...this.player.items];
    const replace = this.ask(
      'REPLACE_ITEM',
      `You found ${found}. Replace one of: ${carried.join(', ')}?`,
      CHOICE_OPTIONS.YES_NO,
    );
    if (replace === 'NO') {
      this.emit({ type: 'ITEM_DISCARDED', item: found });
      return;
    }

    const removed = this.ask('ITEM_TO_REPLACE', `Choose an item to replace: ${carried.join(', ')}`, carried);
    this.player.loseItem(removed);
    this.player.gainItem(found);
    this.emit({ type: 'ITEM_REPLACED', removed, added: found });
  }

  /**
   * Ends the game on health or time. An empty dev deck before the last hour moves
   * the clock on instead.
   */
  private checkGameOver(): boolean {
    if (this.gameStatus !== 'IN_PROGRESS') {
      return true;
    }

    if (this.board.eventDeck.count === 0) {
      if (this.board.isFinalHour()) {
        this.finish('LOST', 'TIME');
        return true;
      }
      this.board.updateTime();
      this.emit({ type: 'CLOCK_ADVANCED', clock: this.board.currentClock });
    }

    if (this.player.health <= 0) {
      this.finish('LOST', 'HEALTH');
      return true;
    }
    return false;
  }

  private finish(outcome: 'WON' | 'LOST', reason: GameOutcomeReason): void {
    this.gameStatus = outcome;
    this.outcome = reason;
    this.emit({ type: 'GAME_FINISHED', outcome, reason });
  }
}

export const createGame = (config: CreateGameConfig): GameEngine => new GameEngine(config);
