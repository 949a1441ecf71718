import { DIRECTIONS, type Coordinate, type Direction, type ExitMap, type TileCategory, type TileRecord, type TileView } from '@pocket-horde/shared';

export class InvalidDirectionError extends Error {
  constructor(readonly direction: string) {
    super(`${direction} is not a valid exit direction`);
    this.name = 'InvalidDirectionError';
  }
}

const OPPOSITES: Record<Direction, Direction> = { N: 'S', E: 'W', S: 'N', W: 'E' };

const DELTAS: Record<Direction, Coordinate> = {
  N: { row: -1, col: 0 },
  E: { row: 0, col: 1 },
  S: { row: 1, col: 0 },
  W: { row: 0, col: -1 },
};

/**
 * Clockwise quarter turns needed so that tile side `entry` faces back along the
 * motion `exit`. Indexed as `ROTATION_STEPS[exit][entry]`.
 */
export const ROTATION_STEPS: Readonly<Record<Direction, Readonly<Record<Direction, number>>>> = {
  N: { N: 2, E: 1, S: 0, W: 3 },
  E: { N: 3, E: 2, S: 1, W: 0 },
  S: { N: 0, E: 3, S: 2, W: 1 },
  W: { N: 1, E: 0, S: 3, W: 2 },
};

export const isDirection = (value: string): value is Direction =>
  (DIRECTIONS as readonly string[]).includes(value);

export const parseDirection = (value: string): Direction | undefined => {
  const normalized = value.trim().toUpperCase();
  return isDirection(normalized) ? normalized : undefined;
};

export const oppositeDirection = (direction: Direction): Direction => OPPOSITES[direction];

export const stepFrom = (location: Coordinate, direction: Direction): Coordinate => ({
  row: location.row + DELTAS[direction].row,
  col: location.col + DELTAS[direction].col,
});

export const coordinateKey = (location: Coordinate): string => `${location.row},${location.col}`;

// one clockwise quarter turn: whatever faced W now faces N, N faces E, and so on
const turnClockwise = (exits: ExitMap): ExitMap => ({
  N: exits.W,
  E: exits.N,
  S: exits.E,
  W: exits.S,
});

export class Tile {
  readonly name: string;
  readonly category: TileCategory;
  readonly visual: unknown;
  private exits: ExitMap;
  private quarterTurns = 0;

  constructor(record: TileRecord) {
    this.name = record.name;
    this.category = record.category;
    this.visual = record.visual;
    this.exits = { ...record.exits };
  }

  get rotation(): number {
    return this.quarterTurns;
  }

  possibleExits(): Direction[] {
    return DIRECTIONS.filter((direction) => this.exits[direction]);
  }

  hasExit(direction: Direction): boolean {
    return this.exits[direction];
  }

  addExit(direction: string): void {
    if (!isDirection(direction)) {
      throw new InvalidDirectionError(direction);
    }
    this.exits[direction] = true;
  }

  rotate(entry: Direction, exit: Direction): this {
    const steps = ROTATION_STEPS[exit][entry];
    for (let i = 0; i < steps; i += 1) {
      this.exits = turnClockwise(this.exits);
    }
    this.quarterTurns = (this.quarterTurns + steps) % 4;
    return this;
  }

  toView(): TileView {
    return {
      name: this.name,
      exits: this.possibleExits(),
      category: this.category,
      rotation: this.quarterTurns,
      ...(this.visual !== undefined ? { visual: this.visual } : {}),
    };
  }
}
