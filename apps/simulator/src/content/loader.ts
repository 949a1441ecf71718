import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { TileSupply } from '@pocket-horde/engine';
import {
  devCardFileSchema,
  tileFileSchema,
  type DeckCategory,
  type EventCard,
  type TileFile,
  type TileRecord,
} from '@pocket-horde/shared';
import type { z } from 'zod';

export const CONTENT_FILES = {
  indoor: 'indoor-tiles.json',
  outdoor: 'outdoor-tiles.json',
  devCards: 'dev-cards.json',
} as const;

export class ContentLoadError extends Error {
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ContentLoadError';
  }
}

export interface LoadedContent {
  tiles: TileSupply;
  eventCards: EventCard[];
  clock: string[];
}

const readJson = async (filePath: string): Promise<unknown> => {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ContentLoadError(`File ${filePath} not found.`, error);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ContentLoadError(`Error decoding JSON from ${filePath}.`, error);
  }
};

const parseFile = async <S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> => {
  const parsed = schema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ContentLoadError(`Invalid metadata in ${filePath}.`, parsed.error.issues);
  }
  return parsed.data;
};

export const toTileRecords = (file: TileFile): TileRecord[] =>
  file.tiles.map((tile) => ({
    name: tile.name,
    exits: { ...tile.exits },
    category: tile.category ?? file.deck,
    ...(tile.image ? { visual: tile.image } : {}),
  }));

export class StaticTileSupply implements TileSupply {
  constructor(private readonly byCategory: Record<DeckCategory, TileRecord[]>) {}

  tilesFor(category: DeckCategory): readonly TileRecord[] {
    return this.byCategory[category].map((record) => ({ ...record, exits: { ...record.exits } }));
  }
}

export const loadContent = async (dataDir: string): Promise<LoadedContent> => {
  const [indoorFile, outdoorFile, devCards] = await Promise.all([
    parseFile(path.join(dataDir, CONTENT_FILES.indoor), tileFileSchema),
    parseFile(path.join(dataDir, CONTENT_FILES.outdoor), tileFileSchema),
    parseFile(path.join(dataDir, CONTENT_FILES.devCards), devCardFileSchema),
  ]);

  if (indoorFile.deck !== 'Indoor' || outdoorFile.deck !== 'Outdoor') {
    throw new ContentLoadError(
      `${CONTENT_FILES.indoor} and ${CONTENT_FILES.outdoor} must hold the Indoor and Outdoor decks`,
    );
  }

  return {
    tiles: new StaticTileSupply({
      Indoor: toTileRecords(indoorFile),
      Outdoor: toTileRecords(outdoorFile),
    }),
    eventCards: devCards.cards,
    clock: devCards.clock,
  };
};
