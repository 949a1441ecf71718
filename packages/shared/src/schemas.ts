import { z } from 'zod';
import { DECK_CATEGORIES, DIRECTIONS, TILE_CATEGORIES } from './constants';

export const directionSchema = z.enum(DIRECTIONS);
export const deckCategorySchema = z.enum(DECK_CATEGORIES);
export const tileCategorySchema = z.enum(TILE_CATEGORIES);

export const coordinateSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export const exitMapSchema = z
  .object({
    N: z.boolean(),
    E: z.boolean(),
    S: z.boolean(),
    W: z.boolean(),
  })
  .refine((exits) => exits.N || exits.E || exits.S || exits.W, { message: 'tile needs at least one exit' });

export const tileMetadataSchema = z.object({
  name: z.string().trim().min(1),
  exits: exitMapSchema,
  category: tileCategorySchema.optional(),
  image: z.string().trim().min(1).optional(),
});

export const tileFileSchema = z.object({
  deck: deckCategorySchema,
  tiles: z.array(tileMetadataSchema).min(1),
});

export const eventContentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ZOMBIES'), count: z.number().int().positive(), message: z.string() }),
  z.object({ kind: z.literal('ITEM'), message: z.string() }),
  z.object({ kind: z.literal('HEALTH'), delta: z.number().int(), message: z.string() }),
]);

export const eventCardSchema = z.object({
  item: z.string().trim().min(1),
  events: z.record(z.string(), eventContentSchema),
});

export const devCardFileSchema = z
  .object({
    clock: z.array(z.string().trim().min(1)).min(1),
    cards: z.array(eventCardSchema).min(1),
  })
  .superRefine((file, ctx) => {
    file.cards.forEach((card, index) => {
      for (const label of file.clock) {
        if (!card.events[label]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['cards', index, 'events', label],
            message: `card "${card.item}" has no event for ${label}`,
          });
        }
      }
    });
  });

const actionDirectionSchema = z.string().trim().min(1).max(8);
const answersSchema = z.array(z.string().trim().min(1)).max(32).optional();

export const actionRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('move'), direction: actionDirectionSchema, answers: answersSchema }),
  z.object({ type: z.literal('bash'), direction: actionDirectionSchema, answers: answersSchema }),
  z.object({ type: z.literal('cower') }),
  z.object({ type: z.literal('totem'), answers: answersSchema }),
  z.object({ type: z.literal('inspect') }),
]);

export const playerViewSchema = z.object({
  health: z.number().int(),
  attack: z.number().int(),
  items: z.array(z.string()),
  location: coordinateSchema,
  hasTotem: z.boolean(),
});

export const gameSnapshotSchema = z.object({
  eventCardsRemaining: z.number().int().nonnegative(),
  clock: z.string(),
  indoorTilesRemaining: z.number().int().nonnegative(),
  outdoorTilesRemaining: z.number().int().nonnegative(),
  player: playerViewSchema,
  status: z.enum(['IN_PROGRESS', 'WON', 'LOST']),
  outcome: z.enum(['TOTEM_BURIED', 'HEALTH', 'TIME']).optional(),
});

export type TileMetadata = z.infer<typeof tileMetadataSchema>;
export type TileFile = z.infer<typeof tileFileSchema>;
export type DevCardFile = z.infer<typeof devCardFileSchema>;
export type ActionRequest = z.infer<typeof actionRequestSchema>;
