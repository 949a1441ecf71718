export const DIRECTIONS = ['N', 'E', 'S', 'W'] as const;
export const DECK_CATEGORIES = ['Indoor', 'Outdoor'] as const;
export const TILE_CATEGORIES = [...DECK_CATEGORIES, 'Special'] as const;

export const DEFAULT_CLOCK = ['9 PM', '10 PM', '11 PM'] as const;
export const DEFAULT_START_LOCATION = { row: 3, col: 3 } as const;

export const STARTING_HEALTH = 6;
export const STARTING_ATTACK = 1;
export const MAX_ITEMS = 2;
export const MAX_ZOMBIE_DAMAGE = 4;
export const BASH_ZOMBIES = 3;
export const COWER_HEAL = 3;
export const ESCAPE_DAMAGE = 1;
export const ROOM_BONUS_HEAL = 1;

export const ROOMS = {
  FOYER: 'Foyer',
  PATIO: 'Patio',
  DINING_ROOM: 'Dining Room',
  KITCHEN: 'Kitchen',
  GARDEN: 'Garden',
  STORAGE: 'Storage',
  EVIL_TEMPLE: 'Evil Temple',
  GRAVEYARD: 'Graveyard',
} as const;

export const ESCAPE_ITEM = 'Oil';

export interface ItemEffect {
  health?: number;
  attack?: number;
}

export const ITEM_EFFECTS: Readonly<Record<string, ItemEffect>> = {
  'Soda Can': { health: 2 },
  'Golf Club': { attack: 1 },
  'Grisly Femur': { attack: 1 },
  'Board with Nails': { attack: 1 },
  Machete: { attack: 2 },
  Chainsaw: { attack: 3 },
};

export const CHOICE_OPTIONS = {
  FIGHT_OR_RUN: ['FIGHT', 'RUN'],
  YES_NO: ['YES', 'NO'],
} as const;
