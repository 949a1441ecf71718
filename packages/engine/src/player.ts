import {
  ITEM_EFFECTS,
  MAX_ITEMS,
  STARTING_ATTACK,
  STARTING_HEALTH,
  type Coordinate,
  type PlayerView,
} from '@pocket-horde/shared';

export interface PlayerConfig {
  location: Coordinate;
  health?: number | undefined;
  attack?: number | undefined;
}

export class Player {
  location: Coordinate;
  health: number;
  attack: number;
  hasTotem = false;
  private readonly carried: string[] = [];

  constructor(config: PlayerConfig) {
    this.location = { ...config.location };
    this.health = config.health ?? STARTING_HEALTH;
    this.attack = config.attack ?? STARTING_ATTACK;
  }

  get items(): readonly string[] {
    return this.carried;
  }

  get hasFreeSlot(): boolean {
    return this.carried.length < MAX_ITEMS;
  }

  hasItem(item: string): boolean {
    return this.carried.includes(item);
  }

  adjustHealth(delta: number): void {
    this.health += delta;
  }

  takeDamage(damage: number): void {
    this.health -= damage;
  }

  /** Adds the item and applies its pickup effect. */
  gainItem(item: string): void {
    this.carried.push(item);
    const effect = ITEM_EFFECTS[item];
    this.health += effect?.health ?? 0;
    this.attack += effect?.attack ?? 0;
  }

  /** Removes one copy of the item; a dropped weapon takes its attack bonus with it. */
  loseItem(item: string): boolean {
    const index = this.carried.indexOf(item);
    if (index === -1) {
      return false;
    }
    this.carried.splice(index, 1);
    this.attack -= ITEM_EFFECTS[item]?.attack ?? 0;
    return true;
  }

  toView(): PlayerView {
    return {
      health: this.health,
      attack: this.attack,
      items: [...this.carried],
      location: { ...this.location },
      hasTotem: this.hasTotem,
    };
  }
}
