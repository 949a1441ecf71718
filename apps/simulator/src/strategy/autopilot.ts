import { createRandom, pickOne, type ChoiceProvider, type Random } from '@pocket-horde/engine';
import { DIRECTIONS, ROOMS, type ActionRequest, type ChoiceRequest, type RoomDetails } from '@pocket-horde/shared';

const LOW_HEALTH = 2;
const BASH_CHANCE = 0.1;

/** Answers every in-turn question with a seeded random option. */
export class RandomChoiceProvider implements ChoiceProvider {
  constructor(private readonly random: Random) {}

  choose(request: ChoiceRequest): string {
    const option = pickOne(this.random, request.options);
    if (option === undefined) {
      throw new Error(`no options offered for ${request.kind}`);
    }
    return option;
  }
}

export class Autopilot {
  private readonly random: Random;
  readonly choices: RandomChoiceProvider;

  constructor(seed: string | number) {
    this.random = createRandom(`${seed}:autopilot`);
    this.choices = new RandomChoiceProvider(this.random);
  }

  nextAction(details: RoomDetails, turnSequenceCompleted: boolean): ActionRequest {
    const { room, player } = details;
    if (room.name === ROOMS.EVIL_TEMPLE && !player.hasTotem) {
      return { type: 'totem' };
    }
    if (room.name === ROOMS.GRAVEYARD && player.hasTotem) {
      return { type: 'totem' };
    }
    if (turnSequenceCompleted && player.health <= LOW_HEALTH) {
      return { type: 'cower' };
    }

    const walls = DIRECTIONS.filter((direction) => !details.possibleExits.includes(direction));
    if (turnSequenceCompleted && walls.length > 0 && this.random() < BASH_CHANCE) {
      const wall = pickOne(this.random, walls);
      if (wall) {
        return { type: 'bash', direction: wall };
      }
    }

    const exit = pickOne(this.random, details.possibleExits);
    return exit ? { type: 'move', direction: exit } : { type: 'inspect' };
  }
}
