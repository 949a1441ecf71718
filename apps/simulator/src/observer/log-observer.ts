import { renderTile, type EngineEffect, type GameObserver } from '@pocket-horde/engine';
import type { Logger } from 'pino';

export class LogObserver implements GameObserver {
  constructor(private readonly logger: Logger) {}

  notify(effect: EngineEffect): void {
    switch (effect.type) {
      case 'TILE_PLACED':
        this.logger.debug(
          { tile: effect.tile.name, location: effect.location, rotation: effect.tile.rotation },
          `tile placed\n${renderTile(effect.tile)}`,
        );
        return;
      case 'SNAPSHOT':
        this.logger.debug({ snapshot: effect.snapshot }, 'snapshot');
        return;
      case 'EVENT_RESOLVED':
        this.logger.info({ clock: effect.clock, kind: effect.content.kind }, effect.content.message);
        return;
      case 'CLOCK_ADVANCED':
        this.logger.info({ clock: effect.clock }, 'clock advanced');
        return;
      case 'INVALID_CHOICE':
        this.logger.warn({ kind: effect.kind, answer: effect.answer, options: effect.options }, 'invalid choice');
        return;
      case 'ACTION_REJECTED':
        this.logger.debug({ error: effect.error }, 'action rejected');
        return;
      case 'GAME_FINISHED':
        this.logger.info({ outcome: effect.outcome, reason: effect.reason }, 'game finished');
        return;
      default:
        this.logger.info({ effect }, effect.type.toLowerCase());
    }
  }
}
