import { loadContent } from './content/loader';
import { parseConfigFromEnv } from './config';
import { createLogger } from './logger';
import { SessionService } from './service/session-service';
import { InMemorySessionStore } from './store/in-memory-session-store';

const config = parseConfigFromEnv(process.env);
const logger = createLogger(config.logLevel, !config.isProduction);

const start = async (): Promise<void> => {
  try {
    const content = await loadContent(config.dataDir);
    const service = new SessionService(new InMemorySessionStore(config.sessionTtlSeconds), content, logger, {
      start: config.start,
      defaultSeed: config.seed,
    });

    const { sessionId } = await service.startSession();
    const finalSnapshot = await service.autoplay(sessionId, config.maxActions);
    logger.info(
      {
        sessionId,
        status: finalSnapshot.status,
        outcome: finalSnapshot.outcome,
        clock: finalSnapshot.clock,
        health: finalSnapshot.player.health,
      },
      'simulation finished',
    );
    await service.endSession(sessionId);
  } catch (error) {
    logger.error({ error }, 'simulation failed');
    process.exit(1);
  }
};

void start();
