import type { EventCard, TileRecord } from '@pocket-horde/shared';
import { gameSnapshotSchema } from '@pocket-horde/shared';
import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_DATA_DIR } from '../../src/config';
import { StaticTileSupply, loadContent, type LoadedContent } from '../../src/content/loader';
import { ServiceError, SessionService } from '../../src/service/session-service';
import { InMemorySessionStore } from '../../src/store/in-memory-session-store';

const createLogger = () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
};

const tile = (name: string, N: boolean, E: boolean, S: boolean, W: boolean): TileRecord => ({
  name,
  category: 'Indoor',
  exits: { N, E, S, W },
});

const quietCard = (): EventCard => {
  const quiet = { kind: 'HEALTH' as const, delta: 0, message: 'all quiet' };
  return { item: 'Candle', events: { '9 PM': quiet, '10 PM': quiet, '11 PM': quiet } };
};

const smallContent = (): LoadedContent => ({
  tiles: new StaticTileSupply({
    Indoor: [tile('Foyer', true, false, false, false), tile('Family Room', true, true, false, true)],
    Outdoor: [{ name: 'Patio', category: 'Outdoor', exits: { N: true, E: true, S: false, W: true } }],
  }),
  eventCards: Array.from({ length: 5 }, quietCard),
  clock: ['9 PM', '10 PM', '11 PM'],
});

const createService = (content: LoadedContent = smallContent()) => {
  const logger = createLogger();
  const service = new SessionService(new InMemorySessionStore(3600), content, logger as unknown as Logger, {
    start: { row: 3, col: 3 },
    defaultSeed: 'test-seed',
  });
  return { service, logger };
};

describe('SessionService', () => {
  it('starts a session on the foyer with a fresh snapshot', async () => {
    const { service, logger } = createService();
    const { sessionId, snapshot } = await service.startSession();

    expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(snapshot).toEqual({
      eventCardsRemaining: 5,
      clock: '9 PM',
      indoorTilesRemaining: 1,
      outdoorTilesRemaining: 0,
      player: { health: 6, attack: 1, items: [], location: { row: 3, col: 3 }, hasTotem: false },
      status: 'IN_PROGRESS',
    });
    expect(logger.child).toHaveBeenCalledWith({ sessionId });
    expect(logger.info).toHaveBeenCalledWith({ sessionId, seed: 'test-seed' }, 'session started');
  });

  it('moves into a new room using the scripted entry side', async () => {
    const { service } = createService();
    const { sessionId } = await service.startSession();

    const moved = await service.dispatch(sessionId, { type: 'move', direction: 'n', answers: ['W'] });
    expect(moved.error).toBeUndefined();
    expect(moved.action).toBe('move');
    expect(moved.effects).toContainEqual(
      expect.objectContaining({ type: 'TILE_PLACED', location: { row: 2, col: 3 } }),
    );
    expect(moved.effects.some((effect) => effect.type === 'INVALID_CHOICE')).toBe(false);
    expect(moved.snapshot.player.location).toEqual({ row: 2, col: 3 });
    expect(moved.snapshot.eventCardsRemaining).toBe(4);

    const inspected = await service.dispatch(sessionId, { type: 'inspect' });
    expect(inspected.effects).toEqual([]);
    expect(inspected.details?.room.name).toBe('Family Room');
    expect(inspected.details?.possibleExits).toEqual(['N', 'S', 'W']);
  });

  it('reports answers that are not among the options and asks again', async () => {
    const { service } = createService();
    const { sessionId } = await service.startSession();

    const moved = await service.dispatch(sessionId, { type: 'move', direction: 'N', answers: ['S', 'W'] });
    expect(moved.effects).toContainEqual({
      type: 'INVALID_CHOICE',
      kind: 'ENTRY_SIDE',
      answer: 'S',
      options: ['N', 'E', 'W'],
    });
    expect(moved.snapshot.player.location).toEqual({ row: 2, col: 3 });
  });

  it('drops answers the action never asked for', async () => {
    const { service, logger } = createService();
    const { sessionId } = await service.startSession();

    await service.dispatch(sessionId, { type: 'move', direction: 'N', answers: ['W', 'E'] });
    expect(logger.debug).toHaveBeenCalledWith({ sessionId, unused: 1 }, 'discarding unused answers');
  });

  it('returns rule violations as errors without changing the game', async () => {
    const { service, logger } = createService();
    const { sessionId, snapshot } = await service.startSession();

    const result = await service.dispatch(sessionId, { type: 'move', direction: 'E' });
    expect(result.error).toEqual({ code: 'INVALID_DIRECTION', message: 'Invalid direction. Choose from: N' });
    expect(result.snapshot).toEqual(snapshot);
    expect(logger.warn).toHaveBeenCalledWith(
      { sessionId, action: 'move', errorCode: 'INVALID_DIRECTION' },
      'Invalid direction. Choose from: N',
    );
  });

  it('rejects payloads that are not actions', async () => {
    const { service } = createService();
    const { sessionId } = await service.startSession();

    const failure = await service.dispatch(sessionId, { type: 'fly', direction: 'N' }).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(ServiceError);

    const payload = service.handleFailure(failure);
    expect(payload.code).toBe('INVALID_PAYLOAD');
    expect(payload.message).toBe('invalid action payload');
    expect(Array.isArray(payload.details)).toBe(true);
  });

  it('fails on unknown or ended sessions', async () => {
    const { service } = createService();
    const { sessionId } = await service.startSession();

    await expect(service.dispatch('missing', { type: 'inspect' })).rejects.toMatchObject({
      code: 'SESSION_NOT_FOUND',
    });

    await service.endSession(sessionId);
    await expect(service.snapshot(sessionId)).rejects.toMatchObject({ code: 'SESSION_NOT_FOUND' });
  });

  it('logs unexpected failures and hides their details', () => {
    const { service, logger } = createService();
    const error = new Error('boom');

    expect(service.handleFailure(error)).toEqual({ code: 'INTERNAL_ERROR', message: 'unexpected simulator error' });
    expect(logger.error).toHaveBeenCalledWith({ error }, 'unexpected session failure');
  });

  it('warns when autoplay runs out of actions', async () => {
    const { service, logger } = createService();
    const { sessionId, snapshot } = await service.startSession();

    const after = await service.autoplay(sessionId, 0);
    expect(after).toEqual(snapshot);
    expect(logger.warn).toHaveBeenCalledWith(
      { sessionId, maxActions: 0 },
      'action budget exhausted before the game ended',
    );
  });

  it('plays the bundled content the same way for the same seed', async () => {
    const content = await loadContent(DEFAULT_DATA_DIR);
    const first = createService(content);
    const second = createService(content);

    const a = await first.service.startSession({ seed: 'replay-seed' });
    const b = await second.service.startSession({ seed: 'replay-seed' });
    const finalA = await first.service.autoplay(a.sessionId, 200);
    const finalB = await second.service.autoplay(b.sessionId, 200);

    expect(finalA).toEqual(finalB);
    expect(gameSnapshotSchema.safeParse(finalA).success).toBe(true);
    expect(first.logger.error).not.toHaveBeenCalled();
  });
});
