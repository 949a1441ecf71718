import { ScriptedChoiceProvider, createGame, type GameEngine } from '@pocket-horde/engine';
import { describe, expect, it } from 'vitest';
import { StaticTileSupply } from '../../src/content/loader';
import { InMemorySessionStore } from '../../src/store/in-memory-session-store';
import type { SessionRecord } from '../../src/store/session-store';
import { Autopilot } from '../../src/strategy/autopilot';

const record = (sessionId: string, engine: GameEngine): SessionRecord => ({
  sessionId,
  seed: 'test-seed',
  engine,
  choices: new ScriptedChoiceProvider(),
  autopilot: new Autopilot('test-seed'),
  actions: 0,
  createdAt: 0,
  updatedAt: 0,
});

describe('InMemorySessionStore', () => {
  const quiet = { kind: 'HEALTH' as const, delta: 0, message: 'all quiet' };
  const engine = createGame({
    tiles: new StaticTileSupply({
      Indoor: [{ name: 'Foyer', category: 'Indoor', exits: { N: true, E: false, S: false, W: false } }],
      Outdoor: [],
    }),
    eventCards: [{ item: 'Candle', events: { '9 PM': quiet, '10 PM': quiet, '11 PM': quiet } }],
    choices: new ScriptedChoiceProvider(),
  });

  it('returns saved sessions by id until they expire', async () => {
    let now = 1_000;
    const store = new InMemorySessionStore(10, () => now);
    await store.saveSession(record('a', engine));

    expect((await store.getSession('a'))?.sessionId).toBe('a');
    now = 10_999;
    expect(await store.getSession('a')).not.toBeNull();
    now = 11_000;
    expect(await store.getSession('a')).toBeNull();
  });

  it('refreshes the expiry on every save', async () => {
    let now = 0;
    const store = new InMemorySessionStore(10, () => now);
    const session = record('a', engine);
    await store.saveSession(session);

    now = 9_000;
    await store.saveSession(session);
    now = 15_000;
    expect(await store.getSession('a')).toBe(session);
  });

  it('lists live sessions and forgets deleted ones', async () => {
    let now = 0;
    const store = new InMemorySessionStore(10, () => now);
    await store.saveSession(record('a', engine));
    now = 5_000;
    await store.saveSession(record('b', engine));
    await store.saveSession(record('c', engine));
    await store.deleteSession('c');

    now = 12_000;
    expect(await store.listSessionIds()).toEqual(['b']);
  });
});
