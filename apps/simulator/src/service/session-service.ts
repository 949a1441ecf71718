import { ScriptedChoiceProvider, createGame, type EngineEffect, type EngineResult } from '@pocket-horde/engine';
import {
  actionRequestSchema,
  gameSnapshotSchema,
  type ActionRequest,
  type Coordinate,
  type ErrorCode,
  type GameSnapshot,
  type RoomDetails,
  type ServiceError as ErrorPayload,
} from '@pocket-horde/shared';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { LoadedContent } from '../content/loader';
import { LogObserver } from '../observer/log-observer';
import { Autopilot } from '../strategy/autopilot';
import type { SessionRecord, SessionStore } from '../store/session-store';

export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
  }
}

export interface SessionOptions {
  start: Coordinate;
  defaultSeed: string;
}

export interface StartSessionInput {
  seed?: string | undefined;
}

export interface DispatchResult {
  sessionId: string;
  action: ActionRequest['type'];
  effects: EngineEffect[];
  error?: ErrorPayload;
  details?: RoomDetails;
  snapshot: GameSnapshot;
}

export class SessionService {
  constructor(
    private readonly store: SessionStore,
    private readonly content: LoadedContent,
    private readonly logger: Logger,
    private readonly options: SessionOptions,
  ) {}

  async startSession(input: StartSessionInput = {}): Promise<{ sessionId: string; snapshot: GameSnapshot }> {
    const sessionId = uuidv4();
    const seed = input.seed ?? this.options.defaultSeed;
    const autopilot = new Autopilot(seed);
    const choices = new ScriptedChoiceProvider([], autopilot.choices);

    const engine = createGame({
      tiles: this.content.tiles,
      eventCards: this.content.eventCards,
      clock: this.content.clock,
      start: this.options.start,
      choices,
      seed,
    });
    engine.attach(new LogObserver(this.logger.child({ sessionId })));
    engine.start();

    const now = Date.now();
    await this.store.saveSession({
      sessionId,
      seed,
      engine,
      choices,
      autopilot,
      actions: 0,
      createdAt: now,
      updatedAt: now,
    });

    this.logger.info({ sessionId, seed }, 'session started');
    return { sessionId, snapshot: this.validatedSnapshot(sessionId, engine.snapshot()) };
  }

  async dispatch(sessionId: string, payload: unknown): Promise<DispatchResult> {
    const parsed = actionRequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceError('INVALID_PAYLOAD', 'invalid action payload', parsed.error.issues);
    }

    const session = await this.requireSession(sessionId);
    const action = parsed.data;

    session.choices.clear();
    if (action.type !== 'cower' && action.type !== 'inspect' && action.answers) {
      session.choices.enqueue(...action.answers);
    }

    const { engine } = session;
    let result: EngineResult;
    let details: RoomDetails | undefined;
    switch (action.type) {
      case 'move':
        result = engine.move(action.direction);
        break;
      case 'bash':
        result = engine.bash(action.direction);
        break;
      case 'cower':
        result = engine.cower();
        break;
      case 'totem':
        result = engine.findOrBuryTotem();
        break;
      case 'inspect':
        details = engine.inspect();
        result = { effects: [] };
        break;
    }

    if (session.choices.pending > 0) {
      this.logger.debug({ sessionId, unused: session.choices.pending }, 'discarding unused answers');
      session.choices.clear();
    }
    if (result.error) {
      this.logger.warn({ sessionId, action: action.type, errorCode: result.error.code }, result.error.message);
    }

    session.actions += 1;
    session.updatedAt = Date.now();
    await this.store.saveSession(session);

    return {
      sessionId,
      action: action.type,
      effects: result.effects,
      ...(result.error ? { error: result.error } : {}),
      ...(details ? { details } : {}),
      snapshot: this.validatedSnapshot(sessionId, engine.snapshot()),
    };
  }

  /** Lets the session's autopilot play until the game ends or the action budget runs out. */
  async autoplay(sessionId: string, maxActions: number): Promise<GameSnapshot> {
    const session = await this.requireSession(sessionId);
    const { engine, autopilot } = session;

    let taken = 0;
    while (engine.status === 'IN_PROGRESS' && taken < maxActions) {
      const action = autopilot.nextAction(engine.inspect(), engine.turnSequenceCompleted);
      await this.dispatch(sessionId, action);
      taken += 1;
    }

    if (engine.status === 'IN_PROGRESS') {
      this.logger.warn({ sessionId, maxActions }, 'action budget exhausted before the game ended');
    }
    return this.validatedSnapshot(sessionId, engine.snapshot());
  }

  async snapshot(sessionId: string): Promise<GameSnapshot> {
    const session = await this.requireSession(sessionId);
    return this.validatedSnapshot(sessionId, session.engine.snapshot());
  }

  async endSession(sessionId: string): Promise<void> {
    await this.requireSession(sessionId);
    await this.store.deleteSession(sessionId);
    this.logger.info({ sessionId }, 'session ended');
  }

  handleFailure(error: unknown): ErrorPayload {
    if (error instanceof ServiceError) {
      return { code: error.code, message: error.message, ...(error.details ? { details: error.details } : {}) };
    }

    this.logger.error({ error }, 'unexpected session failure');
    return { code: 'INTERNAL_ERROR', message: 'unexpected simulator error' };
  }

  private async requireSession(sessionId: string): Promise<SessionRecord> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new ServiceError('SESSION_NOT_FOUND', 'session does not exist');
    }
    return session;
  }

  private validatedSnapshot(sessionId: string, snapshot: GameSnapshot): GameSnapshot {
    const parsed = gameSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      this.logger.error({ sessionId, errors: parsed.error.issues }, 'snapshot schema failure');
    }
    return snapshot;
  }
}
