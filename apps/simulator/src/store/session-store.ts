import type { GameEngine, ScriptedChoiceProvider } from '@pocket-horde/engine';
import type { Autopilot } from '../strategy/autopilot';

export interface SessionRecord {
  sessionId: string;
  seed: string;
  engine: GameEngine;
  choices: ScriptedChoiceProvider;
  autopilot: Autopilot;
  actions: number;
  createdAt: number;
  updatedAt: number;
}

export interface SessionStore {
  getSession(sessionId: string): Promise<SessionRecord | null>;
  saveSession(session: SessionRecord): Promise<void>;
  deleteSession(sessionId: string): Promise<void>;
  listSessionIds(): Promise<string[]>;
}
