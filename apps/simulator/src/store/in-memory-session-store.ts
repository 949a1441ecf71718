import type { SessionRecord, SessionStore } from './session-store';

interface Entry {
  session: SessionRecord;
  expiresAt: number;
}

// Live engines hold class instances, so sessions are kept by reference rather than cloned.
export class InMemorySessionStore implements SessionStore {
  private readonly sessionsById = new Map<string, Entry>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  private ttlMs() {
    return this.ttlSeconds * 1000;
  }

  private sweep(sessionId: string): void {
    const entry = this.sessionsById.get(sessionId);
    if (!entry) {
      return;
    }

    if (entry.expiresAt > this.now()) {
      return;
    }

    this.sessionsById.delete(sessionId);
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    this.sweep(sessionId);
    return this.sessionsById.get(sessionId)?.session ?? null;
  }

  async saveSession(session: SessionRecord): Promise<void> {
    this.sessionsById.set(session.sessionId, {
      session,
      expiresAt: this.now() + this.ttlMs(),
    });
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.sessionsById.delete(sessionId);
  }

  async listSessionIds(): Promise<string[]> {
    for (const sessionId of [...this.sessionsById.keys()]) {
      this.sweep(sessionId);
    }
    return [...this.sessionsById.keys()];
  }
}
