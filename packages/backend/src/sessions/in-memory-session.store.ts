import { Injectable } from '@nestjs/common';
import { ConflictError, SessionNotFoundError } from '../intake/intake.errors';
import { ConversationSession } from '../intake/intake.types';
import { SessionListOptions, SessionStore, cloneSession } from './session-store.interface';

/**
 * Process-local session store for development and tests
 */
@Injectable()
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  async create(session: ConversationSession): Promise<ConversationSession> {
    if (this.sessions.has(session.id)) {
      throw new ConflictError(session.id, 'already exists');
    }
    const stored = cloneSession(session);
    this.sessions.set(stored.id, stored);
    return cloneSession(stored);
  }

  async get(sessionId: string): Promise<ConversationSession | null> {
    const stored = this.sessions.get(sessionId);
    return stored ? cloneSession(stored) : null;
  }

  async save(session: ConversationSession, expectedVersion: number): Promise<ConversationSession> {
    const current = this.sessions.get(session.id);
    if (!current) {
      throw new SessionNotFoundError(session.id);
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(session.id, 'was modified by another request');
    }

    const stored = cloneSession({ ...session, version: expectedVersion + 1 });
    this.sessions.set(stored.id, stored);
    return cloneSession(stored);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async list(options: SessionListOptions = {}): Promise<ConversationSession[]> {
    const matching = [...this.sessions.values()]
      .filter((session) => !options.formId || session.formId === options.formId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
    return (options.limit ? matching.slice(0, options.limit) : matching).map(cloneSession);
  }
}
