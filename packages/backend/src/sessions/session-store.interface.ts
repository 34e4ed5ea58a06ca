import { ConversationSession } from '../intake/intake.types';

export const SESSION_STORE = Symbol('SESSION_STORE');

export interface SessionListOptions {
  formId?: string;
  limit?: number;
}

/**
 * Durable session storage with optimistic concurrency.
 *
 * `save` succeeds only when the stored version still equals
 * `expectedVersion`; the returned session carries the incremented version.
 */
export interface SessionStore {
  /** @throws ConflictError when the id is taken */
  create(session: ConversationSession): Promise<ConversationSession>;
  get(sessionId: string): Promise<ConversationSession | null>;
  /** @throws ConflictError on a stale version, SessionNotFoundError when gone */
  save(session: ConversationSession, expectedVersion: number): Promise<ConversationSession>;
  /** Resolves false when there was nothing to delete */
  delete(sessionId: string): Promise<boolean>;
  /** Most recently updated first */
  list(options?: SessionListOptions): Promise<ConversationSession[]>;
}

/**
 * Deep copy; stores never hand out references to what they hold
 */
export function cloneSession(session: ConversationSession): ConversationSession {
  return {
    ...session,
    configuration: structuredClone(session.configuration),
    turns: session.turns.map((turn) => ({ ...turn })),
    record: structuredClone(session.record),
    createdAt: new Date(session.createdAt.getTime()),
    updatedAt: new Date(session.updatedAt.getTime()),
  };
}
