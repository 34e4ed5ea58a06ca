import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { ConversationSessionEntity } from '../database/entities/conversation-session.entity';
import { ConflictError, SessionNotFoundError } from '../intake/intake.errors';
import { ConversationSession } from '../intake/intake.types';
import { SessionListOptions, SessionStore } from './session-store.interface';

const DEFAULT_LIST_LIMIT = 100;
const PG_UNIQUE_VIOLATION = '23505';

/**
 * PostgreSQL session store. Saves run in a transaction that locks the row
 * and compares versions, so a stale writer in another process gets a
 * ConflictError instead of overwriting newer state.
 */
@Injectable()
export class TypeOrmSessionStore implements SessionStore {
  private readonly logger = new Logger(TypeOrmSessionStore.name);

  constructor(
    @InjectRepository(ConversationSessionEntity)
    private readonly sessionRepository: Repository<ConversationSessionEntity>,
  ) {}

  /**
   * Plain INSERT; the primary key decides between two concurrent starts
   * with the same id.
   */
  async create(session: ConversationSession): Promise<ConversationSession> {
    const fields = toEntityFields(session);
    try {
      await this.sessionRepository.insert(fields);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(session.id, 'already exists');
      }
      throw error;
    }

    this.logger.debug(`Created session ${session.id}`);
    return toSession(fields);
  }

  async get(sessionId: string): Promise<ConversationSession | null> {
    const entity = await this.sessionRepository.findOne({ where: { id: sessionId } });
    return entity ? toSession(entity) : null;
  }

  async save(session: ConversationSession, expectedVersion: number): Promise<ConversationSession> {
    return this.sessionRepository.manager.transaction(async (manager) => {
      const current = await manager.findOne(ConversationSessionEntity, {
        where: { id: session.id },
        lock: { mode: 'pessimistic_write' },
      });

      if (!current) {
        throw new SessionNotFoundError(session.id);
      }
      if (current.version !== expectedVersion) {
        this.logger.warn(
          `Stale write to session ${session.id}: expected version ${expectedVersion}, found ${current.version}`,
        );
        throw new ConflictError(session.id, 'was modified by another request');
      }

      const saved = await manager.save(
        ConversationSessionEntity,
        toEntityFields({ ...session, version: expectedVersion + 1 }),
      );
      return toSession(saved);
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    const result = await this.sessionRepository.delete({ id: sessionId });
    return (result.affected ?? 0) > 0;
  }

  async list(options: SessionListOptions = {}): Promise<ConversationSession[]> {
    const entities = await this.sessionRepository.find({
      where: options.formId ? { formId: options.formId } : {},
      order: { updatedAt: 'DESC' },
      take: options.limit ?? DEFAULT_LIST_LIMIT,
    });
    return entities.map(toSession);
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    error.driverError.code === PG_UNIQUE_VIOLATION
  );
}

function toEntityFields(session: ConversationSession): ConversationSessionEntity {
  return {
    id: session.id,
    formId: session.formId,
    configuration: session.configuration,
    language: session.language,
    turns: session.turns,
    record: session.record,
    complete: session.complete,
    status: session.status,
    version: session.version,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

function toSession(entity: ConversationSessionEntity): ConversationSession {
  return {
    id: entity.id,
    formId: entity.formId,
    configuration: entity.configuration,
    language: entity.language,
    turns: entity.turns ?? [],
    record: entity.record ?? {},
    complete: entity.complete,
    status: entity.status,
    version: entity.version,
    createdAt: new Date(entity.createdAt),
    updatedAt: new Date(entity.updatedAt),
  };
}
