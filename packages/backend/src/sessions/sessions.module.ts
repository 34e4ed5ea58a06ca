import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { sessionStoreSetting } from '../config/app.config';
import { ConversationSessionEntity } from '../database/entities/conversation-session.entity';
import { InMemorySessionStore } from './in-memory-session.store';
import { SESSION_STORE, SessionStore } from './session-store.interface';
import { TypeOrmSessionStore } from './typeorm-session.store';

/**
 * Binds SESSION_STORE to PostgreSQL or process memory per SESSION_STORE
 */
@Module({
  imports: [TypeOrmModule.forFeature([ConversationSessionEntity])],
  providers: [
    InMemorySessionStore,
    {
      provide: SESSION_STORE,
      inject: [ConfigService, getRepositoryToken(ConversationSessionEntity), InMemorySessionStore],
      useFactory: (
        config: ConfigService,
        repository: Repository<ConversationSessionEntity>,
        memory: InMemorySessionStore,
      ): SessionStore =>
        sessionStoreSetting(config) === 'memory' ? memory : new TypeOrmSessionStore(repository),
    },
  ],
  exports: [SESSION_STORE],
})
export class SessionsModule {}
