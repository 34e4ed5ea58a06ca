import { Entity, Column, PrimaryColumn, Index } from 'typeorm';
import {
  ConversationTurn,
  FormConfiguration,
  PartialRecord,
  PersistedAgentState,
} from '../../intake/intake.types';

/**
 * Intake session. `version` guards against lost updates: writers update
 * with `WHERE version = expected` and bump it.
 */
@Entity('conversation_sessions')
export class ConversationSessionEntity {
  @PrimaryColumn({ type: 'varchar', length: 255 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  formId!: string;

  /** Configuration as it was when the session started */
  @Column({ type: 'jsonb' })
  configuration!: FormConfiguration;

  @Column({ type: 'varchar', length: 10 })
  language!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  turns!: ConversationTurn[];

  @Column({ type: 'jsonb', default: () => "'{}'" })
  record!: PartialRecord;

  @Column({ type: 'boolean', default: false })
  complete!: boolean;

  @Column({ type: 'varchar', length: 50 })
  status!: PersistedAgentState;

  @Column({ type: 'int', default: 0 })
  version!: number;

  @Column({ type: 'timestamp' })
  createdAt!: Date;

  @Column({ type: 'timestamp' })
  @Index()
  updatedAt!: Date;
}
