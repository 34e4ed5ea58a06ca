import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import {
  AgentPersona,
  BusinessProfile,
  FieldSpecification,
  Industry,
} from '../../intake/intake.types';

@Entity('form_configurations')
export class FormConfigurationEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 50, default: Industry.OTHER })
  @Index()
  industry!: Industry;

  @Column({ type: 'jsonb' })
  business!: BusinessProfile;

  @Column({ type: 'jsonb' })
  agent!: AgentPersona;

  @Column({ type: 'jsonb' })
  fields!: FieldSpecification[];

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
