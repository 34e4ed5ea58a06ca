import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateIntakeTables1760000000000 implements MigrationInterface {
  name = 'CreateIntakeTables1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // Enable UUID extension - required for uuid_generate_v4()
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "form_configurations" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "name" varchar(255) NOT NULL,
        "industry" varchar(50) NOT NULL DEFAULT 'other',
        "business" jsonb NOT NULL,
        "agent" jsonb NOT NULL,
        "fields" jsonb NOT NULL,
        "isActive" boolean NOT NULL DEFAULT true,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now()
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_form_configurations_industry" ON "form_configurations" ("industry")
    `);

    await queryRunner.query(`
      CREATE TABLE "conversation_sessions" (
        "id" varchar(255) PRIMARY KEY,
        "formId" varchar(255) NOT NULL,
        "configuration" jsonb NOT NULL,
        "language" varchar(10) NOT NULL,
        "turns" jsonb NOT NULL DEFAULT '[]',
        "record" jsonb NOT NULL DEFAULT '{}',
        "complete" boolean NOT NULL DEFAULT false,
        "status" varchar(50) NOT NULL,
        "version" integer NOT NULL DEFAULT 0,
        "createdAt" TIMESTAMP NOT NULL,
        "updatedAt" TIMESTAMP NOT NULL
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_conversation_sessions_formId" ON "conversation_sessions" ("formId")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_conversation_sessions_updatedAt" ON "conversation_sessions" ("updatedAt")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_conversation_sessions_updatedAt"`);
    await queryRunner.query(`DROP INDEX "IDX_conversation_sessions_formId"`);
    await queryRunner.query(`DROP TABLE "conversation_sessions"`);
    await queryRunner.query(`DROP INDEX "IDX_form_configurations_industry"`);
    await queryRunner.query(`DROP TABLE "form_configurations"`);
  }
}
