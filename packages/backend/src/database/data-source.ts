import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { join } from 'path';

// Load environment variables from .env file
config();

/**
 * TypeORM Data Source for the CLI (migrations). Points at the compiled
 * output, so build first.
 *
 * Usage:
 *   npm run build
 *   npm run migration:run
 *   npm run migration:revert
 */
export default new DataSource({
  type: 'postgres',
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USER || 'postgres',
  password: process.env.DATABASE_PASSWORD || 'postgres',
  database: process.env.DATABASE_NAME || 'formtalk',

  entities: [join(__dirname, 'entities', '*.entity.js')],
  migrations: [join(__dirname, 'migrations', '*.js')],

  // Never use synchronize in production - always use migrations
  synchronize: false,
  logging: process.env.NODE_ENV === 'development',
  migrationsTableName: 'typeorm_migrations',
  migrationsTransactionMode: 'each',
});
