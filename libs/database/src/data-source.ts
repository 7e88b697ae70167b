import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { GenerationJob } from './entities/generation-job.entity';

/**
 * Load env vars from the project root .env file.
 * Supports running from libs/database/, from the project root and from dist/.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations
 * (`migration:run`, `migration:revert`).
 *
 * Reads database credentials from environment variables with dev defaults.
 * In production, these MUST be overridden.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'genforge',
  password: process.env['POSTGRES_PASSWORD'] || 'genforge_secret',
  database: process.env['POSTGRES_DB'] || 'genforge',
  entities: [GenerationJob],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
