/**
 * DataSource entrypoint for the TypeORM migration CLI.
 * Loads the backend .env first and never synchronizes the schema.
 */
import 'reflect-metadata';
import { config as loadEnvironment } from 'dotenv';
import { DataSource } from 'typeorm';
import { buildDataSourceOptionsFromEnv } from './typeorm.config';

loadEnvironment({ path: process.env.TYPEORM_ENV_FILE || '.env' });

const appDataSource = new DataSource({
  ...buildDataSourceOptionsFromEnv(process.env),
  synchronize: false,
});

export default appDataSource;
