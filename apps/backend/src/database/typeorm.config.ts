/**
 * TypeORM runtime and CLI configuration.
 * Schema synchronization is allowed only for local development; every other
 * environment runs the checked-in migrations.
 */
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { join } from 'path';
import { DataSourceOptions } from 'typeorm';
import { resolveBooleanEnv, resolveIntegerEnv } from '../common/env/env.util';

const LOCAL_NODE_ENVS = new Set(['development', 'dev', 'local']);

const TYPEORM_ENV_KEYS = [
  'NODE_ENV',
  'CI',
  'TYPEORM_SYNCHRONIZE',
  'TYPEORM_RUN_MIGRATIONS',
  'TYPEORM_POOL_MAX',
  'TYPEORM_IDLE_TIMEOUT_MS',
] as const;

export const isLocalDevelopmentEnvironment = (
  env: NodeJS.ProcessEnv,
): boolean => {
  const nodeEnv = String(env.NODE_ENV || 'development')
    .trim()
    .toLowerCase();
  return LOCAL_NODE_ENVS.has(nodeEnv) && !resolveBooleanEnv(env.CI, false);
};

export const shouldSynchronizeSchema = (env: NodeJS.ProcessEnv): boolean => {
  if (!isLocalDevelopmentEnvironment(env)) return false;
  return resolveBooleanEnv(env.TYPEORM_SYNCHRONIZE, true);
};

const resolveTypeOrmPaths = () => ({
  entities: [join(__dirname, '..', '**', '*.entity.{ts,js}')],
  migrations: [join(__dirname, 'migrations', '*.{ts,js}')],
});

const resolveEnvironmentForTypeOrm = (
  configService: ConfigService,
): NodeJS.ProcessEnv => {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    DATABASE_URL: configService.getOrThrow<string>('DATABASE_URL'),
  };
  for (const key of TYPEORM_ENV_KEYS) {
    env[key] = configService.get<string>(key) ?? process.env[key];
  }
  return env;
};

export const buildDataSourceOptionsFromEnv = (
  env: NodeJS.ProcessEnv,
): DataSourceOptions => {
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL is required for TypeORM initialization.');
  }

  const synchronize = shouldSynchronizeSchema(env);
  const migrationsRun = resolveBooleanEnv(
    env.TYPEORM_RUN_MIGRATIONS,
    !synchronize,
  );
  const { entities, migrations } = resolveTypeOrmPaths();

  return {
    type: 'postgres',
    url: env.DATABASE_URL,
    synchronize,
    logging: ['error'],
    entities,
    migrations,
    migrationsTableName: 'typeorm_migrations',
    migrationsRun,
    migrationsTransactionMode: 'each',
    extra: {
      max: resolveIntegerEnv({
        rawValue: env.TYPEORM_POOL_MAX,
        fallbackValue: 10,
        minimumValue: 1,
        maximumValue: 200,
      }),
      idleTimeoutMillis: resolveIntegerEnv({
        rawValue: env.TYPEORM_IDLE_TIMEOUT_MS,
        fallbackValue: 30_000,
        minimumValue: 1_000,
        maximumValue: 600_000,
      }),
    },
  };
};

export const buildTypeOrmModuleOptions = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  ...buildDataSourceOptionsFromEnv(resolveEnvironmentForTypeOrm(configService)),
  autoLoadEntities: true,
});
