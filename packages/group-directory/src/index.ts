export {
  type DatabaseConfig,
  type DatabaseConfigNamespaced,
  DatabaseConfigSchema,
  databaseConfig,
  groupDirectoryOptionsFromConfig,
} from './config';
export {
  type GroupDirectoryDatabases,
  GroupDirectoryFactory,
} from './core/group-directory.factory';
export { GroupDirectoryModule, type GroupDirectoryPools } from './core/group-directory.module';
export type { GroupDirectoryMetrics } from './core/observability';
export {
  GROUP_DIRECTORY_DATABASE,
  GROUP_DIRECTORY_FACTORY,
  GROUP_DIRECTORY_METRICS,
  GROUP_DIRECTORY_READONLY_DATABASE,
  InjectGroupDirectoryFactory,
} from './core/tokens';
export type {
  GroupDirectoryMode,
  GroupDirectoryModuleAsyncOptions,
  GroupDirectoryModuleOptions,
} from './core/types';
export type { DrizzleDatabase, DrizzleExecutor } from './db';
export * as groupDirectorySchema from './db/schema';
export * from './groups';
