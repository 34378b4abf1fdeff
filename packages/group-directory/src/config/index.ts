export {
  type DatabaseConfig,
  type DatabaseConfigNamespaced,
  DatabaseConfigSchema,
  databaseConfig,
  groupDirectoryOptionsFromConfig,
} from './database.config';
