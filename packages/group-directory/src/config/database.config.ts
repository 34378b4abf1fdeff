import { registerAs } from '@nestjs/config';
import { z } from 'zod/v4';
import type { GroupDirectoryModuleOptions } from '../core/types';
import { postgresUrl, redacted } from '../utils/zod';

export const DatabaseConfigSchema = z.object({
  url: redacted(postgresUrl('The postgres connection URL of the primary database')),
  readonlyUrl: redacted(
    postgresUrl('The postgres connection URL used for reads, typically a replica'),
  ).optional(),
});

export type DatabaseConfig = z.output<typeof DatabaseConfigSchema>;
export type DatabaseConfigNamespaced = { database: DatabaseConfig };

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig =>
    DatabaseConfigSchema.parse({
      url: process.env.DATABASE_URL,
      readonlyUrl: process.env.DATABASE_READONLY_URL || undefined,
    }),
);

export const groupDirectoryOptionsFromConfig = (
  config: DatabaseConfig,
  observability?: GroupDirectoryModuleOptions['observability'],
): GroupDirectoryModuleOptions => ({
  connectionString: config.url.value.toString(),
  readonlyConnectionString: config.readonlyUrl?.value.toString(),
  observability,
});
