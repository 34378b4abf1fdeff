import type { FactoryProvider, Logger, ModuleMetadata } from '@nestjs/common';
import type { GroupDirectoryMetrics } from './observability';

/**
 * - `readwrite`: the primary database
 * - `readonly`: a read-only database, possibly a replica; mutations are rejected
 * - `transaction`: a transaction owned by the caller
 */
export type GroupDirectoryMode = 'readwrite' | 'readonly' | 'transaction';

export interface GroupDirectoryContext {
  mode: GroupDirectoryMode;
  logger: Logger;
  metrics: GroupDirectoryMetrics;
}

export interface GroupDirectoryModuleOptions {
  connectionString: string;
  /** Defaults to the read-write database. */
  readonlyConnectionString?: string;
  observability?: {
    loggerContext?: string;
    metricPrefix?: string;
  };
}

export interface GroupDirectoryModuleAsyncOptions
  extends Pick<FactoryProvider<GroupDirectoryModuleOptions>, 'useFactory' | 'inject'> {
  imports?: ModuleMetadata['imports'];
}
