import {
  type DynamicModule,
  Inject,
  Logger,
  Module,
  type OnModuleDestroy,
  type Provider,
} from '@nestjs/common';
import { type Meter, metrics } from '@opentelemetry/api';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import type { DrizzleDatabase } from '../db';
import * as schema from '../db/schema';
import { type GroupDirectoryDatabases, GroupDirectoryFactory } from './group-directory.factory';
import { createGroupDirectoryMetrics, type GroupDirectoryMetrics } from './observability';
import {
  GROUP_DIRECTORY_DATABASE,
  GROUP_DIRECTORY_FACTORY,
  GROUP_DIRECTORY_METRICS,
  GROUP_DIRECTORY_MODULE_OPTIONS,
  GROUP_DIRECTORY_POOLS,
  GROUP_DIRECTORY_READONLY_DATABASE,
} from './tokens';
import type { GroupDirectoryModuleAsyncOptions, GroupDirectoryModuleOptions } from './types';

const DEFAULT_LOGGER_CONTEXT = 'GroupDirectory';
const DEFAULT_METRIC_PREFIX = 'group_directory';

const GROUP_DIRECTORY_EXPORTS = [
  GROUP_DIRECTORY_FACTORY,
  GROUP_DIRECTORY_DATABASE,
  GROUP_DIRECTORY_READONLY_DATABASE,
  GROUP_DIRECTORY_METRICS,
];

export interface GroupDirectoryPools {
  readwrite: Pool;
  readonly: Pool;
}

@Module({})
export class GroupDirectoryModule implements OnModuleDestroy {
  public constructor(
    @Inject(GROUP_DIRECTORY_POOLS)
    private readonly pools: GroupDirectoryPools,
  ) {}

  public async onModuleDestroy(): Promise<void> {
    const pools = new Set([this.pools.readwrite, this.pools.readonly]);
    await Promise.all([...pools].map((pool) => pool.end()));
  }

  public static forRoot(options: GroupDirectoryModuleOptions): DynamicModule {
    return {
      module: GroupDirectoryModule,
      global: true,
      providers: [
        { provide: GROUP_DIRECTORY_MODULE_OPTIONS, useValue: options },
        ...GroupDirectoryModule.createCoreProviders(),
      ],
      exports: GROUP_DIRECTORY_EXPORTS,
    };
  }

  public static forRootAsync(options: GroupDirectoryModuleAsyncOptions): DynamicModule {
    return {
      module: GroupDirectoryModule,
      global: true,
      imports: options.imports,
      providers: [
        {
          provide: GROUP_DIRECTORY_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject,
        },
        ...GroupDirectoryModule.createCoreProviders(),
      ],
      exports: GROUP_DIRECTORY_EXPORTS,
    };
  }

  private static createCoreProviders(): Provider[] {
    return [
      {
        provide: GROUP_DIRECTORY_POOLS,
        useFactory: (options: GroupDirectoryModuleOptions): GroupDirectoryPools => {
          const readwrite = new Pool({ connectionString: options.connectionString });
          const readonly =
            options.readonlyConnectionString === undefined
              ? readwrite
              : new Pool({ connectionString: options.readonlyConnectionString });
          return { readwrite, readonly };
        },
        inject: [GROUP_DIRECTORY_MODULE_OPTIONS],
      },
      {
        provide: GROUP_DIRECTORY_DATABASE,
        useFactory: (pools: GroupDirectoryPools): DrizzleDatabase =>
          drizzle({ client: pools.readwrite, casing: 'snake_case', schema }),
        inject: [GROUP_DIRECTORY_POOLS],
      },
      {
        provide: GROUP_DIRECTORY_READONLY_DATABASE,
        useFactory: (pools: GroupDirectoryPools): DrizzleDatabase =>
          drizzle({ client: pools.readonly, casing: 'snake_case', schema }),
        inject: [GROUP_DIRECTORY_POOLS],
      },
      {
        provide: GROUP_DIRECTORY_METRICS,
        useFactory: (options: GroupDirectoryModuleOptions): GroupDirectoryMetrics => {
          const prefix = options.observability?.metricPrefix ?? DEFAULT_METRIC_PREFIX;
          const meter: Meter = metrics.getMeter(prefix);
          return createGroupDirectoryMetrics(meter, prefix);
        },
        inject: [GROUP_DIRECTORY_MODULE_OPTIONS],
      },
      {
        provide: GROUP_DIRECTORY_FACTORY,
        useFactory: (
          options: GroupDirectoryModuleOptions,
          readwrite: DrizzleDatabase,
          readonly: DrizzleDatabase,
          metricsInstance: GroupDirectoryMetrics,
        ) => {
          const databases: GroupDirectoryDatabases = { readwrite, readonly };
          const logger = new Logger(options.observability?.loggerContext ?? DEFAULT_LOGGER_CONTEXT);
          return new GroupDirectoryFactory(databases, { logger, metrics: metricsInstance });
        },
        inject: [
          GROUP_DIRECTORY_MODULE_OPTIONS,
          GROUP_DIRECTORY_DATABASE,
          GROUP_DIRECTORY_READONLY_DATABASE,
          GROUP_DIRECTORY_METRICS,
        ],
      },
    ];
  }
}
