import type { Logger } from '@nestjs/common';
import type { DrizzleExecutor } from '../db';
import { GroupDirectory } from '../groups/group-directory';
import type { GroupDirectoryMetrics } from './observability';
import type { GroupDirectoryMode } from './types';

export interface GroupDirectoryDatabases {
  readwrite: DrizzleExecutor;
  readonly: DrizzleExecutor;
}

/**
 * Builds `GroupDirectory` handles. The mode is picked at the call site:
 *
 * ```ts
 * const id = await factory.readwrite().groups.create({ ... });
 * const group = await factory.readonly().groups.getById(id);
 * await db.transaction(async (tx) => {
 *   await factory.using(tx).deletion.delete(group);
 * });
 * ```
 */
export class GroupDirectoryFactory {
  public constructor(
    private readonly databases: GroupDirectoryDatabases,
    private readonly options: { logger: Logger; metrics: GroupDirectoryMetrics },
  ) {}

  public readwrite(): GroupDirectory {
    return this.create(this.databases.readwrite, 'readwrite');
  }

  public readonly(): GroupDirectory {
    return this.create(this.databases.readonly, 'readonly');
  }

  public using(transaction: DrizzleExecutor): GroupDirectory {
    return this.create(transaction, 'transaction');
  }

  private create(db: DrizzleExecutor, mode: GroupDirectoryMode): GroupDirectory {
    return new GroupDirectory(db, { mode, ...this.options });
  }
}
