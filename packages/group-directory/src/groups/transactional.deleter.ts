import { eq } from 'drizzle-orm';
import type { GroupDirectoryContext } from '../core/types';
import { accessGrants, type DrizzleExecutor, groups, memberships } from '../db';
import type { Group } from './groups.types';
import { assertWritable, reportStoreFailure } from './store-failure';

export class TransactionalDeleter {
  public constructor(
    private readonly db: DrizzleExecutor,
    private readonly context: GroupDirectoryContext,
  ) {}

  /**
   * Removes the group, its access grants and its memberships in one
   * transaction. Deleting a group that no longer exists is a no-op.
   *
   * Through a handle built on a caller's transaction this runs as a savepoint
   * and commits or rolls back with the caller's transaction.
   */
  public async delete(group: Pick<Group, 'id' | 'name'>): Promise<void> {
    assertWritable(this.context, 'delete');

    try {
      await this.db.transaction(async (tx) => {
        // Associations first: their foreign keys to groups do not cascade.
        await tx.delete(accessGrants).where(eq(accessGrants.groupId, group.id));
        await tx.delete(memberships).where(eq(memberships.groupId, group.id));
        await tx.delete(groups).where(eq(groups.id, group.id));
      });
    } catch (error) {
      throw reportStoreFailure(this.context, 'delete', error);
    }

    this.context.metrics.groupsDeletedTotal.add(1);
    this.context.logger.log({ msg: 'Deleted group', id: group.id, name: group.name });
  }
}
