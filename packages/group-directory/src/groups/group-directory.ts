import type { GroupDirectoryContext, GroupDirectoryMode } from '../core/types';
import type { DrizzleExecutor } from '../db';
import { GroupStore } from './group.store';
import { RelationshipResolver } from './relationship.resolver';
import { TransactionalDeleter } from './transactional.deleter';

/**
 * A store handle over one database executor. Get one from
 * `GroupDirectoryFactory` in the mode the call site needs.
 */
export class GroupDirectory {
  public readonly mode: GroupDirectoryMode;
  public readonly groups: GroupStore;
  public readonly relationships: RelationshipResolver;
  public readonly deletion: TransactionalDeleter;

  public constructor(db: DrizzleExecutor, context: GroupDirectoryContext) {
    this.mode = context.mode;
    this.groups = new GroupStore(db, context);
    this.relationships = new RelationshipResolver(db, context);
    this.deletion = new TransactionalDeleter(db, context);
  }
}
