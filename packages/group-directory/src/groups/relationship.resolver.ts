import { eq, getTableColumns, inArray } from 'drizzle-orm';
import type { GroupDirectoryContext } from '../core/types';
import { accessGrants, type DrizzleExecutor, groups, secrets } from '../db';
import { elapsedMilliseconds } from '../utils/timing';
import { mapGroupRow, mapSecretGroupPair } from './group.mapper';
import type { Group, GroupsBySecret, SecretGroupPair } from './groups.types';
import { reportStoreFailure } from './store-failure';

/**
 * Joins the distinct groups and the (secret, group) pairs of one resolution
 * through an id index. Each secret keeps its pairs' order; a pair whose group
 * is missing from `groupList` is dropped, and a secret left without groups
 * gets no entry. O(groups + pairs).
 */
export function joinGroupsToSecrets(
  groupList: readonly Group[],
  pairs: readonly SecretGroupPair[],
): GroupsBySecret {
  const groupsById = new Map<number, Group>();
  for (const group of groupList) {
    groupsById.set(group.id, group);
  }

  const result: GroupsBySecret = new Map();
  for (const { secretId, groupId } of pairs) {
    const group = groupsById.get(groupId);
    if (!group) {
      continue;
    }
    const secretGroups = result.get(secretId);
    if (secretGroups) {
      secretGroups.push(group);
    } else {
      result.set(secretId, [group]);
    }
  }
  return result;
}

export class RelationshipResolver {
  public constructor(
    private readonly db: DrizzleExecutor,
    private readonly context: GroupDirectoryContext,
  ) {}

  /**
   * Resolves the groups granted access to each of `secretIds` in two queries,
   * whatever the number of secrets: the distinct groups involved, then the
   * (secret, group) pairs. Secrets without any grant are absent from the result.
   */
  public async resolveGroupsForSecrets(secretIds: Iterable<number>): Promise<GroupsBySecret> {
    const ids = [...new Set(secretIds)];
    if (ids.length === 0) {
      return new Map();
    }

    const startedAt = Date.now();
    try {
      const groupRows = await this.db
        .selectDistinct(getTableColumns(groups))
        .from(groups)
        .innerJoin(accessGrants, eq(accessGrants.groupId, groups.id))
        .innerJoin(secrets, eq(accessGrants.secretId, secrets.id))
        .where(inArray(secrets.id, ids));

      const pairs = await this.db
        .select({ secretId: secrets.id, groupId: groups.id })
        .from(groups)
        .innerJoin(accessGrants, eq(accessGrants.groupId, groups.id))
        .innerJoin(secrets, eq(accessGrants.secretId, secrets.id))
        .where(inArray(secrets.id, ids));

      const result = joinGroupsToSecrets(
        groupRows.map(mapGroupRow),
        pairs.map(mapSecretGroupPair),
      );
      this.context.logger.debug({
        msg: 'Resolved groups for secrets',
        requested: ids.length,
        resolved: result.size,
        distinctGroups: groupRows.length,
      });
      return result;
    } catch (error) {
      throw reportStoreFailure(this.context, 'resolve for secrets', error);
    } finally {
      this.context.metrics.resolveDurationMs.record(elapsedMilliseconds(startedAt));
    }
  }
}
