import type { GroupRow } from '../db';
import { decodeGroupMetadata } from './group-metadata.codec';
import { StoreError } from './groups.errors';
import type { Group, SecretGroupPair } from './groups.types';

/**
 * Int64 columns are read in number mode. A value past 2^53 has already been
 * rounded by the time it reaches us, so it is refused instead of returned.
 */
export const assertSafeInteger = (value: number, column: string): number => {
  if (!Number.isSafeInteger(value)) {
    throw new StoreError(`Column ${column} holds ${value}, beyond the safe integer range`);
  }
  return value;
};

export const mapGroupRow = (row: GroupRow): Group => ({
  id: assertSafeInteger(row.id, 'groups.id'),
  name: row.name,
  description: row.description,
  createdBy: row.createdBy,
  updatedBy: row.updatedBy,
  createdAt: assertSafeInteger(row.createdAt, 'groups.created_at'),
  updatedAt: assertSafeInteger(row.updatedAt, 'groups.updated_at'),
  metadata: decodeGroupMetadata(row.metadata),
});

export const mapSecretGroupPair = ({ secretId, groupId }: SecretGroupPair): SecretGroupPair => ({
  secretId: assertSafeInteger(secretId, 'access_grants.secret_id'),
  groupId: assertSafeInteger(groupId, 'access_grants.group_id'),
});
