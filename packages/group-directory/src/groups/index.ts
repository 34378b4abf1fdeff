export { GroupDirectory } from './group-directory';
export {
  decodeGroupMetadata,
  encodeGroupMetadata,
  GroupMetadataSchema,
  groupMetadataCodec,
} from './group-metadata.codec';
export { assertSafeInteger, mapGroupRow, mapSecretGroupPair } from './group.mapper';
export { GroupStore } from './group.store';
export {
  DuplicateNameError,
  GroupDirectoryError,
  ReadonlyHandleError,
  SerializationError,
  StoreError,
} from './groups.errors';
export type {
  CreateGroupInput,
  Group,
  GroupMetadata,
  GroupsBySecret,
  SecretGroupPair,
} from './groups.types';
export { joinGroupsToSecrets, RelationshipResolver } from './relationship.resolver';
export { TransactionalDeleter } from './transactional.deleter';
