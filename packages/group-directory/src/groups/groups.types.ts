export type GroupMetadata = Record<string, string>;

export interface Group {
  id: number;
  name: string;
  description: string;
  createdBy: string;
  updatedBy: string;
  createdAt: number;
  updatedAt: number;
  metadata: GroupMetadata;
}

export interface CreateGroupInput {
  name: string;
  creator: string;
  description: string;
  metadata: GroupMetadata;
}

/** One access grant as seen from the secret side. */
export interface SecretGroupPair {
  secretId: number;
  groupId: number;
}

/** Secret id to the groups allowed to access it. Secrets without grants have no entry. */
export type GroupsBySecret = Map<number, Group[]>;
