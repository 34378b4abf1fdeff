import assert from 'node:assert';
import { eq } from 'drizzle-orm';
import { prop, uniqueBy } from 'remeda';
import type { GroupDirectoryContext } from '../core/types';
import {
  type DrizzleExecutor,
  GROUPS_NAME_UNIQUE_CONSTRAINT,
  type GroupRow,
  groups,
  isUniqueViolation,
} from '../db';
import { nowInEpochSeconds } from '../utils/timing';
import { encodeGroupMetadata } from './group-metadata.codec';
import { assertSafeInteger, mapGroupRow } from './group.mapper';
import { DuplicateNameError } from './groups.errors';
import type { CreateGroupInput, Group } from './groups.types';
import { assertWritable, reportStoreFailure } from './store-failure';

export class GroupStore {
  public constructor(
    private readonly db: DrizzleExecutor,
    private readonly context: GroupDirectoryContext,
  ) {}

  /**
   * Inserts a new group and returns its store-assigned id. Both timestamps are
   * set to the current epoch second and both actor fields to `creator`.
   *
   * @throws DuplicateNameError when a group with the same name exists
   * @throws SerializationError when the metadata is not a flat string mapping
   */
  public async create({ name, creator, description, metadata }: CreateGroupInput): Promise<number> {
    assertWritable(this.context, 'create');

    const encodedMetadata = encodeGroupMetadata(metadata);
    const now = nowInEpochSeconds();

    let inserted: { id: number }[];
    try {
      inserted = await this.db
        .insert(groups)
        .values({
          name,
          description,
          createdBy: creator,
          updatedBy: creator,
          createdAt: now,
          updatedAt: now,
          metadata: encodedMetadata,
        })
        .returning({ id: groups.id });
    } catch (error) {
      if (isUniqueViolation(error, GROUPS_NAME_UNIQUE_CONSTRAINT)) {
        this.context.logger.warn({ msg: 'Group name already taken', name });
        throw new DuplicateNameError(name, error);
      }
      throw reportStoreFailure(this.context, 'create', error);
    }

    const [row] = inserted;
    assert.ok(row, `Insert of group "${name}" returned no id`);
    const id = assertSafeInteger(row.id, 'groups.id');

    this.context.metrics.groupsCreatedTotal.add(1);
    this.context.logger.log({ msg: 'Created group', id, name, creator });
    return id;
  }

  public async getByName(name: string): Promise<Group | undefined> {
    return this.findOne('get by name', () =>
      this.db.query.groups.findFirst({ where: eq(groups.name, name) }),
    );
  }

  public async getById(id: number): Promise<Group | undefined> {
    return this.findOne('get by id', () =>
      this.db.query.groups.findFirst({ where: eq(groups.id, id) }),
    );
  }

  /** Every group, at most once per id. Order is unspecified. */
  public async listAll(): Promise<Group[]> {
    try {
      const rows = await this.db.query.groups.findMany();
      return uniqueBy(rows, prop('id')).map(mapGroupRow);
    } catch (error) {
      throw reportStoreFailure(this.context, 'list', error);
    }
  }

  private async findOne(
    operation: string,
    query: () => Promise<GroupRow | undefined>,
  ): Promise<Group | undefined> {
    try {
      const row = await query();
      this.context.logger.debug({ msg: `Group ${operation}`, found: row !== undefined });
      return row ? mapGroupRow(row) : undefined;
    } catch (error) {
      throw reportStoreFailure(this.context, operation, error);
    }
  }
}
