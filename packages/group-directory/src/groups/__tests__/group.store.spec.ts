import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestContext } from '../../../test/test-utils/group-directory-context';
import { asExecutor, MockDrizzleDatabase } from '../../__mocks__';
import type { GroupRow } from '../../db';
import { GroupStore } from '../group.store';
import {
  DuplicateNameError,
  ReadonlyHandleError,
  SerializationError,
  StoreError,
} from '../groups.errors';
import type { GroupMetadata } from '../groups.types';

const uniqueViolation = (constraint: string) =>
  Object.assign(new Error('Failed query: insert into "groups"'), {
    cause: Object.assign(new Error('duplicate key value violates unique constraint'), {
      code: '23505',
      constraint,
    }),
  });

const groupRow = (overrides: Partial<GroupRow> = {}): GroupRow => ({
  id: 7,
  name: 'payments',
  description: 'Payments team',
  createdBy: 'alice',
  updatedBy: 'alice',
  createdAt: 1_700_000_000,
  updatedAt: 1_700_000_000,
  metadata: '{"team":"payments"}',
  ...overrides,
});

describe('GroupStore', () => {
  let mockDrizzle: MockDrizzleDatabase;

  beforeEach(() => {
    mockDrizzle = new MockDrizzleDatabase();
  });

  describe('create', () => {
    it('inserts the group with equal timestamps and encoded metadata', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_123_456);
      mockDrizzle.__nextInsertReturningRows = [{ id: 42 }];
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      const id = await store.create({
        name: 'payments',
        creator: 'alice',
        description: 'Payments team',
        metadata: { team: 'payments', tier: 'gold' },
      });

      expect(id).toBe(42);
      const insert = mockDrizzle.insert.mock.results[0]?.value;
      expect(insert?.values).toHaveBeenCalledWith({
        name: 'payments',
        description: 'Payments team',
        createdBy: 'alice',
        updatedBy: 'alice',
        createdAt: 1_700_000_123,
        updatedAt: 1_700_000_123,
        metadata: '{"team":"payments","tier":"gold"}',
      });
    });

    it('counts created groups', async () => {
      mockDrizzle.__nextInsertReturningRows = [{ id: 1 }];
      const context = createTestContext();
      const add = vi.spyOn(context.metrics.groupsCreatedTotal, 'add');
      const store = new GroupStore(asExecutor(mockDrizzle), context);

      await store.create({ name: 'ops', creator: 'bob', description: '', metadata: {} });

      expect(add).toHaveBeenCalledWith(1);
    });

    it('throws DuplicateNameError when the name constraint is violated', async () => {
      mockDrizzle.__nextInsertError = uniqueViolation('groups_name_unique');
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      const error = await store
        .create({ name: 'payments', creator: 'alice', description: '', metadata: {} })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DuplicateNameError);
      expect(error).toMatchObject({
        groupName: 'payments',
        message: 'A group named "payments" already exists',
      });
    });

    it('throws StoreError for a unique violation on another constraint', async () => {
      mockDrizzle.__nextInsertError = uniqueViolation('groups_pkey');
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      await expect(
        store.create({ name: 'payments', creator: 'alice', description: '', metadata: {} }),
      ).rejects.toBeInstanceOf(StoreError);
    });

    it('throws StoreError for a unique violation that names no constraint', async () => {
      mockDrizzle.__nextInsertError = Object.assign(new Error('Failed query: insert into "groups"'), {
        cause: Object.assign(new Error('duplicate key value'), { code: '23505' }),
      });
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      const error = await store
        .create({ name: 'payments', creator: 'alice', description: '', metadata: {} })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreError);
      expect(error).not.toBeInstanceOf(DuplicateNameError);
    });

    it('keeps the driver error as cause of a StoreError', async () => {
      const failure = new Error('connection terminated unexpectedly');
      mockDrizzle.__nextInsertError = failure;
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      const error = await store
        .create({ name: 'payments', creator: 'alice', description: '', metadata: {} })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreError);
      expect(error).toMatchObject({ message: 'Group create failed', cause: failure });
    });

    it('throws SerializationError for metadata that is not a string mapping', async () => {
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());
      const metadata: GroupMetadata = JSON.parse('{"tier":1}');

      await expect(
        store.create({ name: 'payments', creator: 'alice', description: '', metadata }),
      ).rejects.toBeInstanceOf(SerializationError);
      expect(mockDrizzle.insert).not.toHaveBeenCalled();
    });

    it('refuses to create through a read-only handle', async () => {
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(
        store.create({ name: 'payments', creator: 'alice', description: '', metadata: {} }),
      ).rejects.toBeInstanceOf(ReadonlyHandleError);
      expect(mockDrizzle.insert).not.toHaveBeenCalled();
    });
  });

  describe('getByName', () => {
    it('maps the stored row to a group', async () => {
      mockDrizzle.__nextQueryGroup = groupRow();
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      const group = await store.getByName('payments');

      expect(mockDrizzle.query.groups.findFirst).toHaveBeenCalledOnce();
      expect(group).toEqual({
        id: 7,
        name: 'payments',
        description: 'Payments team',
        createdBy: 'alice',
        updatedBy: 'alice',
        createdAt: 1_700_000_000,
        updatedAt: 1_700_000_000,
        metadata: { team: 'payments' },
      });
    });

    it('returns undefined when no group has that name', async () => {
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.getByName('missing')).resolves.toBeUndefined();
    });
  });

  describe('getById', () => {
    it('returns undefined when no group has that id', async () => {
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.getById(404)).resolves.toBeUndefined();
    });

    it('throws SerializationError when the stored metadata is corrupt', async () => {
      mockDrizzle.__nextQueryGroup = groupRow({ metadata: 'not json' });
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.getById(7)).rejects.toBeInstanceOf(SerializationError);
    });
  });

  describe('int64 columns', () => {
    const unsafeId = 2 ** 53 + 2;

    it('refuses a stored id beyond the safe integer range', async () => {
      mockDrizzle.__nextQueryGroup = groupRow({ id: unsafeId });
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.getById(7)).rejects.toThrow(
        new StoreError('Column groups.id holds 9007199254740994, beyond the safe integer range'),
      );
    });

    it('refuses a stored timestamp beyond the safe integer range', async () => {
      mockDrizzle.__nextQueryGroups = [groupRow({ updatedAt: unsafeId })];
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.listAll()).rejects.toBeInstanceOf(StoreError);
    });

    it('refuses an assigned id beyond the safe integer range', async () => {
      mockDrizzle.__nextInsertReturningRows = [{ id: unsafeId }];
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext());

      await expect(
        store.create({ name: 'payments', creator: 'alice', description: '', metadata: {} }),
      ).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe('listAll', () => {
    it('returns each group once', async () => {
      mockDrizzle.__nextQueryGroups = [
        groupRow({ id: 1, name: 'payments' }),
        groupRow({ id: 1, name: 'payments' }),
        groupRow({ id: 2, name: 'ops' }),
      ];
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      const groups = await store.listAll();

      expect(groups.map((group) => group.id)).toEqual([1, 2]);
    });

    it('returns an empty list when there are no groups', async () => {
      const store = new GroupStore(asExecutor(mockDrizzle), createTestContext('readonly'));

      await expect(store.listAll()).resolves.toEqual([]);
    });
  });
});
