import { vi } from 'vitest';
import type { DrizzleExecutor, GroupRow } from '../db';

class InsertBuilder {
  public values = vi.fn((_values: unknown) => this);
  public returning = vi.fn(async (_projection?: unknown): Promise<unknown[]> => {
    if (this.db.__nextInsertError) {
      throw this.db.__nextInsertError;
    }
    return this.db.__nextInsertReturningRows ?? [];
  });

  public constructor(private readonly db: MockDrizzleDatabase) {}
}

class SelectBuilder {
  public from = vi.fn((_table: unknown) => this);
  public innerJoin = vi.fn((_other: unknown, _on: unknown) => this);
  public where = vi.fn(async (_cond: unknown): Promise<unknown[]> => {
    if (this.db.__nextSelectError) {
      throw this.db.__nextSelectError;
    }
    return this.db.__selectResults.shift() ?? [];
  });

  public constructor(private readonly db: MockDrizzleDatabase) {}
}

class DeleteBuilder {
  public where = vi.fn(async (_cond: unknown): Promise<void> => {
    if (this.db.__failDeleteOf === this.table) {
      throw new Error('delete failed');
    }
  });

  public constructor(
    private readonly db: MockDrizzleDatabase,
    private readonly table: unknown,
  ) {}
}

export class MockDrizzleDatabase {
  public insert = vi.fn((_table: unknown) => new InsertBuilder(this));
  public select = vi.fn((_projection?: unknown) => new SelectBuilder(this));
  public selectDistinct = vi.fn((_projection?: unknown) => new SelectBuilder(this));
  public delete = vi.fn((table: unknown) => new DeleteBuilder(this, table));
  public transaction = vi.fn(
    async <T>(callback: (tx: MockDrizzleDatabase) => Promise<T>): Promise<T> => callback(this),
  );

  public query = {
    groups: {
      findFirst: vi.fn(async (_args: unknown) => this.__nextQueryGroup),
      findMany: vi.fn(async (_args?: unknown) => this.__nextQueryGroups ?? []),
    },
  };

  // Configuration knobs per test
  public __nextInsertReturningRows: unknown[] | undefined;
  public __nextInsertError: unknown;
  public __selectResults: unknown[][] = [];
  public __nextSelectError: unknown;
  public __failDeleteOf: unknown;
  public __nextQueryGroup: GroupRow | undefined;
  public __nextQueryGroups: GroupRow[] | undefined;
}

export const createMockDrizzleDatabase = (): MockDrizzleDatabase => new MockDrizzleDatabase();

export const asExecutor = (db: MockDrizzleDatabase): DrizzleExecutor => db as unknown as DrizzleExecutor;
