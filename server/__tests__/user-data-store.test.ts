import { describe, it, expect, beforeEach, vi } from 'vitest';
import { users, userData } from '@shared/schema';
import { MemUserDataStore, PostgresUserDataStore } from '../user-data-store';
import type { TaskTrackerDb } from '../storage';

/**
 * Mock of the drizzle query builder chain used by PostgresUserDataStore.
 * select().from().where().limit() resolves to `selectResult`;
 * insert().values().onConflictDoUpdate() resolves to undefined.
 */
function createMockDb(selectResult: unknown[]) {
  const chain = {
    from: vi.fn(),
    where: vi.fn(),
    limit: vi.fn(),
    values: vi.fn(),
    onConflictDoUpdate: vi.fn(),
  };
  chain.from.mockReturnValue(chain);
  chain.where.mockReturnValue(chain);
  chain.values.mockReturnValue(chain);
  chain.limit.mockResolvedValue(selectResult);
  chain.onConflictDoUpdate.mockResolvedValue(undefined);

  const db = {
    select: vi.fn(() => chain),
    insert: vi.fn(() => chain),
  };
  return { db, chain };
}

function storeFor(db: ReturnType<typeof createMockDb>['db']): PostgresUserDataStore {
  return new PostgresUserDataStore(db as unknown as TaskTrackerDb);
}

describe('PostgresUserDataStore', () => {
  it('looks a user up by email', async () => {
    const { db, chain } = createMockDb([{ id: 'user-1' }]);

    await expect(storeFor(db).findUserIdByEmail('demo@example.com')).resolves.toBe('user-1');
    expect(db.select).toHaveBeenCalledWith({ id: users.id });
    expect(chain.from).toHaveBeenCalledWith(users);
    expect(chain.where).toHaveBeenCalledTimes(1);
    expect(chain.limit).toHaveBeenCalledWith(1);
  });

  it('returns undefined for an unknown email', async () => {
    const { db } = createMockDb([]);
    await expect(storeFor(db).findUserIdByEmail('nobody@example.com')).resolves.toBeUndefined();
  });

  it('parses the stored task document', async () => {
    const { db, chain } = createMockDb([
      { tasksJson: '{"tasks":[{"id":"t1","name":"deep work","sessions":[{"start":1,"end":2}]}]}' },
    ]);

    await expect(storeFor(db).getUserData('user-1')).resolves.toEqual({
      tasks: [{ id: 't1', name: 'deep work', sessions: [{ start: 1, end: 2 }] }],
    });
    expect(db.select).toHaveBeenCalledWith({ tasksJson: userData.tasksJson });
    expect(chain.from).toHaveBeenCalledWith(userData);
  });

  it('returns undefined when the user has no document', async () => {
    const { db } = createMockDb([]);
    await expect(storeFor(db).getUserData('user-1')).resolves.toBeUndefined();
  });

  it('upserts the serialized document on user_id', async () => {
    const { db, chain } = createMockDb([]);
    const data = { tasks: [{ id: 't1', name: 'planning', sessions: [] }] };
    const tasksJson = '{"tasks":[{"id":"t1","name":"planning","sessions":[]}]}';

    await storeFor(db).saveUserData('user-1', data);

    expect(db.insert).toHaveBeenCalledWith(userData);
    expect(chain.values).toHaveBeenCalledWith({ userId: 'user-1', tasksJson });
    expect(chain.onConflictDoUpdate).toHaveBeenCalledWith({
      target: userData.userId,
      set: { tasksJson },
    });
  });

  it('propagates database errors', async () => {
    const { db, chain } = createMockDb([]);
    chain.limit.mockRejectedValue(new Error('connection refused'));

    await expect(storeFor(db).findUserIdByEmail('demo@example.com')).rejects.toThrow(
      'connection refused'
    );
  });
});

describe('MemUserDataStore', () => {
  let store: MemUserDataStore;

  beforeEach(() => {
    store = new MemUserDataStore();
  });

  it('should return undefined for an unknown email', async () => {
    await expect(store.findUserIdByEmail('nobody@example.com')).resolves.toBeUndefined();
  });

  it('should find an added user', async () => {
    store.addUser('user-1', 'demo@example.com');
    await expect(store.findUserIdByEmail('demo@example.com')).resolves.toBe('user-1');
  });

  it('should round-trip a saved document without sharing references', async () => {
    const data = { tasks: [{ id: 't1', name: 'meetings', sessions: [{ start: 5, end: 9 }] }] };

    await store.saveUserData('user-1', data);
    data.tasks[0].sessions.push({ start: 10, end: 11 });

    await expect(store.getUserData('user-1')).resolves.toEqual({
      tasks: [{ id: 't1', name: 'meetings', sessions: [{ start: 5, end: 9 }] }],
    });
    expect(store.getRawDocument('user-1')).toBe(
      '{"tasks":[{"id":"t1","name":"meetings","sessions":[{"start":5,"end":9}]}]}'
    );
  });

  it('should return undefined when no document was saved', async () => {
    await expect(store.getUserData('user-1')).resolves.toBeUndefined();
  });
});
