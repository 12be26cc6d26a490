/**
 * User Data Store
 *
 * The two reads and one write a seed run needs, behind an interface so the
 * run can be exercised against memory in tests.
 */

import { eq } from 'drizzle-orm';
import { users, userData } from '@shared/schema';
import { parseUserData, serializeUserData, type UserData } from '@shared/task-types';
import { openDatabase, type TaskTrackerDb } from './storage';

export interface IUserDataStore {
  findUserIdByEmail(email: string): Promise<string | undefined>;
  /** The user's task document, or undefined when no row exists yet. */
  getUserData(userId: string): Promise<UserData | undefined>;
  /** Insert or replace the user's task document. */
  saveUserData(userId: string, data: UserData): Promise<void>;
}

export interface UserDataStoreConnection {
  store: IUserDataStore;
  close(): Promise<void>;
}

export function connectUserDataStore(connectionString: string): UserDataStoreConnection {
  const database = openDatabase(connectionString);
  return {
    store: new PostgresUserDataStore(database.db),
    close: () => database.close(),
  };
}

export class PostgresUserDataStore implements IUserDataStore {
  constructor(private readonly db: TaskTrackerDb) {}

  async findUserIdByEmail(email: string): Promise<string | undefined> {
    const rows = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.email, email))
      .limit(1);
    return rows[0]?.id;
  }

  async getUserData(userId: string): Promise<UserData | undefined> {
    const rows = await this.db
      .select({ tasksJson: userData.tasksJson })
      .from(userData)
      .where(eq(userData.userId, userId))
      .limit(1);
    const row = rows[0];
    return row ? parseUserData(row.tasksJson) : undefined;
  }

  async saveUserData(userId: string, data: UserData): Promise<void> {
    const tasksJson = serializeUserData(data);
    await this.db
      .insert(userData)
      .values({ userId, tasksJson })
      .onConflictDoUpdate({
        target: userData.userId,
        set: { tasksJson },
      });
  }
}

/**
 * In-memory store. Documents are kept serialized so callers never share
 * object references with the store, same as with the database.
 */
export class MemUserDataStore implements IUserDataStore {
  private usersByEmail: Map<string, string>;
  private documents: Map<string, string>;

  constructor() {
    this.usersByEmail = new Map();
    this.documents = new Map();
  }

  addUser(id: string, email: string): void {
    this.usersByEmail.set(email, id);
  }

  async findUserIdByEmail(email: string): Promise<string | undefined> {
    return this.usersByEmail.get(email);
  }

  async getUserData(userId: string): Promise<UserData | undefined> {
    const json = this.documents.get(userId);
    return json === undefined ? undefined : parseUserData(json);
  }

  async saveUserData(userId: string, data: UserData): Promise<void> {
    this.documents.set(userId, serializeUserData(data));
  }

  /** Store raw text as if it came from the tasks_json column. */
  setRawDocument(userId: string, json: string): void {
    this.documents.set(userId, json);
  }

  getRawDocument(userId: string): string | undefined {
    return this.documents.get(userId);
  }
}
