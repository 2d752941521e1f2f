import type Redis from 'ioredis';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getNow } from '../../shared/clock';
import { ROLES, type NewUser, type User, type UserChanges, type UserQuery } from '../../shared/types';
import { execClaimed, storeCall } from './redis';

export interface UniqueViolation {
  field: 'username' | 'email';
}

export interface UserStore {
  create(data: NewUser): Promise<Result<User, UniqueViolation>>;
  getById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  list(query?: UserQuery): Promise<User[]>;
  update(id: string, changes: UserChanges): Promise<Result<User | null, UniqueViolation>>;
  delete(id: string): Promise<boolean>;
  deleteMany(ids: string[]): Promise<number>;
}

const normalize = (value: string): string => value.trim().toLowerCase();

export function applyUserQuery(users: User[], query: UserQuery = {}): User[] {
  let result = users;

  if (query.role) {
    const role = query.role;
    result = result.filter(u => u.role === role);
  }

  if (query.search) {
    const needle = normalize(query.search);
    result = result.filter(u =>
      [u.username, u.email, u.firstName, u.lastName].some(field => field.toLowerCase().includes(needle)),
    );
  }

  const ordering = query.ordering ?? '-date_joined';
  const descending = ordering.startsWith('-');
  const compare =
    ordering.endsWith('username')
      ? (a: User, b: User) => a.username.localeCompare(b.username)
      : (a: User, b: User) => a.createdAt - b.createdAt;

  return [...result].sort((a, b) => (descending ? compare(b, a) : compare(a, b)));
}

export class InMemoryUserStore implements UserStore {
  private users: Map<string, User> = new Map();

  async create(data: NewUser): Promise<Result<User, UniqueViolation>> {
    const conflict = this.findConflict(data.username, data.email);
    if (conflict) return err(conflict);

    const now = getNow().getTime();
    const user: User = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };
    this.users.set(user.id, user);
    return ok(user);
  }

  async getById(id: string): Promise<User | null> {
    return this.users.get(id) || null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const wanted = normalize(username);
    return [...this.users.values()].find(u => normalize(u.username) === wanted) || null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = normalize(email);
    return [...this.users.values()].find(u => normalize(u.email) === wanted) || null;
  }

  async list(query?: UserQuery): Promise<User[]> {
    return applyUserQuery([...this.users.values()], query);
  }

  async update(id: string, changes: UserChanges): Promise<Result<User | null, UniqueViolation>> {
    const existing = this.users.get(id);
    if (!existing) return ok(null);

    const conflict = this.findConflict(changes.username, changes.email, id);
    if (conflict) return err(conflict);

    const updated: User = { ...existing, ...changes, updatedAt: getNow().getTime() };
    this.users.set(id, updated);
    return ok(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.users.delete(id);
  }

  async deleteMany(ids: string[]): Promise<number> {
    let deleted = 0;
    for (const id of new Set(ids)) {
      if (this.users.delete(id)) deleted++;
    }
    return deleted;
  }

  reset(): void {
    this.users.clear();
  }

  private findConflict(username?: string, email?: string, exceptId?: string): UniqueViolation | null {
    for (const user of this.users.values()) {
      if (user.id === exceptId) continue;
      if (username !== undefined && normalize(user.username) === normalize(username)) {
        return { field: 'username' };
      }
      if (email !== undefined && normalize(user.email) === normalize(email)) {
        return { field: 'email' };
      }
    }
    return null;
  }
}

const storedUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  passwordHash: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  phone: z.string(),
  bio: z.string(),
  role: z.enum(ROLES),
  isActive: z.boolean(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const userKey = (id: string) => `user:${id}`;
const usernameKey = (username: string) => `user:username:${normalize(username)}`;
const emailKey = (email: string) => `user:email:${normalize(email)}`;
const USER_IDS = 'users';

/**
 * Users as JSON documents, with username and email claimed through SET NX
 * index keys so uniqueness holds across concurrent writers.
 */
export class RedisUserStore implements UserStore {
  constructor(private readonly client: Redis) {}

  async create(data: NewUser): Promise<Result<User, UniqueViolation>> {
    const now = getNow().getTime();
    const user: User = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };

    const conflict = await this.claimIdentifiers(user.id, data.username, data.email);
    if (conflict) return err(conflict);

    await execClaimed(
      'user create',
      () => this.client.multi().set(userKey(user.id), JSON.stringify(user)).sadd(USER_IDS, user.id).exec(),
      () => this.releaseIdentifiers(data.username, data.email),
    );
    return ok(user);
  }

  async getById(id: string): Promise<User | null> {
    const data = await storeCall('user lookup', () => this.client.get(userKey(id)));
    return data ? storedUserSchema.parse(JSON.parse(data)) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const id = await storeCall('user lookup', () => this.client.get(usernameKey(username)));
    return id ? this.getById(id) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = await storeCall('user lookup', () => this.client.get(emailKey(email)));
    return id ? this.getById(id) : null;
  }

  async list(query?: UserQuery): Promise<User[]> {
    const ids = await storeCall('user list', () => this.client.smembers(USER_IDS));
    if (ids.length === 0) return [];

    const docs = await storeCall('user list', () => this.client.mget(ids.map(userKey)));
    const users = docs
      .filter((doc): doc is string => doc !== null)
      .map(doc => storedUserSchema.parse(JSON.parse(doc)));
    return applyUserQuery(users, query);
  }

  async update(id: string, changes: UserChanges): Promise<Result<User | null, UniqueViolation>> {
    const existing = await this.getById(id);
    if (!existing) return ok(null);

    const newUsername =
      changes.username !== undefined && normalize(changes.username) !== normalize(existing.username)
        ? changes.username
        : undefined;
    const newEmail =
      changes.email !== undefined && normalize(changes.email) !== normalize(existing.email)
        ? changes.email
        : undefined;

    const conflict = await this.claimIdentifiers(id, newUsername, newEmail);
    if (conflict) return err(conflict);

    const updated: User = { ...existing, ...changes, updatedAt: getNow().getTime() };
    const tx = this.client.multi().set(userKey(id), JSON.stringify(updated));
    if (newUsername !== undefined) tx.del(usernameKey(existing.username));
    if (newEmail !== undefined) tx.del(emailKey(existing.email));
    await execClaimed('user update', () => tx.exec(), () => this.releaseIdentifiers(newUsername, newEmail));

    return ok(updated);
  }

  async delete(id: string): Promise<boolean> {
    const existing = await this.getById(id);
    if (!existing) return false;

    await storeCall('user delete', () =>
      this.client
        .multi()
        .del(userKey(id))
        .del(usernameKey(existing.username))
        .del(emailKey(existing.email))
        .srem(USER_IDS, id)
        .exec(),
    );
    return true;
  }

  async deleteMany(ids: string[]): Promise<number> {
    let deleted = 0;
    for (const id of new Set(ids)) {
      if (await this.delete(id)) deleted++;
    }
    return deleted;
  }

  private async claimIdentifiers(
    id: string,
    username: string | undefined,
    email: string | undefined,
  ): Promise<UniqueViolation | null> {
    if (username !== undefined) {
      const claimed = await storeCall('username claim', () =>
        this.client.set(usernameKey(username), id, 'NX'),
      );
      if (claimed !== 'OK') return { field: 'username' };
    }

    if (email !== undefined) {
      const claimed = await storeCall('email claim', () => this.client.set(emailKey(email), id, 'NX'));
      if (claimed !== 'OK') {
        await storeCall('username release', () => this.releaseIdentifiers(username, undefined));
        return { field: 'email' };
      }
    }

    return null;
  }

  private async releaseIdentifiers(username: string | undefined, email: string | undefined): Promise<number> {
    const keys = [
      ...(username !== undefined ? [usernameKey(username)] : []),
      ...(email !== undefined ? [emailKey(email)] : []),
    ];
    return keys.length > 0 ? this.client.del(...keys) : 0;
  }
}
