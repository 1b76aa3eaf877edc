import type { User } from '../../types/user.js';
import type { IUserStore } from '../interfaces/user-storage.js';
import { hashSecret, verifySecret } from '../../crypto/index.js';

interface StoredUser {
  user: User;
  passwordHash?: string;
}

/**
 * In-memory user store. Email and username lookups ignore case.
 */
export class MemoryUserStore implements IUserStore {
  private users = new Map<string, StoredUser>(); // `${tenantId}:${id}` -> user
  private emailIndex = new Map<string, string>(); // `${tenantId}:${email}` -> id
  private usernameIndex = new Map<string, string>(); // `${tenantId}:${username}` -> id

  async findById(tenantId: string, id: string): Promise<User | null> {
    return this.users.get(`${tenantId}:${id}`)?.user ?? null;
  }

  async findByEmail(tenantId: string, email: string): Promise<User | null> {
    const id = this.emailIndex.get(`${tenantId}:${email.toLowerCase()}`);
    if (!id) return null;
    return this.findById(tenantId, id);
  }

  async findByUsername(tenantId: string, username: string): Promise<User | null> {
    const id = this.usernameIndex.get(`${tenantId}:${username.toLowerCase()}`);
    if (!id) return null;
    return this.findById(tenantId, id);
  }

  async validateCredentials(tenantId: string, username: string, password: string): Promise<User | null> {
    const user = (await this.findByUsername(tenantId, username)) ?? (await this.findByEmail(tenantId, username));
    if (!user) return null;

    const stored = this.users.get(`${tenantId}:${user.id}`);
    if (!stored?.passwordHash) return null;

    const isValid = await verifySecret(password, stored.passwordHash);
    return isValid ? user : null;
  }

  async create(tenantId: string, user: User, password?: string): Promise<User> {
    const key = `${tenantId}:${user.id}`;
    if (this.users.has(key)) {
      throw new Error(`User already exists: ${user.id}`);
    }
    if (user.email && this.emailIndex.has(`${tenantId}:${user.email.toLowerCase()}`)) {
      throw new Error(`Email already registered: ${user.email}`);
    }
    if (user.username && this.usernameIndex.has(`${tenantId}:${user.username.toLowerCase()}`)) {
      throw new Error(`Username already taken: ${user.username}`);
    }

    const created: User = { ...user, tenantId };
    this.users.set(key, {
      user: created,
      passwordHash: password !== undefined ? await hashSecret(password) : undefined,
    });
    this.index(tenantId, created);

    return created;
  }

  async update(tenantId: string, id: string, changes: Partial<Omit<User, 'id' | 'tenantId'>>): Promise<User> {
    const key = `${tenantId}:${id}`;
    const stored = this.users.get(key);
    if (!stored) {
      throw new Error(`User not found: ${id}`);
    }

    this.unindex(tenantId, stored.user);
    const updated: User = { ...stored.user, ...changes };
    this.users.set(key, { ...stored, user: updated });
    this.index(tenantId, updated);

    return updated;
  }

  private index(tenantId: string, user: User): void {
    if (user.email) this.emailIndex.set(`${tenantId}:${user.email.toLowerCase()}`, user.id);
    if (user.username) this.usernameIndex.set(`${tenantId}:${user.username.toLowerCase()}`, user.id);
  }

  private unindex(tenantId: string, user: User): void {
    if (user.email) this.emailIndex.delete(`${tenantId}:${user.email.toLowerCase()}`);
    if (user.username) this.usernameIndex.delete(`${tenantId}:${user.username.toLowerCase()}`);
  }
}
