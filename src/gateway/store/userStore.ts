import { z } from 'zod';
import { UserRecord } from '../../shared/types';
import { KeyValueStore } from './keyValueStore';
import { parseStoredJson } from './records';

const userRecordSchema = z.object({
  id: z.string().min(1),
  email: z.string(),
  name: z.string(),
  passwordHash: z.string(),
  roles: z.array(z.string()),
  tenantId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class UserStore {
  constructor(private readonly store: KeyValueStore) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    return parseStoredJson(await this.store.get(`user:email:${normalizeEmail(email)}`), userRecordSchema);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const email = await this.store.get(`user:id:${id}`);
    if (email === null) return null;
    return this.findByEmail(email);
  }

  /** Returns false when a user with the same email already exists. */
  async create(user: UserRecord): Promise<boolean> {
    const email = normalizeEmail(user.email);
    const created = await this.store.setIfAbsent(
      `user:email:${email}`,
      JSON.stringify({ ...user, email }),
    );
    if (!created) return false;

    await this.store.set(`user:id:${user.id}`, email);
    return true;
  }
}
