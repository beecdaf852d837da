import { z } from 'zod';
import { nowSeconds } from '../../shared/clock';
import { RefreshTokenRecord } from '../../shared/types';
import { KeyValueStore } from './keyValueStore';
import { parseStoredJson } from './records';

const storedRecordSchema = z.object({
  userId: z.string().min(1),
  expiresAt: z.number().int(),
  revoked: z.boolean(),
});

function refreshKey(token: string): string {
  return `refresh:${token}`;
}

function parseRecord(token: string, raw: string | null): RefreshTokenRecord | null {
  const stored = parseStoredJson(raw, storedRecordSchema);
  return stored ? { token, ...stored } : null;
}

export class RefreshTokenStore {
  constructor(private readonly store: KeyValueStore) {}

  async save(record: RefreshTokenRecord): Promise<void> {
    const ttl = Math.max(record.expiresAt - nowSeconds(), 1);
    await this.store.set(refreshKey(record.token), this.serialize(record), ttl);
  }

  /**
   * Removes the record and returns it. Concurrent callers presenting the
   * same token race on a single atomic take, so only one of them wins.
   */
  async consume(token: string): Promise<RefreshTokenRecord | null> {
    return parseRecord(token, await this.store.take(refreshKey(token)));
  }

  /** Flags a token revoked if it exists and belongs to `userId`. */
  async revoke(token: string, userId: string): Promise<boolean> {
    const record = parseRecord(token, await this.store.get(refreshKey(token)));
    if (!record || record.userId !== userId || record.revoked) return false;

    await this.save({ ...record, revoked: true });
    return true;
  }

  private serialize(record: RefreshTokenRecord): string {
    return JSON.stringify({
      userId: record.userId,
      expiresAt: record.expiresAt,
      revoked: record.revoked,
    });
  }
}
