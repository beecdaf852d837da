import { z } from 'zod';
import { getNow } from '../../shared/clock';
import { GatewayError } from '../../shared/errors';
import { ApiKeyRecord, Identity, normalizeRoles } from '../../shared/types';
import { KeyValueStore } from './keyValueStore';
import { parseStoredJson } from './records';

// API keys are provisioned outside the gateway as JSON under `apikey:<key>`
const apiKeyRecordSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  tenantId: z.string().default(''),
  roles: z.array(z.string()).default([]),
  expiresAt: z.string().datetime({ offset: true }).optional(),
});

export function apiKeyStorageKey(apiKey: string): string {
  return `apikey:${apiKey}`;
}

export class ApiKeyStore {
  constructor(private readonly store: KeyValueStore) {}

  async find(apiKey: string): Promise<ApiKeyRecord | null> {
    const stored = parseStoredJson(await this.store.get(apiKeyStorageKey(apiKey)), apiKeyRecordSchema);
    return stored ? { key: apiKey, ...stored } : null;
  }

  async resolve(apiKey: string): Promise<Identity> {
    const record = await this.find(apiKey);
    if (!record) {
      throw new GatewayError('INVALID_CREDENTIAL', 'Invalid API key');
    }

    if (record.expiresAt !== undefined && getNow().getTime() > Date.parse(record.expiresAt)) {
      throw new GatewayError('EXPIRED', 'API key expired');
    }

    return {
      userId: record.userId,
      email: record.email,
      roles: normalizeRoles(record.roles),
      tenantId: record.tenantId,
    };
  }
}
