import express, { Request } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { GatewaySettings } from '../shared/config';
import { GatewayError, StoreUnavailableError } from '../shared/errors';
import { Identity } from '../shared/types';
import { Gateway, createGateway } from '../gateway/index';
import { apiKeyStorageKey } from '../gateway/store/apiKeyStore';
import { InMemoryKeyValueStore, KeyValueStore } from '../gateway/store/keyValueStore';
import { AccessTokenClaims, ClaimsCodec } from '../gateway/tokens/claimsCodec';

export const TEST_SECRET = 'test-secret-signing-key';
export const TEST_NOW = new Date('2026-01-15T12:00:00.000Z');
export const TEST_NOW_SECONDS = 1768478400;

export const TEST_SETTINGS: Partial<GatewaySettings> = {
  jwtSecret: TEST_SECRET,
  accessTokenTtlSeconds: 900,
  refreshTokenTtlSeconds: 86400,
  clockToleranceSeconds: 0,
  apiKeyHeader: 'x-api-key',
  storeFailurePolicy: 'closed',
  rateLimitMax: 100,
  rateLimitWindowSeconds: 60,
  rateLimitKey: 'identity',
  registrationRoles: ['user'],
  bcryptRounds: 4,
};

export const ALICE: Identity = {
  userId: 'user-alice',
  email: 'alice@example.com',
  roles: ['user'],
  tenantId: 'tenant-1',
};

export function claimsFor(identity: Identity, overrides: Partial<AccessTokenClaims> = {}): AccessTokenClaims {
  return {
    sub: identity.userId,
    email: identity.email,
    roles: identity.roles,
    tid: identity.tenantId,
    jti: uuidv4(),
    iat: TEST_NOW_SECONDS,
    nbf: TEST_NOW_SECONDS,
    exp: TEST_NOW_SECONDS + 900,
    ...overrides,
  };
}

export async function createTokenWithWrongSecret(identity: Identity = ALICE): Promise<string> {
  return new ClaimsCodec('wrong-secret-signing-key').encode(claimsFor(identity));
}

export function createAlgNoneToken(identity: Identity = ALICE): string {
  const header = { alg: 'none', typ: 'JWT' };
  const payload = { ...claimsFor(identity), roles: ['admin'] };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}

/** Re-encodes the payload segment while keeping the original signature. */
export function withForgedPayload(token: string, changes: Record<string, unknown>): string {
  const [header, payload, signature] = token.split('.');
  const claims = z.record(z.unknown()).parse(JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')));
  const forged = Buffer.from(JSON.stringify({ ...claims, ...changes })).toString('base64url');
  return `${header}.${forged}.${signature}`;
}

export interface SeededApiKey {
  userId: string;
  email: string;
  tenantId?: string;
  roles?: string[];
  expiresAt?: string;
}

export async function seedApiKey(store: KeyValueStore, key: string, record: SeededApiKey): Promise<void> {
  await store.set(apiKeyStorageKey(key), JSON.stringify(record));
}

/**
 * Delegates to an in-memory store until `failing` is set, after which every
 * call fails the way a Redis outage would.
 */
export class OutageStore implements KeyValueStore {
  failing = false;

  constructor(private readonly inner: KeyValueStore = new InMemoryKeyValueStore()) {}

  async connect(): Promise<void> {
    return this.inner.connect();
  }

  async disconnect(): Promise<void> {
    return this.inner.disconnect();
  }

  async exists(key: string): Promise<boolean> {
    this.assertAvailable('exists');
    return this.inner.exists(key);
  }

  async get(key: string): Promise<string | null> {
    this.assertAvailable('get');
    return this.inner.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.assertAvailable('set');
    return this.inner.set(key, value, ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    this.assertAvailable('setIfAbsent');
    return this.inner.setIfAbsent(key, value, ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    this.assertAvailable('delete');
    return this.inner.delete(key);
  }

  async take(key: string): Promise<string | null> {
    this.assertAvailable('take');
    return this.inner.take(key);
  }

  async incrementWithExpiry(key: string, windowSeconds: number): Promise<number> {
    this.assertAvailable('incrementWithExpiry');
    return this.inner.incrementWithExpiry(key, windowSeconds);
  }

  private assertAvailable(operation: string): void {
    if (this.failing) {
      throw new StoreUnavailableError(operation, new Error('connect ECONNREFUSED 127.0.0.1:6379'));
    }
  }
}

export function buildGateway(
  overrides: Partial<GatewaySettings> = {},
  store: KeyValueStore = new InMemoryKeyValueStore(),
): Gateway {
  return createGateway({ store, settings: { ...TEST_SETTINGS, ...overrides } });
}

/** Minimal Express request carrying only the given headers. */
export function requestWithHeaders(headers: Record<string, string>): Request {
  const req: Request = Object.create(express.request);
  req.headers = headers;
  req.method = 'GET';
  req.url = '/api/v1/whoami';
  return req;
}

export async function captureError(promise: Promise<unknown>): Promise<GatewayError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GatewayError) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject with a GatewayError');
}
