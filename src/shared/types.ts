export interface Identity {
  userId: string;
  email: string;
  roles: string[]; // ordered, no duplicates
  tenantId: string; // empty when the identity belongs to no tenant
}

export type CredentialScheme = 'bearer' | 'apiKey';

// Credential as extracted from the request, resolved once per request
export type PresentedCredential =
  | { scheme: 'bearer'; token: string }
  | { scheme: 'apiKey'; key: string };

// Credential after resolution; bearer keeps what logout needs to revoke it
export type ResolvedCredential =
  | { scheme: 'bearer'; token: string; expiresAt: number }
  | { scheme: 'apiKey' };

export interface AuthContext {
  identity: Identity;
  credential: ResolvedCredential;
}

export interface RefreshTokenRecord {
  token: string;
  userId: string;
  expiresAt: number; // Unix timestamp (seconds)
  revoked: boolean;
}

export interface ApiKeyRecord {
  key: string;
  userId: string;
  email: string;
  tenantId: string;
  roles: string[];
  expiresAt?: string; // ISO-8601
}

export interface UserRecord {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  roles: string[];
  tenantId: string;
  createdAt: string;
  updatedAt: string;
}

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number; // Unix timestamp (seconds)
}

/** Builds the duplicate-free, order-preserving role list an Identity carries. */
export function normalizeRoles(roles: readonly string[]): string[] {
  return Array.from(new Set(roles.filter((role) => role.length > 0)));
}
