import { v4 as uuidv4 } from 'uuid';
import { nowSeconds } from '../../shared/clock';
import { Identity } from '../../shared/types';
import { RefreshTokenStore } from '../store/refreshTokenStore';
import { ClaimsCodec } from './claimsCodec';

export interface IssuedToken {
  token: string;
  expiresAt: number; // Unix timestamp (seconds)
}

export interface TokenPair {
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
}

function assertPositiveTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new RangeError(`Token TTL must be a positive whole number of seconds, got ${ttlSeconds}`);
  }
}

export class TokenIssuer {
  constructor(
    private readonly codec: ClaimsCodec,
    private readonly refreshTokens: RefreshTokenStore,
  ) {}

  async issueAccessToken(identity: Identity, ttlSeconds: number): Promise<IssuedToken> {
    assertPositiveTtl(ttlSeconds);
    const now = nowSeconds();
    const expiresAt = now + ttlSeconds;

    const token = await this.codec.encode({
      sub: identity.userId,
      email: identity.email,
      roles: identity.roles,
      tid: identity.tenantId,
      jti: uuidv4(),
      iat: now,
      nbf: now,
      exp: expiresAt,
    });

    return { token, expiresAt };
  }

  /** Opaque random token, persisted so it can be rotated exactly once. */
  async issueRefreshToken(userId: string, ttlSeconds: number): Promise<IssuedToken> {
    assertPositiveTtl(ttlSeconds);
    const token = uuidv4();
    const expiresAt = nowSeconds() + ttlSeconds;

    await this.refreshTokens.save({ token, userId, expiresAt, revoked: false });

    return { token, expiresAt };
  }

  async issueTokenPair(
    identity: Identity,
    accessTtlSeconds: number,
    refreshTtlSeconds: number,
  ): Promise<TokenPair> {
    const accessToken = await this.issueAccessToken(identity, accessTtlSeconds);
    const refreshToken = await this.issueRefreshToken(identity.userId, refreshTtlSeconds);
    return { accessToken, refreshToken };
  }
}
