import { nowSeconds } from '../../shared/clock';
import { GatewayError } from '../../shared/errors';
import { Identity, normalizeRoles } from '../../shared/types';
import { RevocationList } from '../store/revocationList';
import { AccessTokenClaims, ClaimsCodec } from './claimsCodec';

export interface VerifiedToken {
  identity: Identity;
  claims: AccessTokenClaims;
}

export function identityFromClaims(claims: AccessTokenClaims): Identity {
  return {
    userId: claims.sub,
    email: claims.email,
    roles: normalizeRoles(claims.roles),
    tenantId: claims.tid,
  };
}

export class TokenValidator {
  constructor(
    private readonly codec: ClaimsCodec,
    private readonly revocations: RevocationList,
    private readonly clockToleranceSeconds: number = 0,
  ) {}

  /** Signature and time checks only; touches no store. */
  async verify(token: string): Promise<VerifiedToken> {
    const claims = await this.codec.decode(token);
    const now = nowSeconds();

    if (now >= claims.exp + this.clockToleranceSeconds) {
      throw new GatewayError('EXPIRED', 'Token expired');
    }
    if (now + this.clockToleranceSeconds < claims.nbf) {
      throw new GatewayError('NOT_YET_VALID', 'Token not yet valid');
    }

    return { identity: identityFromClaims(claims), claims };
  }

  async isRevoked(token: string): Promise<boolean> {
    return this.revocations.isRevoked(token);
  }

  async validate(token: string): Promise<Identity> {
    const { identity } = await this.verify(token);
    if (await this.isRevoked(token)) {
      throw new GatewayError('REVOKED', 'Token has been revoked');
    }
    return identity;
  }
}
