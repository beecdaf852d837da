import { nowSeconds } from '../../shared/clock';
import { KeyValueStore } from './keyValueStore';

const REVOKED_MARKER = 'revoked';

function revocationKey(token: string): string {
  return `blacklist:token:${token}`;
}

/**
 * Blacklist of access tokens invalidated before their natural expiry.
 * Entries live as long as a validator would still accept the token, which
 * includes the clock tolerance past `exp`.
 */
export class RevocationList {
  constructor(
    private readonly store: KeyValueStore,
    private readonly clockToleranceSeconds: number = 0,
  ) {}

  async revoke(token: string, expiresAt: number): Promise<void> {
    const remainingSeconds = expiresAt + this.clockToleranceSeconds - nowSeconds();
    if (remainingSeconds <= 0) return; // already expired, nothing to block
    await this.store.set(revocationKey(token), REVOKED_MARKER, remainingSeconds);
  }

  async isRevoked(token: string): Promise<boolean> {
    return this.store.exists(revocationKey(token));
  }
}
