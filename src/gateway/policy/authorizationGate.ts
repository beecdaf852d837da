import { Identity } from '../../shared/types';

/** True when the identity holds at least one of `allowedRoles`. */
export function requireAnyRole(identity: Identity, allowedRoles: readonly string[]): boolean {
  return identity.roles.some((role) => allowedRoles.includes(role));
}

export function requireTenant(identity: Identity): boolean {
  return identity.tenantId.length > 0;
}
