import { requireAnyRole, requireTenant } from '../gateway/policy/authorizationGate';
import { Identity } from '../shared/types';
import { ALICE } from './helpers';

const noTenant: Identity = { ...ALICE, tenantId: '' };

describe('AuthorizationGate', () => {
  test('requireAnyRole passes when one role matches', () => {
    expect(requireAnyRole({ ...ALICE, roles: ['user', 'billing'] }, ['admin', 'billing'])).toBe(true);
  });

  test('requireAnyRole fails without an overlapping role', () => {
    expect(requireAnyRole(ALICE, ['admin'])).toBe(false);
  });

  test('allowed roles are combined with OR', () => {
    expect(requireAnyRole(ALICE, ['user', 'admin'])).toBe(true);
  });

  test('requireAnyRole fails for an identity with no roles', () => {
    expect(requireAnyRole({ ...ALICE, roles: [] }, ['user'])).toBe(false);
  });

  test('requireTenant needs a non-empty tenant id', () => {
    expect(requireTenant(ALICE)).toBe(true);
    expect(requireTenant(noTenant)).toBe(false);
  });
});
