import { describe, it, expect } from 'vitest';
import { AuthFailureError } from '../../../src/modules/auth/auth.errors';
import { getLoginVerifiedEmailFailure } from '../../../src/modules/auth/policies/login-verified-email.policy';

describe('getLoginVerifiedEmailFailure', () => {
  it('allows anyone when the gate is off', () => {
    expect(getLoginVerifiedEmailFailure({ requireVerifiedEmail: false, verified: false })).toBeNull();
  });

  it('allows verified principals when the gate is on', () => {
    expect(getLoginVerifiedEmailFailure({ requireVerifiedEmail: true, verified: true })).toBeNull();
  });

  it('rejects unverified principals with the uniform 401', () => {
    const failure = getLoginVerifiedEmailFailure({ requireVerifiedEmail: true, verified: false });

    expect(failure?.reason).toBe('email_not_verified');
    expect(failure?.error).toBeInstanceOf(AuthFailureError);
    expect(failure?.error.message).toBe('Authentication failed.');
  });
});
