import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('hashes with the configured cost and verifies the same password', async () => {
    const hash = await hasher.hash('correct-horse-battery');

    expect(hash).toMatch(/^\$2[aby]\$04\$/);
    expect(await hasher.verify('correct-horse-battery', hash)).toBe(true);
    expect(await hasher.verify('wrong-password', hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const a = await hasher.hash('correct-horse-battery');
    const b = await hasher.hash('correct-horse-battery');

    expect(a).not.toBe(b);
  });

  it('treats a malformed stored hash as no match', async () => {
    expect(await hasher.verify('correct-horse-battery', 'not-a-bcrypt-hash')).toBe(false);
    expect(await hasher.verify('correct-horse-battery', '')).toBe(false);
  });
});
