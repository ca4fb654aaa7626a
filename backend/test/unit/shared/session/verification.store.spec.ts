import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { VerificationStore } from '../../../../src/shared/session/verification.store';

describe('VerificationStore', () => {
  it('swapCurrent returns the pointer it replaced', async () => {
    const store = new VerificationStore(new InMemCache());

    expect(await store.swapCurrent('principal-1', { nonce: 'n1', expiresAt: 1000 }, 60)).toBeNull();
    expect(await store.swapCurrent('principal-1', { nonce: 'n2', expiresAt: 2000 }, 60)).toEqual({
      nonce: 'n1',
      expiresAt: 1000,
    });
  });

  it('stores the pointer as JSON under verify:current:{principalId}', async () => {
    const cache = new InMemCache();
    const store = new VerificationStore(cache);

    await store.swapCurrent('principal-1', { nonce: 'n1', expiresAt: 1000 }, 60);

    expect(await cache.get('verify:current:principal-1')).toBe('{"nonce":"n1","expiresAt":1000}');
    expect(await cache.ttl('verify:current:principal-1')).toBe(60);
  });

  it('isCurrent matches only the latest nonce', async () => {
    const store = new VerificationStore(new InMemCache());
    await store.swapCurrent('principal-1', { nonce: 'n1', expiresAt: 1000 }, 60);
    await store.swapCurrent('principal-1', { nonce: 'n2', expiresAt: 2000 }, 60);

    expect(await store.isCurrent('principal-1', 'n2')).toBe(true);
    expect(await store.isCurrent('principal-1', 'n1')).toBe(false);
    expect(await store.isCurrent('principal-2', 'n2')).toBe(false);
  });

  it('reads a corrupted pointer as absent', async () => {
    const cache = new InMemCache();
    const store = new VerificationStore(cache);
    await cache.set('verify:current:principal-1', 'not-json');

    expect(await store.isCurrent('principal-1', 'n1')).toBe(false);
    expect(await store.swapCurrent('principal-1', { nonce: 'n1', expiresAt: 1000 }, 60)).toBeNull();
  });

  it('clear removes the pointer', async () => {
    const store = new VerificationStore(new InMemCache());
    await store.swapCurrent('principal-1', { nonce: 'n1', expiresAt: 1000 }, 60);

    await store.clear('principal-1');

    expect(await store.isCurrent('principal-1', 'n1')).toBe(false);
  });
});
