import type { Cache } from '../../src/shared/cache/cache';
import { CacheUnavailableError } from '../../src/shared/errors/infra-errors';

/**
 * Cache whose every call fails the way RedisCache does when Redis is down.
 */
export class FailingCache implements Cache {
  private fail(operation: string): Promise<never> {
    return Promise.reject(new CacheUnavailableError(operation));
  }

  get(): Promise<string | null> {
    return this.fail('get');
  }

  set(): Promise<void> {
    return this.fail('set');
  }

  del(): Promise<void> {
    return this.fail('del');
  }

  swap(): Promise<string | null> {
    return this.fail('swap');
  }

  incr(): Promise<number> {
    return this.fail('incr');
  }

  ttl(): Promise<number | null> {
    return this.fail('ttl');
  }
}
