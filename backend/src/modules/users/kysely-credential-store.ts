/**
 * backend/src/modules/users/kysely-credential-store.ts
 *
 * WHY:
 * - Production CredentialStore over Postgres (Kysely + pg).
 * - Every call is bounded by STORE_TIMEOUT_MS; a slow or unreachable database
 *   surfaces as StoreUnavailableError (503), never as a hung request.
 *
 * RULES:
 * - Unique violation on users.email (pg code 23505) -> DuplicateEmailError.
 * - Any other failure -> StoreUnavailableError with the original as cause.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { UserRow } from '../../shared/db/schema';
import { withTimeout } from '../../shared/async/with-timeout';
import { StoreUnavailableError } from '../../shared/errors/infra-errors';
import { DuplicateEmailError, type CredentialStore } from './credential-store';
import { selectUserByEmailSql, selectUserByIdSql } from './dal/user.query-sql';
import { UserRepo } from './dal/user.repo';
import type { NewPrincipal, Principal } from './user.types';

const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === PG_UNIQUE_VIOLATION
  );
}

function toPrincipal(row: UserRow): Principal {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    verified: row.email_verified,
    createdAt: row.created_at,
  };
}

export class KyselyCredentialStore implements CredentialStore {
  private readonly repo: UserRepo;

  constructor(
    private readonly db: DbExecutor,
    private readonly opts: { timeoutMs: number },
  ) {
    this.repo = new UserRepo(db);
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(work(), this.opts.timeoutMs, `store.${operation}`);
    } catch (err) {
      if (err instanceof DuplicateEmailError) throw err;
      throw new StoreUnavailableError(operation, { cause: err });
    }
  }

  async findByEmail(email: string): Promise<Principal | null> {
    const row = await this.run('find_by_email', () => selectUserByEmailSql(this.db, email));
    return row ? toPrincipal(row) : null;
  }

  async findById(id: string): Promise<Principal | null> {
    const row = await this.run('find_by_id', () => selectUserByIdSql(this.db, id));
    return row ? toPrincipal(row) : null;
  }

  async save(principal: NewPrincipal): Promise<Principal> {
    const row = await this.run('save', async () => {
      try {
        return await this.repo.insertUser(principal);
      } catch (err) {
        if (isUniqueViolation(err)) throw new DuplicateEmailError();
        throw err;
      }
    });
    return toPrincipal(row);
  }

  async setVerified(id: string): Promise<boolean> {
    return this.run('set_verified', () => this.repo.markEmailVerified(id));
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<boolean> {
    return this.run('update_password_hash', () => this.repo.updatePasswordHash(id, passwordHash));
  }
}
