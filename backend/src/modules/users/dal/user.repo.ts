/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from '../../../shared/db/schema';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Email must be unique (enforced by DB constraint); callers map the unique violation.
   */
  async insertUser(params: { email: string; passwordHash: string }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        email: params.email,
        password_hash: params.passwordHash,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async markEmailVerified(userId: string): Promise<boolean> {
    const res = await this.db
      .updateTable('users')
      .set({ email_verified: true, updated_at: new Date() })
      .where('id', '=', userId)
      .executeTakeFirst();

    return res.numUpdatedRows > 0n;
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<boolean> {
    const res = await this.db
      .updateTable('users')
      .set({ password_hash: passwordHash, updated_at: new Date() })
      .where('id', '=', userId)
      .executeTakeFirst();

    return res.numUpdatedRows > 0n;
  }
}
