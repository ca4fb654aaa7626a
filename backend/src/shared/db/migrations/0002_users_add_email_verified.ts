/**
 * src/shared/db/migrations/0002_users_add_email_verified.ts
 *
 * WHY:
 * - Email confirmation flips a per-principal flag; login may be gated on it
 *   (REQUIRE_VERIFIED_EMAIL).
 */

import { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .alterTable('users')
    .addColumn('email_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.alterTable('users').dropColumn('email_verified').execute();
}
