/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a TypeScript description of the tables it queries.
 * - There is a single table, so the interface is declared by hand next to the
 *   migrations that create it. Keep both in sync.
 */

import type { ColumnType, Generated, Selectable } from 'kysely';

export interface UsersTable {
  id: Generated<string>;
  email: string;
  password_hash: string;
  email_verified: Generated<boolean>;
  created_at: ColumnType<Date, never, never>;
  updated_at: ColumnType<Date, never, Date>;
}

export type UserRow = Selectable<UsersTable>;

export interface DB {
  users: UsersTable;
}
