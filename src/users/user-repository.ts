import type { Selectable } from 'kysely';

import type { Email } from '../domain/value-objects';
import type { Executor, PasswordResetTokensTable, UsersTable } from '../database/schema';
import type { PasswordResetToken, User } from './types';

function toUser(row: Selectable<UsersTable>): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  };
}

function toResetToken(row: Selectable<PasswordResetTokensTable>): PasswordResetToken {
  return {
    id: row.id,
    userId: row.user_id,
    token: row.token,
    expiresAt: row.expires_at,
    used: row.used === 1,
    createdAt: row.created_at,
  };
}

export class UserRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<User | null> {
    const row = await this.db.selectFrom('users').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async findByEmail(email: Email): Promise<User | null> {
    const row = await this.db.selectFrom('users').selectAll().where('email', '=', email.value).executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async existsByEmail(email: Email): Promise<boolean> {
    const row = await this.db.selectFrom('users').select('id').where('email', '=', email.value).executeTakeFirst();
    return row !== undefined;
  }

  async save(user: User): Promise<void> {
    await this.db
      .insertInto('users')
      .values({
        id: user.id,
        email: user.email,
        username: user.username,
        password_hash: user.passwordHash,
        is_active: user.isActive ? 1 : 0,
        created_at: user.createdAt,
      })
      .onConflict((oc) =>
        oc.column('id').doUpdateSet({
          username: user.username,
          password_hash: user.passwordHash,
          is_active: user.isActive ? 1 : 0,
        }),
      )
      .execute();
  }
}

export class PasswordResetTokenRepository {
  constructor(private readonly db: Executor) {}

  async findByToken(token: string): Promise<PasswordResetToken | null> {
    const row = await this.db
      .selectFrom('password_reset_tokens')
      .selectAll()
      .where('token', '=', token)
      .executeTakeFirst();
    return row ? toResetToken(row) : null;
  }

  async save(token: PasswordResetToken): Promise<void> {
    await this.db
      .insertInto('password_reset_tokens')
      .values({
        id: token.id,
        user_id: token.userId,
        token: token.token,
        expires_at: token.expiresAt,
        used: token.used ? 1 : 0,
        created_at: token.createdAt,
      })
      .onConflict((oc) => oc.column('id').doUpdateSet({ used: token.used ? 1 : 0 }))
      .execute();
  }
}
