/**
 * Users Repository
 *
 * Accounts with email/password credentials. `plan` mirrors the billing
 * state for display; entitlements are read from subscriptions.
 */

import { randomUUID } from 'crypto';
import { query } from './index';
import { NewUser, UserRecord } from '../auth/auth.interface';
import { Plan } from '../interfaces';
import { isPlan } from '../config/plans';
import { ConflictError } from '../errors/app-errors';
import { UserStore } from './stores';

/**
 * User record as stored in the database
 */
export interface DbUser {
  id: string;
  email: string;
  name: string | null;
  password_hash: string;
  plan: string;
  is_active: boolean;
  created_at: Date;
  last_login_at: Date | null;
}

const USER_COLUMNS = 'id, email, name, password_hash, plan, is_active, created_at, last_login_at';

export function toUserRecord(row: DbUser): UserRecord {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    passwordHash: row.password_hash,
    plan: isPlan(row.plan) ? row.plan : 'free',
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    lastLoginAt: row.last_login_at ? row.last_login_at.toISOString() : null,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

export async function create(input: NewUser): Promise<UserRecord> {
  try {
    const result = await query<DbUser>(
      `INSERT INTO users (id, email, name, password_hash)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [randomUUID(), input.email.toLowerCase(), input.name, input.passwordHash]
    );
    return toUserRecord(result.rows[0]);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError('Email is already registered');
    }
    throw err;
  }
}

export async function findById(id: string): Promise<UserRecord | null> {
  const result = await query<DbUser>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  return result.rows[0] ? toUserRecord(result.rows[0]) : null;
}

export async function findByEmail(email: string): Promise<UserRecord | null> {
  const result = await query<DbUser>(
    `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
    [email.toLowerCase()]
  );
  return result.rows[0] ? toUserRecord(result.rows[0]) : null;
}

export async function updatePlan(id: string, plan: Plan): Promise<void> {
  await query('UPDATE users SET plan = $2 WHERE id = $1', [id, plan]);
}

export async function touchLogin(id: string): Promise<void> {
  await query('UPDATE users SET last_login_at = NOW() WHERE id = $1', [id]);
}

export const postgresUserStore: UserStore = {
  create,
  findById,
  findByEmail,
  updatePlan,
  touchLogin,
};
