import { sql } from "drizzle-orm";
import type { DrizzleDb } from "./index.js";

// Kept in step with ./schema/*.ts.
const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS accounts (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    email TEXT NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    credential_algorithm TEXT NOT NULL,
    credential_salt TEXT NOT NULL,
    credential_digest TEXT NOT NULL,
    password_changed_at BIGINT,
    password_reset_token TEXT,
    password_reset_expires BIGINT,
    last_login_at BIGINT,
    created_at BIGINT NOT NULL DEFAULT (extract(epoch from now()) * 1000)::bigint
  )`,
  "CREATE UNIQUE INDEX IF NOT EXISTS idx_accounts_email ON accounts (email)",
  "CREATE UNIQUE INDEX IF NOT EXISTS idx_accounts_username ON accounts (username)",
  `CREATE TABLE IF NOT EXISTS audit_log (
    id TEXT PRIMARY KEY,
    timestamp BIGINT NOT NULL,
    user_id TEXT NOT NULL,
    action TEXT NOT NULL,
    resource_type TEXT NOT NULL,
    resource_id TEXT,
    description TEXT,
    ip_address TEXT,
    user_agent TEXT
  )`,
  "CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log (timestamp)",
  "CREATE INDEX IF NOT EXISTS idx_audit_user_id ON audit_log (user_id)",
  "CREATE INDEX IF NOT EXISTS idx_audit_action ON audit_log (action)",
  "CREATE INDEX IF NOT EXISTS idx_audit_resource ON audit_log (resource_type, resource_id)",
];

/** Create the tables and indexes this service owns. Idempotent. */
export async function initSchema(db: DrizzleDb): Promise<void> {
  for (const statement of STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}
