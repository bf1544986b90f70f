import { sql } from "drizzle-orm";
import { bigint, boolean, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";

export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    username: text("username").notNull(),
    /** Stored lower-cased; this is the login identity. */
    email: text("email").notNull(),
    isActive: boolean("is_active").notNull().default(true),
    credentialAlgorithm: text("credential_algorithm").notNull(),
    credentialSalt: text("credential_salt").notNull(),
    credentialDigest: text("credential_digest").notNull(),
    passwordChangedAt: bigint("password_changed_at", { mode: "number" }),
    passwordResetToken: text("password_reset_token"),
    passwordResetExpires: bigint("password_reset_expires", { mode: "number" }),
    lastLoginAt: bigint("last_login_at", { mode: "number" }),
    createdAt: bigint("created_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
  },
  (table) => [
    uniqueIndex("idx_accounts_email").on(table.email),
    uniqueIndex("idx_accounts_username").on(table.username),
  ],
);
