import crypto from "node:crypto";
import { eq } from "drizzle-orm";
import { AccountExistsError } from "../auth/errors.js";
import type { Credential } from "../auth/hashers.js";
import type { DrizzleDb } from "../db/index.js";
import { isUniqueViolation } from "../db/errors.js";
import { accounts } from "../db/schema/index.js";
import { type IAccountRepository, normalizeEmail } from "./account-repository.js";
import type { Account, NewAccount } from "./types.js";

function toAccount(row: typeof accounts.$inferSelect): Account {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isActive: row.isActive,
    credential: {
      algorithm: row.credentialAlgorithm,
      salt: row.credentialSalt,
      digest: row.credentialDigest,
    },
    passwordChangedAt: row.passwordChangedAt,
    passwordResetToken: row.passwordResetToken,
    passwordResetExpires: row.passwordResetExpires,
    lastLoginAt: row.lastLoginAt,
    createdAt: row.createdAt,
  };
}

export class DrizzleAccountRepository implements IAccountRepository {
  constructor(private readonly db: DrizzleDb) {}

  async findByEmail(email: string): Promise<Account | null> {
    const rows = await this.db.select().from(accounts).where(eq(accounts.email, normalizeEmail(email)));
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    const rows = await this.db.select().from(accounts).where(eq(accounts.username, username));
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async findById(id: string): Promise<Account | null> {
    const rows = await this.db.select().from(accounts).where(eq(accounts.id, id));
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async create(input: NewAccount): Promise<Account> {
    const email = normalizeEmail(input.email);
    try {
      const rows = await this.db
        .insert(accounts)
        .values({
          id: crypto.randomUUID(),
          username: input.username,
          email,
          isActive: input.isActive ?? true,
          credentialAlgorithm: input.credential.algorithm,
          credentialSalt: input.credential.salt,
          credentialDigest: input.credential.digest,
          createdAt: Date.now(),
        })
        .returning();
      const row = rows[0];
      if (!row) throw new Error("Account insert returned no row");
      return toAccount(row);
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      // Lost a race with a concurrent registration; report which field collided.
      const emailTaken = (await this.findByEmail(email)) !== null;
      throw new AccountExistsError(emailTaken ? "email" : "username");
    }
  }

  async setCredential(id: string, credential: Credential): Promise<boolean> {
    const rows = await this.db
      .update(accounts)
      .set({
        credentialAlgorithm: credential.algorithm,
        credentialSalt: credential.salt,
        credentialDigest: credential.digest,
        passwordChangedAt: Date.now(),
        passwordResetToken: null,
        passwordResetExpires: null,
      })
      .where(eq(accounts.id, id))
      .returning({ id: accounts.id });
    return rows.length > 0;
  }

  async recordLogin(id: string, at = Date.now()): Promise<void> {
    await this.db.update(accounts).set({ lastLoginAt: at }).where(eq(accounts.id, id));
  }
}
