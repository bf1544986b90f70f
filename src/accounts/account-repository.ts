import crypto from "node:crypto";
import { AccountExistsError } from "../auth/errors.js";
import type { Credential } from "../auth/hashers.js";
import type { Account, NewAccount } from "./types.js";

/** Account lookup and persistence used by the authentication flow. */
export interface IAccountRepository {
  /** Case-insensitive on email. */
  findByEmail(email: string): Promise<Account | null>;
  findByUsername(username: string): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  /** Throws {@link AccountExistsError} when the email or username is taken. */
  create(input: NewAccount): Promise<Account>;
  /**
   * Replace the stored credential. Also stamps `passwordChangedAt` and
   * clears any pending password-reset token. Returns false if no such account.
   */
  setCredential(id: string, credential: Credential): Promise<boolean>;
  /** Stamp `lastLoginAt`. */
  recordLogin(id: string, at?: number): Promise<void>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Map-backed repository for tests and single-process development. */
export class InMemoryAccountRepository implements IAccountRepository {
  private readonly accounts = new Map<string, Account>();

  async findByEmail(email: string): Promise<Account | null> {
    const wanted = normalizeEmail(email);
    for (const account of this.accounts.values()) {
      if (account.email === wanted) return { ...account };
    }
    return null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    for (const account of this.accounts.values()) {
      if (account.username === username) return { ...account };
    }
    return null;
  }

  async findById(id: string): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async create(input: NewAccount): Promise<Account> {
    if (await this.findByEmail(input.email)) throw new AccountExistsError("email");
    if (await this.findByUsername(input.username)) throw new AccountExistsError("username");

    const account: Account = {
      id: crypto.randomUUID(),
      username: input.username,
      email: normalizeEmail(input.email),
      isActive: input.isActive ?? true,
      credential: { ...input.credential },
      passwordChangedAt: null,
      passwordResetToken: null,
      passwordResetExpires: null,
      lastLoginAt: null,
      createdAt: Date.now(),
    };
    this.accounts.set(account.id, account);
    return { ...account };
  }

  async setCredential(id: string, credential: Credential): Promise<boolean> {
    const account = this.accounts.get(id);
    if (!account) return false;
    account.credential = { ...credential };
    account.passwordChangedAt = Date.now();
    account.passwordResetToken = null;
    account.passwordResetExpires = null;
    return true;
  }

  async recordLogin(id: string, at = Date.now()): Promise<void> {
    const account = this.accounts.get(id);
    if (account) account.lastLoginAt = at;
  }

  /** Test hook: overwrite fields on a stored account. */
  update(id: string, patch: Partial<Omit<Account, "id">>): void {
    const account = this.accounts.get(id);
    if (!account) throw new Error(`Account not found: ${id}`);
    Object.assign(account, patch);
  }
}
