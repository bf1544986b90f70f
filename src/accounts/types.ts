import type { Credential, StoredCredential } from "../auth/hashers.js";

/** Timestamps are epoch milliseconds. */
export interface Account {
  /** Internal subject; what tokens carry in `sub`. */
  id: string;
  username: string;
  /** Public login identity, lower-cased. */
  email: string;
  isActive: boolean;
  credential: StoredCredential;
  passwordChangedAt: number | null;
  passwordResetToken: string | null;
  passwordResetExpires: number | null;
  lastLoginAt: number | null;
  createdAt: number;
}

export interface NewAccount {
  username: string;
  email: string;
  credential: Credential;
  isActive?: boolean;
}
