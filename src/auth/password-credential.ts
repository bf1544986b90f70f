import { logger } from "../config/logger.js";
import { WeakPasswordError } from "./errors.js";
import {
  BcryptHasher,
  type Credential,
  type CredentialHasher,
  MalformedCredentialError,
  Pbkdf2Hasher,
  type StoredCredential,
} from "./hashers.js";
import { passwordPolicyViolation } from "./password-policy.js";

/**
 * Sets and verifies password credentials.
 *
 * New credentials always use the primary hasher chosen at startup. Existing
 * credentials are verified by whichever registered hasher matches their
 * algorithm tag, so switching the primary does not strand stored passwords.
 */
export class PasswordCredential {
  private readonly hashers = new Map<string, CredentialHasher>();

  constructor(
    private readonly primary: CredentialHasher,
    verifiers: CredentialHasher[] = [],
  ) {
    for (const hasher of [primary, ...verifiers]) {
      this.hashers.set(hasher.algorithm, hasher);
    }
  }

  get primaryAlgorithm(): Credential["algorithm"] {
    return this.primary.algorithm;
  }

  /**
   * Derive a credential for a new password.
   * Throws {@link WeakPasswordError} when the password fails the policy.
   *
   * Storing the result through `IAccountRepository.setCredential` discards the
   * previous credential and any pending password-reset token.
   */
  async set(password: string): Promise<Credential> {
    const problem = passwordPolicyViolation(password);
    if (problem) throw new WeakPasswordError(problem);
    return this.primary.hash(password);
  }

  /** Never throws for a wrong or unusable credential; those resolve false. */
  async verify(password: string, credential: StoredCredential): Promise<boolean> {
    if (!password) return false;

    const hasher = this.hashers.get(credential.algorithm);
    if (!hasher) {
      logger.error("No hasher registered for stored credential algorithm", { algorithm: credential.algorithm });
      return false;
    }

    try {
      return await hasher.verify(password, credential);
    } catch (err) {
      if (err instanceof MalformedCredentialError) {
        logger.error("Stored credential is malformed", { algorithm: credential.algorithm, error: err.message });
        return false;
      }
      throw err;
    }
  }
}

export interface PasswordCredentialOptions {
  /** Primary algorithm for new credentials. */
  hasher: "bcrypt" | "pbkdf2";
  bcryptRounds?: number;
}

/** Build a {@link PasswordCredential} that can verify every supported algorithm. */
export function createPasswordCredential(opts: PasswordCredentialOptions): PasswordCredential {
  const bcrypt = new BcryptHasher(opts.bcryptRounds);
  const pbkdf2 = new Pbkdf2Hasher();
  return opts.hasher === "bcrypt" ? new PasswordCredential(bcrypt, [pbkdf2]) : new PasswordCredential(pbkdf2, [bcrypt]);
}
