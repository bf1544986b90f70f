import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";
import { compare, genSalt, hash } from "bcryptjs";

const pbkdf2Async = promisify(pbkdf2);

/** `bcrypt` is the primary algorithm; `pbkdf2-sha256` is the fallback. */
export type HashAlgorithm = "bcrypt" | "pbkdf2-sha256";

/** A password credential as produced by a hasher. */
export interface Credential {
  algorithm: HashAlgorithm;
  salt: string;
  digest: string;
}

/**
 * A credential as read back from storage. The algorithm tag is untrusted
 * until a registered hasher claims it.
 */
export interface StoredCredential {
  algorithm: string;
  salt: string;
  digest: string;
}

/** The stored salt or digest cannot have been produced by the hasher. */
export class MalformedCredentialError extends Error {
  override readonly name = "MalformedCredentialError";
}

export interface CredentialHasher {
  readonly algorithm: HashAlgorithm;
  hash(password: string): Promise<Credential>;
  /** Resolves false on mismatch. Throws {@link MalformedCredentialError} for unusable stored values. */
  verify(password: string, credential: StoredCredential): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// bcrypt
// ---------------------------------------------------------------------------

export const DEFAULT_BCRYPT_ROUNDS = 12;

const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class BcryptHasher implements CredentialHasher {
  readonly algorithm = "bcrypt";

  constructor(private readonly rounds = DEFAULT_BCRYPT_ROUNDS) {}

  async hash(password: string): Promise<Credential> {
    const salt = await genSalt(this.rounds);
    const digest = await hash(password, salt);
    return { algorithm: this.algorithm, salt, digest };
  }

  async verify(password: string, credential: StoredCredential): Promise<boolean> {
    if (!BCRYPT_HASH.test(credential.digest) || !credential.digest.startsWith(credential.salt)) {
      throw new MalformedCredentialError("Stored bcrypt hash is malformed");
    }
    return compare(password, credential.digest);
  }
}

// ---------------------------------------------------------------------------
// PBKDF2-HMAC-SHA256
// ---------------------------------------------------------------------------

export const PBKDF2_ITERATIONS = 100_000;
const PBKDF2_SALT_BYTES = 32;
const PBKDF2_KEY_BYTES = 32;
const HEX_32_BYTES = /^[0-9a-f]{64}$/;

export class Pbkdf2Hasher implements CredentialHasher {
  readonly algorithm = "pbkdf2-sha256";

  constructor(private readonly iterations = PBKDF2_ITERATIONS) {
    if (iterations < PBKDF2_ITERATIONS) {
      throw new RangeError(`PBKDF2 needs at least ${PBKDF2_ITERATIONS} iterations`);
    }
  }

  async hash(password: string): Promise<Credential> {
    const salt = randomBytes(PBKDF2_SALT_BYTES);
    const key = await pbkdf2Async(password, salt, this.iterations, PBKDF2_KEY_BYTES, "sha256");
    return { algorithm: this.algorithm, salt: salt.toString("hex"), digest: key.toString("hex") };
  }

  async verify(password: string, credential: StoredCredential): Promise<boolean> {
    if (!HEX_32_BYTES.test(credential.salt) || !HEX_32_BYTES.test(credential.digest)) {
      throw new MalformedCredentialError("Stored PBKDF2 salt or digest is malformed");
    }
    const stored = Buffer.from(credential.digest, "hex");
    const key = await pbkdf2Async(
      password,
      Buffer.from(credential.salt, "hex"),
      this.iterations,
      PBKDF2_KEY_BYTES,
      "sha256",
    );
    return timingSafeEqual(key, stored);
  }
}
