import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { WeakPasswordError } from "./errors.js";
import { BcryptHasher, type Credential, Pbkdf2Hasher } from "./hashers.js";
import { createPasswordCredential, PasswordCredential } from "./password-credential.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const GOOD_PASSWORD = "GoodPass1234!";

/** Replace the character at `index` with a different one from the same alphabet. */
function mutate(value: string, index: number, alphabet: string): string {
  const current = value.charAt(index);
  const replacement = alphabet.split("").find((c) => c !== current) ?? current;
  return value.slice(0, index) + replacement + value.slice(index + 1);
}

describe("PasswordCredential", () => {
  beforeEach(() => {
    vi.mocked(logger.error).mockClear();
  });

  describe("with the bcrypt primary", () => {
    const credentials = new PasswordCredential(new BcryptHasher(4), [new Pbkdf2Hasher()]);

    it("round-trips a policy-compliant password", async () => {
      const credential = await credentials.set(GOOD_PASSWORD);
      expect(credential.algorithm).toBe("bcrypt");
      expect(credential.digest).not.toContain(GOOD_PASSWORD);
      expect(credential.digest.startsWith(credential.salt)).toBe(true);
      expect(await credentials.verify(GOOD_PASSWORD, credential)).toBe(true);
    });

    it("rejects the wrong password", async () => {
      const credential = await credentials.set(GOOD_PASSWORD);
      expect(await credentials.verify("WrongPass1234!", credential)).toBe(false);
    });

    it("rejects after any change to the stored digest", async () => {
      const credential = await credentials.set(GOOD_PASSWORD);
      const alphabet = "./ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
      for (const index of [35, 45, 50]) {
        const tampered = { ...credential, digest: mutate(credential.digest, index, alphabet) };
        expect(await credentials.verify(GOOD_PASSWORD, tampered)).toBe(false);
      }
    });

    it("salts each credential independently", async () => {
      const a = await credentials.set(GOOD_PASSWORD);
      const b = await credentials.set(GOOD_PASSWORD);
      expect(a.salt).not.toBe(b.salt);
      expect(a.digest).not.toBe(b.digest);
    });
  });

  describe("with the PBKDF2 fallback as primary", () => {
    const credentials = new PasswordCredential(new Pbkdf2Hasher(), [new BcryptHasher(4)]);

    it("tags the credential with the fallback algorithm and round-trips", async () => {
      const credential = await credentials.set(GOOD_PASSWORD);
      expect(credential.algorithm).toBe("pbkdf2-sha256");
      expect(credential.salt).toMatch(/^[0-9a-f]{64}$/);
      expect(credential.digest).toMatch(/^[0-9a-f]{64}$/);
      expect(await credentials.verify(GOOD_PASSWORD, credential)).toBe(true);
    });

    it("rejects after any change to the stored digest", async () => {
      const credential = await credentials.set(GOOD_PASSWORD);
      for (const index of [0, 31, 63]) {
        const tampered = { ...credential, digest: mutate(credential.digest, index, "0123456789abcdef") };
        expect(await credentials.verify(GOOD_PASSWORD, tampered)).toBe(false);
      }
    });

    it("still verifies credentials written by the other algorithm", async () => {
      const legacy = await new BcryptHasher(4).hash(GOOD_PASSWORD);
      expect(await credentials.verify(GOOD_PASSWORD, legacy)).toBe(true);
    });
  });

  describe("set", () => {
    const credentials = new PasswordCredential(new BcryptHasher(4));

    it("rejects a password shorter than 12 characters", async () => {
      await expect(credentials.set("Short1!")).rejects.toBeInstanceOf(WeakPasswordError);
    });

    it("rejects a password missing an uppercase letter", async () => {
      await expect(credentials.set("alllowercase1!")).rejects.toThrow(
        "Password must contain at least one uppercase letter",
      );
    });

    it("rejects a common password", async () => {
      await expect(credentials.set("Password123!")).rejects.toThrow("Password is too common and easily guessable");
    });
  });

  describe("verify", () => {
    const credentials = new PasswordCredential(new BcryptHasher(4), [new Pbkdf2Hasher()]);

    it("returns false and logs for a malformed bcrypt hash", async () => {
      const malformed = { algorithm: "bcrypt", salt: "$2b$04$abc", digest: "not-a-hash" };
      expect(await credentials.verify(GOOD_PASSWORD, malformed)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith("Stored credential is malformed", {
        algorithm: "bcrypt",
        error: "Stored bcrypt hash is malformed",
      });
    });

    it("returns false and logs for a malformed PBKDF2 credential", async () => {
      const malformed = { algorithm: "pbkdf2-sha256", salt: "zz", digest: "00" };
      expect(await credentials.verify(GOOD_PASSWORD, malformed)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith("Stored credential is malformed", {
        algorithm: "pbkdf2-sha256",
        error: "Stored PBKDF2 salt or digest is malformed",
      });
    });

    it("returns false and logs for an unknown algorithm", async () => {
      const unknown = { algorithm: "md5", salt: "", digest: "5f4dcc3b5aa765d61d8327deb882cf99" };
      expect(await credentials.verify(GOOD_PASSWORD, unknown)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith("No hasher registered for stored credential algorithm", {
        algorithm: "md5",
      });
    });

    it("returns false for an empty password without hashing", async () => {
      const credential: Credential = await credentials.set(GOOD_PASSWORD);
      expect(await credentials.verify("", credential)).toBe(false);
    });
  });
});

describe("createPasswordCredential", () => {
  it("uses bcrypt for new credentials when configured", async () => {
    const credentials = createPasswordCredential({ hasher: "bcrypt", bcryptRounds: 4 });
    expect(credentials.primaryAlgorithm).toBe("bcrypt");
  });

  it("uses PBKDF2 for new credentials when configured, and verifies both", async () => {
    const credentials = createPasswordCredential({ hasher: "pbkdf2", bcryptRounds: 4 });
    expect(credentials.primaryAlgorithm).toBe("pbkdf2-sha256");
    const legacy = await new BcryptHasher(4).hash(GOOD_PASSWORD);
    expect(await credentials.verify(GOOD_PASSWORD, legacy)).toBe(true);
  });
});
