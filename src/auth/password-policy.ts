export const MIN_PASSWORD_LENGTH = 12;

/**
 * Common passwords that satisfy the character-class rules but are still
 * among the first guesses in any credential-stuffing list. Compared
 * case-insensitively.
 */
const COMMON_PASSWORDS = new Set([
  "password123!",
  "password1234",
  "p@ssword1234",
  "p@ssw0rd1234",
  "passw0rd123!",
  "qwerty123456!",
  "qwerty@12345",
  "welcome123!!",
  "welcome@1234",
  "admin@123456",
  "administrator1!",
  "letmein12345!",
  "changeme123!",
  "iloveyou123!",
  "abc123456789!",
]);

/**
 * Check a candidate password against the complexity policy.
 * Returns a message describing the first problem found, or null if the
 * password is acceptable.
 */
export function passwordPolicyViolation(password: string): string | null {
  if (!password) return "Password cannot be empty";

  // Length counts code points, so an emoji is one character.
  if ([...password].length < MIN_PASSWORD_LENGTH) {
    return `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`;
  }

  const missing: string[] = [];
  if (!/[A-Z]/.test(password)) missing.push("uppercase letter");
  if (!/[a-z]/.test(password)) missing.push("lowercase letter");
  if (!/[0-9]/.test(password)) missing.push("digit");
  if (!/[^A-Za-z0-9]/.test(password)) missing.push("special character");

  if (missing.length > 0) {
    return `Password must contain at least one ${missing.join(", ")}`;
  }

  if (COMMON_PASSWORDS.has(password.toLowerCase())) {
    return "Password is too common and easily guessable";
  }

  return null;
}
