const UNIQUE_VIOLATION = "23505";

/**
 * Returns true when `err` is a Postgres unique-constraint violation (SQLSTATE 23505),
 * whether raised directly by the driver or wrapped by Drizzle.
 */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("code" in err && err.code === UNIQUE_VIOLATION) return true;
  if (err.cause !== undefined && isUniqueViolation(err.cause)) return true;
  return err.message.includes("duplicate key");
}
