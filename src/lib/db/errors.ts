import { asRecord } from "@/lib/github/rate-limit";

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/;

// 08 connection exception, 53 insufficient resources, 57 operator intervention.
const TRANSIENT_SQLSTATE_CLASSES = new Set(["08", "53", "57"]);
const TRANSIENT_SQLSTATES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
]);

export function getSqlState(error: unknown): string | null {
  const code = asRecord(error)?.code;
  if (typeof code !== "string" || !SQLSTATE_PATTERN.test(code)) {
    return null;
  }

  return code;
}

/**
 * Errors without a SQLSTATE never reached the server (refused or reset
 * sockets, pool timeouts) and are worth another try, as are the connection,
 * resource and concurrency classes. Everything else, constraint and type
 * errors included, fails the same way on every attempt.
 */
export function isTransientDatabaseError(error: unknown) {
  const sqlState = getSqlState(error);
  if (sqlState === null) {
    return true;
  }

  return (
    TRANSIENT_SQLSTATES.has(sqlState) ||
    TRANSIENT_SQLSTATE_CLASSES.has(sqlState.slice(0, 2))
  );
}

export function describeDatabaseError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  const sqlState = getSqlState(error);
  return sqlState ? `${message} (SQLSTATE ${sqlState})` : message;
}
