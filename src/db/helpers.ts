/**
 * Data-layer utilities shared by repositories.
 * Pure functions: nothing here opens connections or runs queries.
 */

/** Mongo duplicate-key error (E11000), raised when a unique `_id` already exists. */
export function isDuplicateKeyError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  return "code" in error && error.code === 11000;
}

/** True when the deployment rejects multi-document transactions (standalone server). */
export function isTransactionUnsupported(error: unknown): boolean {
  const message =
    error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return (
    message.includes("transaction numbers are only allowed") ||
    message.includes("replica set") ||
    message.includes("not supported in this deployment")
  );
}
