/**
 * Content Hashing Utilities
 *
 * Used by the Identity Assigner to turn normalized event fields into
 * deterministic identifiers.
 */
import crypto from "crypto";

/**
 * Computes a SHA-256 hash of an arbitrary string.
 *
 * @returns 64-character hex string
 */
export function hashString(value: string): string {
  return crypto.createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Hashes a list of already-normalized parts joined with "|".
 * The separator keeps ("ab", "c") and ("a", "bc") apart.
 */
export function hashParts(parts: string[]): string {
  return hashString(parts.join("|"));
}
