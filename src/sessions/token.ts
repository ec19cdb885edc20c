import crypto from "node:crypto";

/** Raw random bytes behind each session token. */
export const TOKEN_BYTES = 8;

/**
 * Mint an unguessable, URL-safe session token.
 *
 * `bytes` random bytes from the CSPRNG, base64url-encoded without padding
 * (8 bytes → 11 characters).
 */
export function generateToken(bytes: number = TOKEN_BYTES): string {
  return crypto.randomBytes(bytes).toString("base64url");
}
