/**
 * Authentication Contract
 *
 * The AuthProvider is the identity/role source: it turns a bearer token
 * into a Caller carrying a user id and the workflow roles that user holds.
 * Token validation belongs to the provider; nothing downstream inspects
 * tokens.
 *
 * Swapping providers means implementing this interface and injecting the
 * new provider at startup. Routes and the engine do not change.
 */

import type { Caller } from "./context.js";

/**
 * Either a valid Caller (authenticated) or null (invalid/expired token).
 */
export type AuthResult = Caller | null;

export interface AuthProvider {
  /**
   * Verify a token and extract the caller's identity and roles.
   * Resolves to null if the token is invalid or expired.
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration for clients (provider name, login hints).
   * Served by a public endpoint — never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
