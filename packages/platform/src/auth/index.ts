/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to verify
 * every incoming request.
 *
 * Provider selection:
 *   - A provider passed to initAuthProvider() → that provider
 *   - Otherwise in non-production → DevAuthProvider
 *   - In production without a provider → throws (fail fast)
 */

import type { AuthProvider } from "@curriflow/contracts";
import { DevAuthProvider } from "./dev-provider.js";

/** The singleton auth provider instance */
let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(custom?: AuthProvider): AuthProvider {
  if (custom) {
    authProvider = custom;
  } else if (process.env.NODE_ENV === "production") {
    throw new Error(
      "Authentication must be configured in production. " +
      "Pass an AuthProvider to initAuthProvider() in bootstrap."
    );
  } else {
    authProvider = new DevAuthProvider();
    console.log("[auth] Using development auth provider (tokens are trusted)");
  }

  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new Error(
      "Auth provider not initialized. Call initAuthProvider() in bootstrap."
    );
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 */
export function setAuthProvider(provider: AuthProvider): void {
  authProvider = provider;
}

/** Clears the active provider (for testing only) */
export function resetAuthProvider(): void {
  authProvider = null;
}

export { DevAuthProvider, DEV_CALLER } from "./dev-provider.js";
