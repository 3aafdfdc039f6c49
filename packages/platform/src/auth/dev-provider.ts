/**
 * Development Auth Provider
 *
 * A stand-in identity/role source for local development and tests.
 * Tokens have the form "userId:role1,role2", for example
 * "alice:author" or "bob:editor,peer_reviewer". Unknown roles make the
 * token invalid. An empty token yields a development administrator.
 *
 * NEVER use this in production — it trusts whatever the token says.
 */

import { isRole, type AuthProvider, type AuthResult, type Caller } from "@curriflow/contracts";

/** The caller used in development mode when no token is sent */
export const DEV_CALLER: Caller = {
  userId: "dev-admin",
  roles: ["administrator"],
  type: "human",
};

export class DevAuthProvider implements AuthProvider {
  async verifyToken(token: string): Promise<AuthResult> {
    const trimmed = token.trim();
    if (trimmed === "") {
      return { ...DEV_CALLER, roles: [...DEV_CALLER.roles] };
    }

    const separator = trimmed.indexOf(":");
    const userId = separator === -1 ? trimmed : trimmed.slice(0, separator);
    const roleList = separator === -1 ? "" : trimmed.slice(separator + 1);
    if (userId === "") return null;

    const names = roleList
      .split(",")
      .map((r) => r.trim())
      .filter((r) => r !== "");
    const roles = names.filter(isRole);
    if (roles.length !== names.length) return null;

    return { userId, roles, type: "human" };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode — tokens are trusted as userId:role1,role2",
    };
  }
}
