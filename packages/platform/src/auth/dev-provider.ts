/**
 * Development Auth Provider
 *
 * For local development when no external auth service is configured.
 * The bearer token is taken as a local user id: `Authorization: Bearer
 * <user id>` acts as that user. Unknown ids do not verify.
 *
 * NEVER use this in production - anyone can claim any id.
 *
 * Activated automatically when SUPABASE_URL is not set and
 * NODE_ENV !== "production".
 */

import type { AuthProvider, AuthResult, UserRepository } from "@issuedesk/contracts";

export class DevAuthProvider implements AuthProvider {
  constructor(private readonly users: UserRepository) {}

  async verifyToken(token: string): Promise<AuthResult> {
    const userId = token.trim();
    if (!userId) {
      return null;
    }

    const user = await this.users.findById(userId);
    return user ? { userId: user.id, username: user.username } : null;
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode - send a user id as the bearer token",
    };
  }
}
