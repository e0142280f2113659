/**
 * Supabase Auth Provider
 *
 * Implements the AuthProvider contract using Supabase Auth.
 * Verifies JWTs issued by Supabase, then maps the verified email to the
 * local user record the platform authorizes against. Emails are unique
 * among local users, so the mapping is unambiguous.
 *
 * Required environment variables:
 *   SUPABASE_URL         - Your Supabase project URL
 *   SUPABASE_SERVICE_KEY - The service role key (server-side only, never expose)
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AuthProvider, AuthResult, UserRepository } from "@issuedesk/contracts";

export class SupabaseAuthProvider implements AuthProvider {
  private readonly client: SupabaseClient;
  private readonly projectUrl: string;
  private readonly users: UserRepository;

  constructor(config: { url: string; serviceKey: string; users: UserRepository }) {
    this.projectUrl = config.url;
    this.users = config.users;
    // Use the service role key for server-side token verification
    this.client = createClient(config.url, config.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  /**
   * Verify a Supabase JWT and resolve the local user it belongs to.
   *
   * @param token - The JWT from the Authorization: Bearer header
   * @returns The Actor, or null if the token is invalid/expired or its
   *   email matches no local user
   */
  async verifyToken(token: string): Promise<AuthResult> {
    const { data, error } = await this.client.auth.getUser(token);

    if (error || !data.user?.email) {
      return null;
    }

    const user = await this.users.findByEmail(data.user.email);
    return user ? { userId: user.id, username: user.username } : null;
  }

  /**
   * Returns the public Supabase config needed by clients.
   */
  getPublicConfig(): Record<string, string> {
    return {
      provider: "supabase",
      projectUrl: this.projectUrl,
    };
  }
}
