import type { Context } from 'hono';
import type { User } from '../../types/user.js';

/**
 * User lookup for a tenant. Backs CIBA hint resolution, UserInfo and ID
 * token claims.
 */
export interface IUserStore {
  findById(tenantId: string, id: string): Promise<User | null>;

  /**
   * Case-insensitive email lookup
   */
  findByEmail(tenantId: string, email: string): Promise<User | null>;

  /**
   * Case-insensitive username lookup
   */
  findByUsername(tenantId: string, username: string): Promise<User | null>;

  /**
   * Check a username (or email) and password. Null on any mismatch.
   */
  validateCredentials(tenantId: string, username: string, password: string): Promise<User | null>;

  create(tenantId: string, user: User, password?: string): Promise<User>;

  update(tenantId: string, id: string, changes: Partial<Omit<User, 'id' | 'tenantId'>>): Promise<User>;
}

/**
 * Authentication result from the user authenticator
 */
export type AuthenticationResult =
  | { authenticated: true; user: User; sessionId?: string }
  | { authenticated: false; redirectTo: string };

/**
 * Pluggable user authenticator for the standalone and headless UI modes
 *
 * The server does not render login pages. When the authorization endpoint
 * runs outside a journey it asks this interface whether the request
 * carries an authenticated user (session cookie, upstream header, etc.)
 * and otherwise redirects to wherever the implementation says.
 *
 * ```typescript
 * class SessionAuthenticator implements IUserAuthenticator {
 *   async authenticate(ctx: Context): Promise<AuthenticationResult> {
 *     const sessionId = getCookie(ctx, 'session_id');
 *     const user = sessionId ? await this.sessions.getUser(sessionId) : null;
 *     if (!user) {
 *       return { authenticated: false, redirectTo: `/login?return=${encodeURIComponent(ctx.req.url)}` };
 *     }
 *     return { authenticated: true, user, sessionId };
 *   }
 * }
 * ```
 */
export interface IUserAuthenticator {
  authenticate(ctx: Context): Promise<AuthenticationResult>;
}
