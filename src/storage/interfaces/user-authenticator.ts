import type { Context } from 'hono';

/**
 * Resolves the resource owner of an authorization request.
 * User login itself lives in another service.
 */
export interface IUserAuthenticator {
  /**
   * The authenticated user's id, or null when the request carries no user
   */
  authenticate(c: Context): Promise<string | null>;

  /**
   * Where to send an unauthenticated user; absent means answer 401
   */
  loginUrl?(returnTo: string): string;
}
