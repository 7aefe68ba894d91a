import type { User } from '../../types/user.js';

/**
 * Lookup of user attributes placed into tokens.
 * Users themselves live in another service.
 */
export interface IUserDirectory {
  findById(userId: string): Promise<User | null>;
}
