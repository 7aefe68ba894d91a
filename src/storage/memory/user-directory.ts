import type { User } from '../../types/user.js';
import type { IUserDirectory } from '../interfaces/user-directory.js';

/**
 * In-memory user directory
 */
export class MemoryUserDirectory implements IUserDirectory {
  private users = new Map<string, User>();

  constructor(users: User[] = []) {
    for (const user of users) {
      this.users.set(user.id, user);
    }
  }

  async findById(userId: string): Promise<User | null> {
    return this.users.get(userId) ?? null;
  }
}
