import type { Session } from '../types/token.js';
import type { ICredentialStore } from '../storage/interfaces/credential-store.js';
import type { Logger } from '../utils/logger.js';
import { sessionSchema, parseRecord } from '../storage/records/schemas.js';
import {
  KEY_PREFIX_SESSION,
  KEY_PREFIX_USER_SESSIONS,
  KEY_PREFIX_REVOKED,
} from '../config/constants.js';

export interface SessionManagerOptions {
  refreshTokenTtl: number; // seconds
  logger: Logger;
  now?: () => number;
}

/**
 * Tracks issued refresh-token ids and their revocation.
 *
 * `session:{jti}` binds a jti to its user, `session:user:{userId}` indexes a
 * user's jtis and `revoked:{jti}` marks a revoked jti until the token would
 * have expired anyway.
 */
export class SessionManager {
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly store: ICredentialStore,
    private readonly options: SessionManagerOptions
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger.child({ component: 'session-manager' });
  }

  private sessionKey(jti: string): string {
    return `${KEY_PREFIX_SESSION}${jti}`;
  }

  private userKey(userId: string): string {
    return `${KEY_PREFIX_USER_SESSIONS}${userId}`;
  }

  private revokedKey(jti: string): string {
    return `${KEY_PREFIX_REVOKED}${jti}`;
  }

  async createSession(userId: string, jti: string, deviceLabel?: string): Promise<Session> {
    const session: Session = { jti, userId, createdAt: this.now() };
    if (deviceLabel !== undefined) {
      session.deviceLabel = deviceLabel;
    }

    const ttl = this.options.refreshTokenTtl;
    await this.store.put(this.sessionKey(jti), JSON.stringify(session), ttl);
    await this.store.addMember(this.userKey(userId), jti, ttl);

    return session;
  }

  async isRevoked(jti: string): Promise<boolean> {
    return (await this.store.get(this.revokedKey(jti))) !== null;
  }

  /**
   * Revoke a jti for `ttlSeconds`. Only the call that performed the
   * revocation gets `true`; a jti that was already revoked gets `false`.
   */
  async revoke(jti: string, ttlSeconds: number): Promise<boolean> {
    const revoked = await this.store.setIfAbsent(
      this.revokedKey(jti),
      String(this.now()),
      Math.max(1, ttlSeconds)
    );
    if (!revoked) {
      return false;
    }

    const session = await this.findSession(jti);
    await this.store.delete(this.sessionKey(jti));
    if (session) {
      await this.store.removeMember(this.userKey(session.userId), jti);
    }

    this.logger.debug('Token revoked', { jti });
    return true;
  }

  /**
   * Revoke every live session of a user, optionally keeping one.
   * Returns how many sessions were revoked by this call.
   */
  async invalidateAllSessions(userId: string, exceptJti?: string): Promise<number> {
    const jtis = await this.store.members(this.userKey(userId));
    let count = 0;

    for (const jti of jtis) {
      if (jti === exceptJti) continue;

      const ttl = (await this.store.ttl(this.sessionKey(jti))) ?? this.options.refreshTokenTtl;
      if (await this.revoke(jti, ttl)) {
        count++;
      } else {
        await this.store.removeMember(this.userKey(userId), jti);
      }
    }

    this.logger.info('Sessions invalidated', { userId, count });
    return count;
  }

  /**
   * Live sessions of a user. Index entries whose session has expired are pruned.
   */
  async listSessions(userId: string): Promise<Session[]> {
    const jtis = await this.store.members(this.userKey(userId));
    const sessions: Session[] = [];

    for (const jti of jtis) {
      const session = await this.findSession(jti);
      if (session) {
        sessions.push(session);
      } else {
        await this.store.removeMember(this.userKey(userId), jti);
      }
    }

    return sessions.sort((a, b) => a.createdAt - b.createdAt);
  }

  private async findSession(jti: string): Promise<Session | null> {
    const raw = await this.store.get(this.sessionKey(jti));
    return raw === null ? null : parseRecord(raw, sessionSchema);
  }
}
