import {ChargerRepository} from '../repository/database';
import {NotConnectedError} from '../errors';
import {ConnectionStats} from './protocol-session';
import logger from '../logger';

export interface RegisteredSession {
  readonly identity: string;
  close(reason: string): Promise<void>;
  stats(): ConnectionStats;
}

export type PresenceRepository = Pick<ChargerRepository, 'markOnline' | 'markOffline'>;

/**
 * Live sessions by charger identity, at most one per identity. A charger that reconnects
 * replaces its previous session, which is closed in the background.
 */
export class ConnectionRegistry<S extends RegisteredSession> {
  private sessions = new Map<string, S>();

  constructor(
    private presence: PresenceRepository,
    private now: () => Date = () => new Date()
  ) {}

  async register(identity: string, session: S): Promise<void> {
    const previous = this.sessions.get(identity);
    this.sessions.set(identity, session);
    if (previous && previous !== session) {
      logger.warn(`${identity} reconnected, closing its previous session`);
      previous.close('Replaced by a new connection').catch((err: unknown) => {
        logger.error(err, `Failed to close replaced session of ${identity}`);
      });
    }
    logger.info(`${identity} connected (${this.sessions.size} online)`);
    await this.updatePresence(identity, true);
  }

  /** Forgets `session` unless a newer session has already taken its place. */
  async unregister(identity: string, session: S): Promise<boolean> {
    if (this.sessions.get(identity) !== session) {
      logger.debug(`Session of ${identity} was already replaced, keeping the current one`);
      return false;
    }
    this.sessions.delete(identity);
    logger.info(`${identity} disconnected (${this.sessions.size} online)`);
    await this.updatePresence(identity, false);
    return true;
  }

  get(identity: string): S | null {
    return this.sessions.get(identity) ?? null;
  }

  isOnline(identity: string): boolean {
    return this.sessions.has(identity);
  }

  listIdentities(): string[] {
    return [...this.sessions.keys()].sort();
  }

  stats(identity: string): ConnectionStats | null {
    const session = this.sessions.get(identity);
    return session ? session.stats() : null;
  }

  async forceClose(identity: string, reason = 'Closed by operator'): Promise<void> {
    const session = this.sessions.get(identity);
    if (!session) {
      throw new NotConnectedError(identity);
    }
    await session.close(reason);
  }

  async closeAll(reason = 'Server shutting down'): Promise<void> {
    const sessions = [...this.sessions.values()];
    logger.info(`Closing ${sessions.length} sessions`);
    await Promise.allSettled(sessions.map((session) => session.close(reason)));
  }

  private async updatePresence(identity: string, online: boolean): Promise<void> {
    const at = this.now().toISOString();
    try {
      if (online) {
        await this.presence.markOnline(identity, at);
      } else {
        await this.presence.markOffline(identity, at);
      }
    } catch (err) {
      logger.error(err, `Failed to mark ${identity} ${online ? 'online' : 'offline'}`);
    }
  }
}
