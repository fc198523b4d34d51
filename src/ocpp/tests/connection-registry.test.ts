import {ConnectionRegistry, PresenceRepository, RegisteredSession} from '../connection-registry';
import {ConnectionStats} from '../protocol-session';
import {NotConnectedError} from '../../errors';

class StubSession implements RegisteredSession {
  closeReasons: string[] = [];

  constructor(
    readonly identity: string,
    private failClose = false
  ) {}

  close(reason: string): Promise<void> {
    this.closeReasons.push(reason);
    return this.failClose ? Promise.reject(new Error('socket already gone')) : Promise.resolve();
  }

  stats(): ConnectionStats {
    return {
      identity: this.identity,
      state: 'Active',
      connectedSince: '2025-03-01T10:00:00.000Z',
      lastHeartbeat: null,
      lastActivity: '2025-03-01T10:00:00.000Z',
      pendingCallCount: 0,
    };
  }
}

describe('ConnectionRegistry', () => {
  let presence: {markOnline: jest.Mock; markOffline: jest.Mock};
  let registry: ConnectionRegistry<StubSession>;

  beforeEach(() => {
    presence = {
      markOnline: jest.fn().mockResolvedValue(undefined),
      markOffline: jest.fn().mockResolvedValue(undefined),
    };
    const repository: PresenceRepository = presence;
    registry = new ConnectionRegistry<StubSession>(repository, () => new Date('2025-03-01T10:00:00.000Z'));
  });

  it('should register a session and mark the charger online', async () => {
    const session = new StubSession('CP-1');

    await registry.register('CP-1', session);

    expect(registry.get('CP-1')).toBe(session);
    expect(registry.isOnline('CP-1')).toBe(true);
    expect(registry.stats('CP-1')?.state).toBe('Active');
    expect(presence.markOnline).toHaveBeenCalledWith('CP-1', '2025-03-01T10:00:00.000Z');
  });

  it('should replace and close the previous session of the same identity', async () => {
    const first = new StubSession('CP-1');
    const second = new StubSession('CP-1');
    await registry.register('CP-1', first);

    await registry.register('CP-1', second);

    expect(registry.get('CP-1')).toBe(second);
    expect(first.closeReasons).toEqual(['Replaced by a new connection']);
    expect(registry.listIdentities()).toEqual(['CP-1']);
  });

  it('should keep the newer session when the replaced one unregisters', async () => {
    const first = new StubSession('CP-1');
    const second = new StubSession('CP-1');
    await registry.register('CP-1', first);
    await registry.register('CP-1', second);

    expect(await registry.unregister('CP-1', first)).toBe(false);

    expect(registry.get('CP-1')).toBe(second);
    expect(presence.markOffline).not.toHaveBeenCalled();
  });

  it('should unregister the current session and mark the charger offline', async () => {
    const session = new StubSession('CP-1');
    await registry.register('CP-1', session);

    expect(await registry.unregister('CP-1', session)).toBe(true);

    expect(registry.get('CP-1')).toBeNull();
    expect(registry.stats('CP-1')).toBeNull();
    expect(presence.markOffline).toHaveBeenCalledWith('CP-1', '2025-03-01T10:00:00.000Z');
  });

  it('should register even when presence cannot be stored', async () => {
    presence.markOnline.mockRejectedValue(new Error('database is locked'));

    await registry.register('CP-1', new StubSession('CP-1'));

    expect(registry.isOnline('CP-1')).toBe(true);
  });

  it('should list identities in order', async () => {
    await registry.register('CP-B', new StubSession('CP-B'));
    await registry.register('CP-A', new StubSession('CP-A'));

    expect(registry.listIdentities()).toEqual(['CP-A', 'CP-B']);
  });

  it('should force close a connected charger and reject unknown ones', async () => {
    const session = new StubSession('CP-1');
    await registry.register('CP-1', session);

    await registry.forceClose('CP-1');

    expect(session.closeReasons).toEqual(['Closed by operator']);
    await expect(registry.forceClose('CP-9')).rejects.toBeInstanceOf(NotConnectedError);
  });

  it('should close every session even when one fails', async () => {
    const failing = new StubSession('CP-1', true);
    const healthy = new StubSession('CP-2');
    await registry.register('CP-1', failing);
    await registry.register('CP-2', healthy);

    await registry.closeAll();

    expect(failing.closeReasons).toEqual(['Server shutting down']);
    expect(healthy.closeReasons).toEqual(['Server shutting down']);
  });
});
