import {z} from 'zod';
import {ProtocolSession, SessionTiming} from '../protocol-session';
import {handled} from '../dispatch-table';
import {AuthorizeRequestSchema, HeartbeatRequestSchema} from '../messages';
import {CallTimeoutError, CloseCode, ConnectionClosedError, HandshakeError, ProtocolError} from '../../errors';
import {ChargerContext} from '../../model/charger';
import logger from '../../logger';
import {deferred, FakePeer, tableWith} from './fake-peer';

const timing: SessionTiming = {heartbeatIntervalSec: 60, heartbeatTimeoutMultiplier: 3, callTimeoutMs: 1000};
const context: ChargerContext = {identity: 'CP-1', chargerId: 100, companyId: 1, siteId: 10};

const heartbeatEntry = handled(
  HeartbeatRequestSchema,
  async () => ({currentTime: '2025-03-01T10:00:00.000Z'}),
  () => ({currentTime: 'fallback'})
);

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('ProtocolSession', () => {
  let peer: FakePeer;
  let session: ProtocolSession;

  beforeEach(() => {
    peer = new FakePeer('CP-1');
    session = new ProtocolSession(peer, timing, logger);
  });

  afterEach(async () => {
    await session.close('test finished');
  });

  describe('inbound calls', () => {
    it('should answer a call through its dispatch entry once active', async () => {
      session.open(context, tableWith({Heartbeat: heartbeatEntry}));

      expect(session.state).toBe('Active');
      expect(await peer.send('Heartbeat')).toEqual({currentTime: '2025-03-01T10:00:00.000Z'});
      expect(session.stats().lastHeartbeat).not.toBeNull();
    });

    it('should hold calls that arrive during the handshake until the session opens', async () => {
      const early = peer.send('Heartbeat');
      await flush();

      session.open(context, tableWith({Heartbeat: heartbeatEntry}));

      expect(await early).toEqual({currentTime: '2025-03-01T10:00:00.000Z'});
    });

    it('should reject calls held during a handshake that gets refused', async () => {
      const early = peer.send('Heartbeat').catch((err: unknown) => err);

      await session.refuse(new HandshakeError(CloseCode.ChargerUnknown, 'Charger not registered in system'));

      expect(await early).toMatchObject({rpcErrorCode: 'GenericError'});
    });

    it('should answer NotImplemented for an unknown action and keep the connection open', async () => {
      session.open(context, tableWith({Heartbeat: heartbeatEntry}));

      const error = await peer.send('FooBar').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({rpcErrorCode: 'NotImplemented'});
      expect(session.state).toBe('Active');
      expect(await peer.send('Heartbeat')).toEqual({currentTime: '2025-03-01T10:00:00.000Z'});
    });

    it('should answer NotSupported for an action marked unsupported', async () => {
      session.open(context, tableWith({}));

      await expect(peer.send('DataTransfer', {vendorId: 'x'})).rejects.toMatchObject({
        rpcErrorCode: 'NotSupported',
        message: 'DataTransfer is not served in this test',
      });
    });

    it('should answer FormationViolation for a payload that fails its schema', async () => {
      session.open(context, tableWith({Authorize: handled(AuthorizeRequestSchema, async () => ({}), () => ({}))}));

      await expect(peer.send('Authorize', {idTag: 42})).rejects.toMatchObject({
        rpcErrorCode: 'FormationViolation',
        details: {issues: ['idTag: Expected string, received number']},
      });
    });

    it('should answer with the fallback when the handler fails', async () => {
      const failing = handled(
        z.object({}),
        () => Promise.reject(new Error('database is locked')),
        () => ({currentTime: 'fallback'})
      );
      session.open(context, tableWith({Heartbeat: failing}));

      expect(await peer.send('Heartbeat')).toEqual({currentTime: 'fallback'});
    });

    it('should handle one call at a time in arrival order', async () => {
      const gate = deferred<void>();
      const order: string[] = [];
      session.open(
        context,
        tableWith({
          Heartbeat: handled(
            HeartbeatRequestSchema,
            async () => {
              order.push('heartbeat:start');
              await gate.promise;
              order.push('heartbeat:end');
              return {currentTime: 'now'};
            },
            () => ({currentTime: 'now'})
          ),
          Authorize: handled(
            AuthorizeRequestSchema,
            async () => {
              order.push('authorize');
              return {idTagInfo: {status: 'Accepted'}};
            },
            () => ({idTagInfo: {status: 'Invalid'}})
          ),
        })
      );

      const first = peer.send('Heartbeat');
      const second = peer.send('Authorize', {idTag: 'TAG-1'});
      await flush();
      expect(order).toEqual(['heartbeat:start']);

      gate.resolve();
      await Promise.all([first, second]);
      expect(order).toEqual(['heartbeat:start', 'heartbeat:end', 'authorize']);
    });
  });

  describe('outbound calls', () => {
    beforeEach(() => {
      session.open(context, tableWith({Heartbeat: heartbeatEntry}));
    });

    it('should resolve with the validated response', async () => {
      const pending = session.call('Reset', {type: 'Soft'});
      expect(session.stats().pendingCallCount).toBe(1);

      const [outgoing] = peer.calls;
      expect(outgoing?.method).toBe('Reset');
      expect(outgoing?.params).toEqual({type: 'Soft'});
      expect(outgoing?.callTimeoutMs).toBe(1000);
      outgoing?.resolve({status: 'Accepted'});

      expect(await pending).toEqual({status: 'Accepted'});
      expect(session.stats().pendingCallCount).toBe(0);
    });

    it('should reject a malformed response', async () => {
      const pending = session.call('UnlockConnector', {connectorId: 1});
      peer.calls[0]?.resolve({status: 'Maybe'});

      await expect(pending).rejects.toMatchObject({rpcErrorCode: 'FormationViolation'});
    });

    it('should pass on a CallError from the charger', async () => {
      const pending = session.call('ChangeConfiguration', {key: 'HeartbeatInterval', value: '60'});
      peer.calls[0]?.reject(new Error('NotSupported'));

      await expect(pending).rejects.toThrow('NotSupported');
    });

    it('should fail pending calls when the session closes', async () => {
      const pending = session.call('GetConfiguration', {});

      await session.close('Operator request');

      await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
      expect(peer.calls[0]?.signal.aborted).toBe(true);
      expect(peer.closedWith).toEqual({code: 1000, reason: 'Operator request'});
      expect(session.state).toBe('Closed');
      await expect(session.call('Reset', {type: 'Hard'})).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it('should fail pending calls when the transport drops', async () => {
      const pending = session.call('TriggerMessage', {requestedMessage: 'Heartbeat'});

      peer.drop(1006);
      await session.closed;

      await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
      expect(peer.closedWith).toBeNull();
      expect(session.state).toBe('Closed');
    });
  });

  describe('timers', () => {
    beforeEach(() => {
      jest.useFakeTimers({doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate']});
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should time out an unanswered call and ignore a late reply', async () => {
      session.open(context, tableWith({Heartbeat: heartbeatEntry}));
      const pending = session.call('RemoteStopTransaction', {transactionId: 7});
      const assertion = expect(pending).rejects.toEqual(new CallTimeoutError('RemoteStopTransaction', 1000));

      jest.advanceTimersByTime(1000);
      await assertion;

      expect(peer.calls[0]?.signal.aborted).toBe(true);
      expect(session.stats().pendingCallCount).toBe(0);
      peer.calls[0]?.resolve({status: 'Accepted'});
      expect(session.state).toBe('Active');
    });

    it('should close a session that stays silent past the heartbeat allowance', async () => {
      peer = new FakePeer('CP-2');
      session = new ProtocolSession(peer, {...timing, heartbeatIntervalSec: 1, heartbeatTimeoutMultiplier: 2}, logger);
      session.open(context, tableWith({Heartbeat: heartbeatEntry}));

      jest.advanceTimersByTime(1500);
      await peer.send('Heartbeat');
      jest.advanceTimersByTime(1500);
      expect(session.state).toBe('Active');

      jest.advanceTimersByTime(500);
      await session.closed;
      expect(peer.closedWith).toEqual({code: 1001, reason: 'Heartbeat timeout'});
    });
  });

  it('should close with the handshake close code when refused', async () => {
    await session.refuse(new HandshakeError(CloseCode.ChargerDisabled, 'Charger is disabled'));

    expect(peer.closedWith).toEqual({code: 4002, reason: 'Charger is disabled'});
    expect(session.state).toBe('Closed');
    await expect(peer.send('Heartbeat')).rejects.toMatchObject({rpcErrorCode: 'GenericError'});
  });
});
