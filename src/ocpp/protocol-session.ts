import {randomUUID} from 'node:crypto';
import {Logger} from 'pino';
import {CallTimeoutError, ConnectionClosedError, HandshakeError, ProtocolError} from '../errors';
import {ChargerContext} from '../model/charger';
import {DispatchTable} from './dispatch-table';
import {OUTBOUND_RESPONSE_SCHEMAS, OutboundAction, OutboundRequests, OutboundResponses} from './messages';

/**
 * The part of an RPC client a session drives. `clientPeer` adapts ocpp-rpc's `RPCClient`; tests use
 * an in-process fake.
 */
export interface RpcPeer {
  readonly identity: string;
  handle(handler: (call: {method: string; params: unknown}) => Promise<unknown>): void;
  call(method: string, params: unknown, options: {signal: AbortSignal; callTimeoutMs: number}): Promise<unknown>;
  close(options: {code: number; reason: string}): Promise<unknown>;
  on(event: 'close', listener: (event: {code: number}) => void): unknown;
}

export type SessionState = 'Handshaking' | 'Active' | 'Closing' | 'Closed';

export interface SessionTiming {
  heartbeatIntervalSec: number;
  heartbeatTimeoutMultiplier: number;
  callTimeoutMs: number;
}

export interface ConnectionStats {
  identity: string;
  state: SessionState;
  connectedSince: string;
  lastHeartbeat: string | null;
  lastActivity: string;
  pendingCallCount: number;
}

interface PendingCall {
  timer: NodeJS.Timeout;
  abort: AbortController;
  reject: (reason: Error) => void;
}

const noop = (): void => undefined;

/**
 * One charger's WebSocket conversation. Inbound calls are answered one at a time in arrival
 * order; outbound calls are correlated by message id and each carries its own timeout. A
 * watchdog closes the connection when the charger stays silent for too long.
 */
export class ProtocolSession {
  private _state: SessionState = 'Handshaking';
  private context: ChargerContext | null = null;
  private table: DispatchTable = new Map();
  private pending = new Map<string, PendingCall>();
  private releaseHandshake: () => void = noop;
  // Calls that arrive while the charger is being verified wait here until open or refuse
  private inbound = new Promise<void>((resolve) => {
    this.releaseHandshake = resolve;
  });
  private watchdog: NodeJS.Timeout | null = null;
  private connectedSince = new Date();
  private lastActivity = new Date();
  private lastHeartbeat: Date | null = null;
  private markClosed: () => void = noop;

  readonly closed = new Promise<void>((resolve) => {
    this.markClosed = resolve;
  });

  constructor(
    private peer: RpcPeer,
    private timing: SessionTiming,
    private log: Logger
  ) {
    peer.handle(({method, params}) => this.receive(method, params));
    peer.on('close', ({code}) => this.onTransportClosed(code));
  }

  get identity(): string {
    return this.peer.identity;
  }

  get state(): SessionState {
    return this._state;
  }

  get charger(): ChargerContext | null {
    return this.context;
  }

  open(context: ChargerContext, table: DispatchTable): void {
    if (this._state !== 'Handshaking') {
      throw new Error(`Cannot open session for ${this.identity} in state ${this._state}`);
    }
    this.context = context;
    this.table = table;
    this._state = 'Active';
    this.touch();
    this.releaseHandshake();
    this.log.info(`Session for ${this.identity} is active`);
  }

  /** Rejects the handshake, closing the transport with the error's close code. */
  async refuse(error: HandshakeError): Promise<void> {
    this.log.warn(`Refusing ${this.identity}: ${error.message}`);
    this._state = 'Closing';
    this.teardown();
    await this.closePeer(error.closeCode, error.message);
    this.finish();
  }

  /**
   * Sends a call to the charger and resolves with its validated response. Rejects with
   * CallTimeoutError when no response arrives in time and with ConnectionClosedError when the
   * connection goes away first.
   */
  call<A extends OutboundAction>(action: A, payload: OutboundRequests[A]): Promise<OutboundResponses[A]> {
    if (this._state !== 'Active') {
      return Promise.reject(new ConnectionClosedError(this.identity));
    }
    const messageId = randomUUID();
    const abort = new AbortController();

    return new Promise<OutboundResponses[A]>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(messageId);
        abort.abort();
        this.log.warn(`${action} to ${this.identity} timed out after ${this.timing.callTimeoutMs}ms`);
        reject(new CallTimeoutError(action, this.timing.callTimeoutMs));
      }, this.timing.callTimeoutMs);
      this.pending.set(messageId, {timer, abort, reject});

      this.log.info({payload}, `Sending ${action} to ${this.identity}`);
      const options = {signal: abort.signal, callTimeoutMs: this.timing.callTimeoutMs};
      void this.peer.call(action, payload, options).then(
        (response) => {
          if (!this.settle(messageId)) {
            return;
          }
          this.touch();
          const parsed = OUTBOUND_RESPONSE_SCHEMAS[action].safeParse(response);
          if (!parsed.success) {
            reject(new ProtocolError('FormationViolation', `Malformed ${action} response from ${this.identity}`));
            return;
          }
          this.log.info({response: parsed.data}, `${action} answered by ${this.identity}`);
          resolve(parsed.data);
        },
        (err: unknown) => {
          if (!this.settle(messageId)) {
            return;
          }
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      );
    });
  }

  /** Closes the connection. Outstanding outbound calls fail and the inbound call in flight completes first. */
  async close(reason: string, code = 1000): Promise<void> {
    if (this._state === 'Closing' || this._state === 'Closed') {
      return this.closed;
    }
    this.log.info(`Closing session for ${this.identity}: ${reason}`);
    this._state = 'Closing';
    this.teardown();
    await this.inbound;
    await this.closePeer(code, reason);
    this.finish();
  }

  stats(): ConnectionStats {
    return {
      identity: this.identity,
      state: this._state,
      connectedSince: this.connectedSince.toISOString(),
      lastHeartbeat: this.lastHeartbeat ? this.lastHeartbeat.toISOString() : null,
      lastActivity: this.lastActivity.toISOString(),
      pendingCallCount: this.pending.size,
    };
  }

  private receive(method: string, params: unknown): Promise<unknown> {
    const result = this.inbound.then(() => this.dispatch(method, params));
    this.inbound = result.then(noop, noop);
    return result;
  }

  private async dispatch(method: string, params: unknown): Promise<unknown> {
    if (this._state !== 'Active') {
      throw new ProtocolError('GenericError', `Session for ${this.identity} is not active`);
    }
    this.touch(method === 'Heartbeat');
    const entry = this.table.get(method);
    if (!entry) {
      this.log.warn(`Unknown action ${method} from ${this.identity}`);
      throw new ProtocolError('NotImplemented', `Action ${method} is not implemented`);
    }
    if (entry.kind === 'unsupported') {
      throw new ProtocolError('NotSupported', entry.reason);
    }
    return entry.dispatch(params, this.log.child({action: method}));
  }

  private touch(heartbeat = false): void {
    this.lastActivity = new Date();
    if (heartbeat) {
      this.lastHeartbeat = this.lastActivity;
    }
    if (this.watchdog) {
      clearTimeout(this.watchdog);
    }
    const timeoutMs = this.timing.heartbeatIntervalSec * this.timing.heartbeatTimeoutMultiplier * 1000;
    this.watchdog = setTimeout(() => {
      this.log.warn(`No traffic from ${this.identity} for ${timeoutMs}ms`);
      this.close('Heartbeat timeout', 1001).catch((err: unknown) => {
        this.log.error(err, `Failed to close silent session ${this.identity}`);
      });
    }, timeoutMs);
    this.watchdog.unref();
  }

  private settle(messageId: string): boolean {
    const entry = this.pending.get(messageId);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.timer);
    this.pending.delete(messageId);
    return true;
  }

  private teardown(): void {
    this.releaseHandshake();
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = null;
    }
    for (const [messageId, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.abort.abort();
      entry.reject(new ConnectionClosedError(this.identity));
      this.pending.delete(messageId);
    }
  }

  private async closePeer(code: number, reason: string): Promise<void> {
    try {
      await this.peer.close({code, reason});
    } catch (err) {
      this.log.error(err, `Failed to close transport of ${this.identity}`);
    }
  }

  private onTransportClosed(code: number): void {
    if (this._state === 'Closed') {
      return;
    }
    this.log.info(`Transport of ${this.identity} closed with code ${code}`);
    this._state = 'Closing';
    this.teardown();
    void this.inbound.then(() => this.finish());
  }

  private finish(): void {
    if (this._state === 'Closed') {
      return;
    }
    this.teardown();
    this._state = 'Closed';
    this.markClosed();
  }
}
