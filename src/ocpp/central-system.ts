import type {IncomingMessage} from 'node:http';
import type {Socket} from 'node:net';
import {RPCClient, RPCServer} from 'ocpp-rpc';
import {CloseCode, HandshakeError} from '../errors';
import {ChargerContext} from '../model/charger';
import logger, {sessionLogger} from '../logger';
import {ChargePointHandlers, ChargePointServices} from './charge-point-handlers';
import {clientPeer} from './client-peer';
import {ConnectionRegistry} from './connection-registry';
import {HandshakeVerifier} from './handshake';
import {OCPP_PROTOCOL} from './messages';
import {ProtocolSession, RpcPeer, SessionTiming} from './protocol-session';

/**
 * Accepts charge point WebSockets, runs the handshake and hands verified chargers a
 * {@link ProtocolSession} wired to their handlers.
 */
export class CentralSystem {
  readonly registry: ConnectionRegistry<ProtocolSession>;
  private server: RPCServer;
  private verifier: HandshakeVerifier;

  constructor(
    private services: ChargePointServices,
    private timing: SessionTiming
  ) {
    this.verifier = new HandshakeVerifier(services.chargers);
    this.registry = new ConnectionRegistry<ProtocolSession>(services.chargers);
    this.server = new RPCServer({
      protocols: [OCPP_PROTOCOL],
      strictMode: true,
    });

    this.server.auth((accept, reject, handshake) => {
      if (!handshake.protocols.has(OCPP_PROTOCOL)) {
        logger.warn(`Rejecting ${handshake.identity} from ${handshake.remoteAddress}: subprotocol ${OCPP_PROTOCOL} missing`);
        reject(400, `Subprotocol ${OCPP_PROTOCOL} is required`);
        return;
      }
      accept();
    });

    this.server.on('client', (client: RPCClient) => {
      const identity = client.identity;
      if (!identity) {
        logger.error('Client connected without identity. Closing client.');
        client.close({code: 1008, reason: 'Missing identity'}).catch((err: unknown) => {
          logger.error(err, 'Failed to close client without identity');
        });
        return;
      }
      this.accept(clientPeer(client, identity)).catch((err: unknown) => {
        logger.error(err, `Failed to accept ${identity}`);
      });
    });
    this.server.on('error', (err) => {
      logger.error(err, 'OCPP server error');
    });
  }

  /** Runs a freshly connected peer through the handshake and registers it when admitted. */
  async accept(peer: RpcPeer): Promise<ProtocolSession> {
    const {identity} = peer;
    const log = sessionLogger(identity);
    const session = new ProtocolSession(peer, this.timing, log);

    let context: ChargerContext;
    try {
      context = await this.verifier.verify(identity);
    } catch (err) {
      const error =
        err instanceof HandshakeError
          ? err
          : new HandshakeError(CloseCode.VerificationFailed, 'Internal server error');
      await session.refuse(error);
      return session;
    }

    if (session.state !== 'Handshaking') {
      log.info(`${identity} went away during verification`);
      return session;
    }
    const handlers = new ChargePointHandlers(context, this.services, log);
    session.open(context, handlers.dispatchTable());
    session.closed
      .then(() => this.registry.unregister(context.identity, session))
      .catch((err: unknown) => {
        log.error(err, `Failed to unregister ${identity}`);
      });
    await this.registry.register(context.identity, session);
    return session;
  }

  handleUpgrade(request: IncomingMessage, socket: Socket, head: Buffer): void {
    Promise.resolve(this.server.handleUpgrade(request, socket, head)).catch((err: unknown) => {
      logger.error(err, `WebSocket upgrade failed for ${request.url}`);
    });
  }

  async close(): Promise<void> {
    await this.registry.closeAll();
    await this.server.close({code: 1001, reason: 'Server shutting down'});
  }
}
