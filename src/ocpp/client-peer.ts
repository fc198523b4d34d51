import type {RPCClient} from 'ocpp-rpc';
import {RpcPeer} from './protocol-session';

const isPayload = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Presents an ocpp-rpc client connection to a {@link ProtocolSession}. */
export function clientPeer(client: RPCClient, identity: string): RpcPeer {
  return {
    identity,
    handle(handler) {
      client.handle(async ({method, params}) => {
        const response = await handler({method: method ?? '', params});
        return isPayload(response) ? response : {};
      });
    },
    call(method, params, options) {
      return client.call(method, params, options);
    },
    close(options) {
      return client.close(options);
    },
    on(event, listener) {
      client.on(event, (closeEvent: {code: number}) => listener(closeEvent));
      return this;
    },
  };
}
