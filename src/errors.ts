/**
 * OCPP-J CallError codes a central system answers with.
 */
export type OcppErrorCode =
  | 'NotImplemented'
  | 'NotSupported'
  | 'InternalError'
  | 'ProtocolError'
  | 'SecurityError'
  | 'FormationViolation'
  | 'PropertyConstraintViolation'
  | 'OccurenceConstraintViolation'
  | 'TypeConstraintViolation'
  | 'GenericError';

/**
 * An inbound call that cannot be served. The transport turns it into a CallError frame
 * using `rpcErrorCode`, the message and `details`; the connection stays open.
 */
export class ProtocolError extends Error {
  readonly name = 'ProtocolError';

  constructor(
    readonly rpcErrorCode: OcppErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
  }
}

/** Application-level WebSocket close codes sent when a charger is refused. */
export const CloseCode = {
  ChargerUnknown: 4001,
  ChargerDisabled: 4002,
  VerificationFailed: 4003,
} as const;

export type HandshakeCloseCode = (typeof CloseCode)[keyof typeof CloseCode];

export class HandshakeError extends Error {
  readonly name = 'HandshakeError';

  constructor(
    readonly closeCode: HandshakeCloseCode,
    message: string
  ) {
    super(message);
  }
}

export class PersistenceError extends Error {
  readonly name = 'PersistenceError';

  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
  }
}

export class CallTimeoutError extends Error {
  readonly name = 'CallTimeoutError';

  constructor(
    readonly action: string,
    readonly timeoutMs: number
  ) {
    super(`${action} was not answered within ${timeoutMs}ms`);
  }
}

export class ConnectionClosedError extends Error {
  readonly name = 'ConnectionClosedError';

  constructor(readonly identity: string) {
    super(`Connection to ${identity} closed`);
  }
}

export class NotConnectedError extends Error {
  readonly name = 'NotConnectedError';

  constructor(readonly identity: string) {
    super(`Charger ${identity} is not connected`);
  }
}
