import type {Request, Response} from 'express';
import {CallTimeoutError, ConnectionClosedError, NotConnectedError} from '../errors';
import {ConnectionRegistry, RegisteredSession} from '../ocpp/connection-registry';
import {
  isOutboundAction,
  OUTBOUND_REQUEST_SCHEMAS,
  OutboundAction,
  OutboundRequests,
  OutboundResponses,
} from '../ocpp/messages';
import logger from '../logger';

/** A live session that accepts commands for its charger. */
export interface CommandSession extends RegisteredSession {
  call<A extends OutboundAction>(action: A, payload: OutboundRequests[A]): Promise<OutboundResponses[A]>;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export type CommandPayload<A extends OutboundAction> =
  | {success: true; data: OutboundRequests[A]}
  | {success: false; issues: string[]};

export function parseCommandPayload<A extends OutboundAction>(action: A, body: unknown): CommandPayload<A> {
  const parsed = OUTBOUND_REQUEST_SCHEMAS[action].safeParse(body ?? {});
  if (!parsed.success) {
    return {success: false, issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)};
  }
  return {success: true, data: parsed.data};
}

/** HTTP status for a command that did not get a response from the charger. */
export function statusForCommandError(error: unknown): number {
  if (error instanceof NotConnectedError) {
    return 404;
  }
  if (error instanceof CallTimeoutError) {
    return 504;
  }
  if (error instanceof ConnectionClosedError) {
    return 503;
  }
  return 502;
}

export class ChargerController {
  constructor(private registry: ConnectionRegistry<CommandSession>) {}

  listOnline(_req: Request, res: Response): Response {
    const identities = this.registry.listIdentities();
    return res.json({count: identities.length, identities});
  }

  getConnection(req: Request, res: Response): Response {
    const {identity} = req.params;
    const stats = this.registry.stats(identity);
    if (!stats) {
      logger.debug(`ChargerController: ${identity} is not connected`);
      return res.status(404).json({identity, online: false});
    }
    return res.json({online: true, ...stats});
  }

  async closeConnection(req: Request, res: Response): Promise<Response> {
    const {identity} = req.params;
    logger.info(`ChargerController: Received closeConnection request for ${identity}`);
    try {
      await this.registry.forceClose(identity);
      return res.json({message: `Connection to ${identity} closed`});
    } catch (error) {
      return this.sendError(res, identity, 'close connection', error);
    }
  }

  async sendCommand(req: Request, res: Response): Promise<Response> {
    const {identity, action} = req.params;
    if (!isOutboundAction(action)) {
      logger.warn(`ChargerController: Unknown command ${action} for ${identity}`);
      return res.status(400).json({error: `Unknown command ${action}`});
    }
    logger.info({requestBody: req.body}, `ChargerController: Received ${action} command for ${identity}`);
    return this.dispatch(identity, action, req.body, res);
  }

  private async dispatch<A extends OutboundAction>(
    identity: string,
    action: A,
    body: unknown,
    res: Response
  ): Promise<Response> {
    const parsed = parseCommandPayload(action, body);
    if (!parsed.success) {
      return res.status(400).json({error: `Invalid ${action} payload`, issues: parsed.issues});
    }
    const session = this.registry.get(identity);
    if (!session) {
      return this.sendError(res, identity, action, new NotConnectedError(identity));
    }
    try {
      const response = await session.call(action, parsed.data);
      return res.json({action, response});
    } catch (error) {
      return this.sendError(res, identity, action, error);
    }
  }

  private sendError(res: Response, identity: string, operation: string, error: unknown): Response {
    const status = statusForCommandError(error);
    if (status === 502) {
      logger.error(error, `ChargerController: ${operation} failed for ${identity}`);
    } else {
      logger.warn(`ChargerController: ${operation} for ${identity} failed: ${errorMessage(error)}`);
    }
    return res.status(status).json({error: errorMessage(error)});
  }
}
