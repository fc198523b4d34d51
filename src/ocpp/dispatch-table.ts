import {z} from 'zod';
import {Logger} from 'pino';
import {ProtocolError} from '../errors';

/** Every action an OCPP 1.6 charge point may send to the central system. */
export const CHARGE_POINT_ACTIONS = [
  'Authorize',
  'BootNotification',
  'DataTransfer',
  'DiagnosticsStatusNotification',
  'FirmwareStatusNotification',
  'Heartbeat',
  'MeterValues',
  'StartTransaction',
  'StatusNotification',
  'StopTransaction',
] as const;

export type ChargePointAction = (typeof CHARGE_POINT_ACTIONS)[number];

export type DispatchEntry =
  | {
      kind: 'handled';
      dispatch(params: unknown, log: Logger): Promise<unknown>;
    }
  | {
      kind: 'unsupported';
      reason: string;
    };

export type DispatchTable = ReadonlyMap<string, DispatchEntry>;

/**
 * An action served by `handler` once its payload passed `schema`. When the handler fails,
 * the error is logged and `fallback` answers instead, so the charge point always gets a reply.
 */
export function handled<Req, Res>(
  schema: z.ZodType<Req, z.ZodTypeDef, unknown>,
  handler: (request: Req) => Promise<Res>,
  fallback: (request: Req) => Res
): DispatchEntry {
  return {
    kind: 'handled',
    async dispatch(params: unknown, log: Logger) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        throw new ProtocolError('FormationViolation', 'Payload does not match the action schema', {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      try {
        return await handler(parsed.data);
      } catch (err) {
        log.error(err, 'Handler failed, answering with fallback response');
        return fallback(parsed.data);
      }
    },
  };
}

export function unsupported(reason: string): DispatchEntry {
  return {kind: 'unsupported', reason};
}

/** Builds the table and refuses to start when an action has neither a handler nor an unsupported entry. */
export function createDispatchTable(entries: Partial<Record<ChargePointAction, DispatchEntry>>): DispatchTable {
  const table = new Map<string, DispatchEntry>();
  for (const action of CHARGE_POINT_ACTIONS) {
    const entry = entries[action];
    if (!entry) {
      throw new Error(`No dispatch entry for ${action}`);
    }
    table.set(action, entry);
  }
  return table;
}
