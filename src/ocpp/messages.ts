import {z} from 'zod';
import {CONNECTOR_STATUSES} from '../model/connector';
import {AuthorizationStatus} from '../model/rfid-card';

export const OCPP_PROTOCOL = 'ocpp1.6';

// Charge point -> central system

export const BootNotificationRequestSchema = z.object({
  chargePointVendor: z.string().max(20),
  chargePointModel: z.string().max(20),
  chargePointSerialNumber: z.string().max(25).optional(),
  chargeBoxSerialNumber: z.string().max(25).optional(),
  firmwareVersion: z.string().max(50).optional(),
  iccid: z.string().max(20).optional(),
  imsi: z.string().max(20).optional(),
  meterType: z.string().max(25).optional(),
  meterSerialNumber: z.string().max(25).optional(),
});

export const HeartbeatRequestSchema = z.object({});

export const StatusNotificationRequestSchema = z.object({
  connectorId: z.number().int().min(0),
  errorCode: z.string(),
  status: z.enum(CONNECTOR_STATUSES),
  timestamp: z.string().optional(),
  info: z.string().max(50).optional(),
  vendorId: z.string().max(255).optional(),
  vendorErrorCode: z.string().max(50).optional(),
});

export const AuthorizeRequestSchema = z.object({
  idTag: z.string().max(20),
});

export const StartTransactionRequestSchema = z.object({
  connectorId: z.number().int().positive(),
  idTag: z.string().max(20),
  meterStart: z.number().int(),
  reservationId: z.number().int().optional(),
  timestamp: z.string(),
});

export const SampledValueSchema = z.object({
  value: z.string(),
  context: z.string().optional(),
  format: z.string().optional(),
  measurand: z.string().optional(),
  phase: z.string().optional(),
  location: z.string().optional(),
  unit: z.string().optional(),
});

export const MeterValueSchema = z.object({
  timestamp: z.string(),
  sampledValue: z.array(SampledValueSchema),
});

export const StopTransactionRequestSchema = z.object({
  idTag: z.string().max(20).optional(),
  meterStop: z.number().int(),
  timestamp: z.string(),
  transactionId: z.number().int(),
  reason: z.string().optional(),
  transactionData: z.array(MeterValueSchema).optional(),
});

export const MeterValuesRequestSchema = z.object({
  connectorId: z.number().int().min(0),
  transactionId: z.number().int().optional(),
  meterValue: z.array(MeterValueSchema).min(1),
});

export const DiagnosticsStatusNotificationRequestSchema = z.object({
  status: z.string(),
});

export const FirmwareStatusNotificationRequestSchema = z.object({
  status: z.string(),
});

export type BootNotificationRequest = z.infer<typeof BootNotificationRequestSchema>;
export type HeartbeatRequest = z.infer<typeof HeartbeatRequestSchema>;
export type StatusNotificationRequest = z.infer<typeof StatusNotificationRequestSchema>;
export type AuthorizeRequest = z.infer<typeof AuthorizeRequestSchema>;
export type StartTransactionRequest = z.infer<typeof StartTransactionRequestSchema>;
export type StopTransactionRequest = z.infer<typeof StopTransactionRequestSchema>;
export type MeterValuesRequest = z.infer<typeof MeterValuesRequestSchema>;
export type MeterValue = z.infer<typeof MeterValueSchema>;
export type DiagnosticsStatusNotificationRequest = z.infer<typeof DiagnosticsStatusNotificationRequestSchema>;
export type FirmwareStatusNotificationRequest = z.infer<typeof FirmwareStatusNotificationRequestSchema>;

export interface IdTagInfo {
  status: AuthorizationStatus;
  expiryDate?: string;
  parentIdTag?: string;
}

export interface BootNotificationResponse {
  status: 'Accepted' | 'Pending' | 'Rejected';
  currentTime: string;
  interval: number;
}

export interface HeartbeatResponse {
  currentTime: string;
}

export interface AuthorizeResponse {
  idTagInfo: IdTagInfo;
}

export interface StartTransactionResponse {
  transactionId: number;
  idTagInfo: IdTagInfo;
}

export interface StopTransactionResponse {
  idTagInfo?: IdTagInfo;
}

export type EmptyResponse = Record<string, never>;

// Central system -> charge point

const ChargingScheduleSchema = z.object({
  duration: z.number().int().optional(),
  startSchedule: z.string().optional(),
  chargingRateUnit: z.enum(['A', 'W']),
  chargingSchedulePeriod: z
    .array(
      z.object({
        startPeriod: z.number().int(),
        limit: z.number(),
        numberPhases: z.number().int().optional(),
      })
    )
    .min(1),
  minChargingRate: z.number().optional(),
});

export const ChargingProfileSchema = z.object({
  chargingProfileId: z.number().int(),
  transactionId: z.number().int().optional(),
  stackLevel: z.number().int().min(0),
  chargingProfilePurpose: z.enum(['ChargePointMaxProfile', 'TxDefaultProfile', 'TxProfile']),
  chargingProfileKind: z.enum(['Absolute', 'Recurring', 'Relative']),
  recurrencyKind: z.enum(['Daily', 'Weekly']).optional(),
  validFrom: z.string().optional(),
  validTo: z.string().optional(),
  chargingSchedule: ChargingScheduleSchema,
});

export const OUTBOUND_ACTIONS = [
  'ChangeConfiguration',
  'Reset',
  'UnlockConnector',
  'ChangeAvailability',
  'RemoteStartTransaction',
  'RemoteStopTransaction',
  'SetChargingProfile',
  'ReserveNow',
  'CancelReservation',
  'GetConfiguration',
  'TriggerMessage',
] as const;

export type OutboundAction = (typeof OUTBOUND_ACTIONS)[number];

export function isOutboundAction(action: string): action is OutboundAction {
  return OUTBOUND_ACTIONS.some((candidate) => candidate === action);
}

const requestSchemas = {
  ChangeConfiguration: z.object({key: z.string().max(50), value: z.string().max(500)}),
  Reset: z.object({type: z.enum(['Hard', 'Soft'])}),
  UnlockConnector: z.object({connectorId: z.number().int().positive()}),
  ChangeAvailability: z.object({connectorId: z.number().int().min(0), type: z.enum(['Inoperative', 'Operative'])}),
  RemoteStartTransaction: z.object({
    connectorId: z.number().int().positive().optional(),
    idTag: z.string().max(20),
    chargingProfile: ChargingProfileSchema.optional(),
  }),
  RemoteStopTransaction: z.object({transactionId: z.number().int()}),
  SetChargingProfile: z.object({connectorId: z.number().int().min(0), csChargingProfiles: ChargingProfileSchema}),
  ReserveNow: z.object({
    connectorId: z.number().int().min(0),
    expiryDate: z.string(),
    idTag: z.string().max(20),
    parentIdTag: z.string().max(20).optional(),
    reservationId: z.number().int(),
  }),
  CancelReservation: z.object({reservationId: z.number().int()}),
  GetConfiguration: z.object({key: z.array(z.string().max(50)).optional()}),
  TriggerMessage: z.object({
    requestedMessage: z.enum([
      'BootNotification',
      'DiagnosticsStatusNotification',
      'FirmwareStatusNotification',
      'Heartbeat',
      'MeterValues',
      'StatusNotification',
    ]),
    connectorId: z.number().int().positive().optional(),
  }),
};

const acceptedOrRejected = z.object({status: z.enum(['Accepted', 'Rejected'])});

const responseSchemas = {
  ChangeConfiguration: z.object({status: z.enum(['Accepted', 'Rejected', 'RebootRequired', 'NotSupported'])}),
  Reset: acceptedOrRejected,
  UnlockConnector: z.object({status: z.enum(['Unlocked', 'UnlockFailed', 'NotSupported'])}),
  ChangeAvailability: z.object({status: z.enum(['Accepted', 'Rejected', 'Scheduled'])}),
  RemoteStartTransaction: acceptedOrRejected,
  RemoteStopTransaction: acceptedOrRejected,
  SetChargingProfile: z.object({status: z.enum(['Accepted', 'Rejected', 'NotSupported'])}),
  ReserveNow: z.object({status: z.enum(['Accepted', 'Faulted', 'Occupied', 'Rejected', 'Unavailable'])}),
  CancelReservation: acceptedOrRejected,
  GetConfiguration: z.object({
    configurationKey: z
      .array(z.object({key: z.string(), readonly: z.boolean(), value: z.string().optional()}))
      .optional(),
    unknownKey: z.array(z.string()).optional(),
  }),
  TriggerMessage: z.object({status: z.enum(['Accepted', 'Rejected', 'NotImplemented'])}),
};

export type OutboundRequests = {[A in OutboundAction]: z.infer<(typeof requestSchemas)[A]>};
export type OutboundResponses = {[A in OutboundAction]: z.infer<(typeof responseSchemas)[A]>};

export const OUTBOUND_REQUEST_SCHEMAS: {[A in OutboundAction]: z.ZodType<OutboundRequests[A], z.ZodTypeDef, unknown>} =
  requestSchemas;
export const OUTBOUND_RESPONSE_SCHEMAS: {
  [A in OutboundAction]: z.ZodType<OutboundResponses[A], z.ZodTypeDef, unknown>;
} = responseSchemas;
