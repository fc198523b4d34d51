import type {SessionPaymentStatus} from './payment-transaction';

export const SESSION_STATUSES = ['Started', 'Completed'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type ChargeSession = {
  id: number;
  companyId: number | null;
  siteId: number | null;
  chargerId: number;
  connectorId: number;
  driverId: number | null;
  idTag: string;
  startTime: string;
  endTime: string | null;
  status: SessionStatus;
  durationSeconds: number | null;
  energyKWh: number | null;
  stopReason: string | null;
  tariffId: number | null;
  discountId: number | null;
  cost: number | null;
  paymentTransactionId: number | null;
  paymentStatus: SessionPaymentStatus | null;
  paymentAmount: number | null;
};

export type NewChargeSession = {
  companyId: number | null;
  siteId: number | null;
  chargerId: number;
  connectorId: number;
  driverId: number | null;
  idTag: string;
  startTime: string;
  tariffId: number | null;
  discountId: number | null;
};

/**
 * Fields a session row may change after it was opened. Every field is applied by name;
 * `undefined` leaves the column untouched, `null` clears it.
 */
export type ChargeSessionUpdate = {
  endTime?: string;
  status?: SessionStatus;
  durationSeconds?: number;
  energyKWh?: number;
  stopReason?: string;
  cost?: number;
  paymentTransactionId?: number | null;
  paymentStatus?: SessionPaymentStatus | null;
  paymentAmount?: number | null;
};

export type UnpaidSessionFilter = {
  companyId?: number;
  siteId?: number;
  chargerId?: number;
  limit?: number;
};
