export type PaymentStatus = 'pending' | 'succeeded' | 'failed' | 'canceled' | 'refunded';

export const SESSION_PAYMENT_STATUSES = ['pending', 'paid', 'failed', 'canceled', 'refunded', 'unknown'] as const;

export type SessionPaymentStatus = (typeof SESSION_PAYMENT_STATUSES)[number];

export type PaymentTransaction = {
  id: number;
  methodId: number | null;
  driverId: number | null;
  companyId: number | null;
  siteId: number | null;
  chargerId: number | null;
  sessionId: number | null;
  amount: number;
  status: string;
  // Kept as stored; the gateway may report values outside PaymentStatus
  paymentStatus: string;
  externalIntentId: string | null;
  createdAt: string;
  updatedAt: string;
};

export type NewPaymentTransaction = Omit<PaymentTransaction, 'id' | 'updatedAt' | 'externalIntentId'> & {
  externalIntentId?: string | null;
};

export type PaymentTransactionUpdate = {
  amount?: number;
  status?: string;
  paymentStatus?: string;
  sessionId?: number | null;
  externalIntentId?: string | null;
};

export type PaymentMethod = {
  id: number;
  companyId: number | null;
  name: string;
  enabled: boolean;
};
