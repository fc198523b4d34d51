import {ChargeSessionRepository, PaymentTransactionRepository} from '../repository/database';
import {ChargeSession, UnpaidSessionFilter} from '../model/charge-session';
import {PaymentStatus, PaymentTransaction, SessionPaymentStatus} from '../model/payment-transaction';
import logger from '../logger';

const SESSION_STATUS_BY_PAYMENT_STATUS: Record<PaymentStatus, SessionPaymentStatus> = {
  pending: 'pending',
  succeeded: 'paid',
  failed: 'failed',
  canceled: 'canceled',
  refunded: 'refunded',
};

const PAYMENT_STATUS_BY_GATEWAY_EVENT = new Map<string, PaymentStatus>([
  ['payment_intent.succeeded', 'succeeded'],
  ['payment_intent.payment_failed', 'failed'],
  ['payment_intent.canceled', 'canceled'],
]);

export function toSessionPaymentStatus(paymentStatus: string): SessionPaymentStatus {
  const match = Object.entries(SESSION_STATUS_BY_PAYMENT_STATUS).find(([status]) => status === paymentStatus);
  return match ? match[1] : 'unknown';
}

export type TransactionReference = {transactionId: number} | {externalIntentId: string};

export interface SessionPaymentProjection {
  sessionId: number;
  paymentTransactionId: number | null;
  paymentStatus: SessionPaymentStatus | null;
  paymentAmount: number | null;
}

export interface SessionPaymentSummary {
  sessionId: number;
  sessionPaymentStatus: SessionPaymentStatus | null;
  sessionCost: number | null;
  paymentTransactionId: number | null;
  paymentRequired: boolean;
  transaction: {
    id: number;
    amount: number;
    status: string;
    paymentStatus: string;
    externalIntentId: string | null;
    methodId: number | null;
    createdAt: string;
  } | null;
}

/**
 * Keeps the payment fields of a session equal to its most recent payment transaction.
 * Every write path ends in {@link syncSession}, which derives the projection from stored state,
 * so repeating any operation leaves the session unchanged.
 */
export class PaymentStatusSynchronizer {
  constructor(
    private sessions: ChargeSessionRepository,
    private transactions: PaymentTransactionRepository,
    private now: () => Date = () => new Date()
  ) {}

  async onTransactionStatusChanged(
    reference: TransactionReference,
    paymentStatus: PaymentStatus
  ): Promise<SessionPaymentProjection | null> {
    const transaction = await this.findTransaction(reference);
    if (!transaction) {
      logger.warn({reference}, 'Payment status change for unknown transaction');
      return null;
    }
    await this.transactions.updateTransaction(transaction.id, {paymentStatus}, this.now().toISOString());
    logger.info(`Payment transaction ${transaction.id} is now ${paymentStatus}`);

    if (transaction.sessionId === null) {
      logger.debug(`Payment transaction ${transaction.id} is not linked to a session`);
      return null;
    }
    return this.syncSession(transaction.sessionId);
  }

  /** Maps a gateway webhook onto a status change. Events without a status mapping are ignored. */
  async onGatewayEvent(eventType: string, externalIntentId: string): Promise<SessionPaymentProjection | null> {
    const paymentStatus = PAYMENT_STATUS_BY_GATEWAY_EVENT.get(eventType);
    if (!paymentStatus) {
      logger.debug(`Ignoring gateway event ${eventType}`);
      return null;
    }
    return this.onTransactionStatusChanged({externalIntentId}, paymentStatus);
  }

  async syncSession(sessionId: number): Promise<SessionPaymentProjection> {
    const latest = await this.transactions.getLatestForSession(sessionId);
    const projection: SessionPaymentProjection = {
      sessionId,
      paymentTransactionId: latest ? latest.id : null,
      paymentStatus: latest ? toSessionPaymentStatus(latest.paymentStatus) : null,
      paymentAmount: latest ? latest.amount : null,
    };
    await this.sessions.updateSession(sessionId, {
      paymentTransactionId: projection.paymentTransactionId,
      paymentStatus: projection.paymentStatus,
      paymentAmount: projection.paymentAmount,
    });
    logger.debug({projection}, `Session ${sessionId} payment projection synced`);
    return projection;
  }

  /**
   * Sets the amount due on the session's latest transaction once the session was priced.
   * A free session no longer needs its payment, which is canceled.
   */
  async settleAmount(sessionId: number, amount: number): Promise<SessionPaymentProjection> {
    const latest = await this.transactions.getLatestForSession(sessionId);
    if (latest) {
      const at = this.now().toISOString();
      if (amount > 0) {
        await this.transactions.updateTransaction(latest.id, {amount, status: 'pending'}, at);
      } else {
        await this.transactions.updateTransaction(
          latest.id,
          {amount: 0, status: 'not_required', paymentStatus: 'canceled'},
          at
        );
      }
    }
    return this.syncSession(sessionId);
  }

  async statusFor(sessionId: number): Promise<SessionPaymentSummary | null> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) {
      return null;
    }
    const transaction =
      session.paymentTransactionId === null ? null : await this.transactions.getTransaction(session.paymentTransactionId);
    return {
      sessionId,
      sessionPaymentStatus: session.paymentStatus,
      sessionCost: session.cost,
      paymentTransactionId: session.paymentTransactionId,
      paymentRequired: (session.cost ?? 0) > 0,
      transaction: transaction && {
        id: transaction.id,
        amount: transaction.amount,
        status: transaction.status,
        paymentStatus: transaction.paymentStatus,
        externalIntentId: transaction.externalIntentId,
        methodId: transaction.methodId,
        createdAt: transaction.createdAt,
      },
    };
  }

  listUnpaidSessions(filter: UnpaidSessionFilter): Promise<ChargeSession[]> {
    return this.sessions.listUnpaidSessions(filter);
  }

  private findTransaction(reference: TransactionReference): Promise<PaymentTransaction | null> {
    if ('transactionId' in reference) {
      return this.transactions.getTransaction(reference.transactionId);
    }
    return this.transactions.getTransactionByIntentId(reference.externalIntentId);
  }
}
