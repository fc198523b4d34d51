import {PaymentTransactionRepository} from '../database';
import {Database} from 'sqlite';
import {
  NewPaymentTransaction,
  PaymentMethod,
  PaymentTransaction,
  PaymentTransactionUpdate,
} from '../../model/payment-transaction';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

interface PaymentMethodRow {
  id: number;
  companyId: number | null;
  name: string;
  enabled: number;
}

export class SqlitePaymentTransactionRepository implements PaymentTransactionRepository {
  constructor(private db: Database) {
    logger.debug('SqlitePaymentTransactionRepository instantiated.');
  }

  async addTransaction(transaction: NewPaymentTransaction): Promise<PaymentTransaction> {
    logger.debug(`Entering addTransaction for session ${transaction.sessionId}`);
    try {
      const result = await this.db.run(
        `
            INSERT INTO payment_transactions (id, methodId, driverId, companyId, siteId, chargerId, sessionId, amount,
                                              status, paymentStatus, externalIntentId, createdAt, updatedAt)
            SELECT COALESCE(MAX(id), 0) + 1, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            FROM payment_transactions
        `,
        transaction.methodId,
        transaction.driverId,
        transaction.companyId,
        transaction.siteId,
        transaction.chargerId,
        transaction.sessionId,
        transaction.amount,
        transaction.status,
        transaction.paymentStatus,
        transaction.externalIntentId ?? null,
        transaction.createdAt,
        transaction.createdAt
      );
      if (!result.lastID) {
        throw new Error('Failed to retrieve payment transaction id');
      }
      logger.info(`Payment transaction ${result.lastID} added for session ${transaction.sessionId}`);
      return {
        ...transaction,
        id: result.lastID,
        externalIntentId: transaction.externalIntentId ?? null,
        updatedAt: transaction.createdAt,
      };
    } catch (error) {
      logger.error(error, `Error in addTransaction for session ${transaction.sessionId}`);
      throw new PersistenceError('Failed to add payment transaction', {cause: error});
    }
  }

  async getTransaction(transactionId: number): Promise<PaymentTransaction | null> {
    try {
      const row = await this.db.get<PaymentTransaction>('SELECT * FROM payment_transactions WHERE id = ?', transactionId);
      return row ?? null;
    } catch (error) {
      logger.error(error, `Error in getTransaction for id: ${transactionId}`);
      throw new PersistenceError(`Failed to load payment transaction ${transactionId}`, {cause: error});
    }
  }

  async getTransactionByIntentId(externalIntentId: string): Promise<PaymentTransaction | null> {
    try {
      const row = await this.db.get<PaymentTransaction>(
        'SELECT * FROM payment_transactions WHERE externalIntentId = ?',
        externalIntentId
      );
      return row ?? null;
    } catch (error) {
      logger.error(error, `Error in getTransactionByIntentId for intent: ${externalIntentId}`);
      throw new PersistenceError(`Failed to load payment transaction for intent ${externalIntentId}`, {cause: error});
    }
  }

  async getLatestForSession(sessionId: number): Promise<PaymentTransaction | null> {
    try {
      const row = await this.db.get<PaymentTransaction>(
        'SELECT * FROM payment_transactions WHERE sessionId = ? ORDER BY createdAt DESC, id DESC LIMIT 1',
        sessionId
      );
      return row ?? null;
    } catch (error) {
      logger.error(error, `Error in getLatestForSession for session ${sessionId}`);
      throw new PersistenceError(`Failed to load payment transactions of session ${sessionId}`, {cause: error});
    }
  }

  async updateTransaction(transactionId: number, updates: PaymentTransactionUpdate, at: string): Promise<void> {
    logger.debug({updates}, `Entering updateTransaction for payment transaction ${transactionId}`);
    const columns: string[] = [];
    const values: Array<string | number | null> = [];

    if (updates.amount !== undefined) {
      columns.push('amount = ?');
      values.push(updates.amount);
    }
    if (updates.status !== undefined) {
      columns.push('status = ?');
      values.push(updates.status);
    }
    if (updates.paymentStatus !== undefined) {
      columns.push('paymentStatus = ?');
      values.push(updates.paymentStatus);
    }
    if (updates.sessionId !== undefined) {
      columns.push('sessionId = ?');
      values.push(updates.sessionId);
    }
    if (updates.externalIntentId !== undefined) {
      columns.push('externalIntentId = ?');
      values.push(updates.externalIntentId);
    }

    if (columns.length === 0) {
      logger.debug(`No updates provided for payment transaction ${transactionId}`);
      return;
    }
    columns.push('updatedAt = ?');
    values.push(at);

    try {
      await this.db.run(`UPDATE payment_transactions SET ${columns.join(', ')} WHERE id = ?`, ...values, transactionId);
      logger.info(`Payment transaction ${transactionId} updated`);
    } catch (error) {
      logger.error(error, `Error in updateTransaction for payment transaction ${transactionId}`);
      throw new PersistenceError(`Failed to update payment transaction ${transactionId}`, {cause: error});
    }
  }

  async getDefaultPaymentMethod(companyId: number): Promise<PaymentMethod | null> {
    try {
      const row = await this.db.get<PaymentMethodRow>(
        'SELECT * FROM payment_methods WHERE companyId = ? AND enabled = 1 ORDER BY id LIMIT 1',
        companyId
      );
      return row ? {id: row.id, companyId: row.companyId, name: row.name, enabled: row.enabled === 1} : null;
    } catch (error) {
      logger.error(error, `Error in getDefaultPaymentMethod for company ${companyId}`);
      throw new PersistenceError(`Failed to load payment method of company ${companyId}`, {cause: error});
    }
  }
}
