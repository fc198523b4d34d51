import {ChargeSessionRepository} from '../database';
import {Database} from 'sqlite';
import {
  ChargeSession,
  ChargeSessionUpdate,
  NewChargeSession,
  SESSION_STATUSES,
  UnpaidSessionFilter,
} from '../../model/charge-session';
import {SESSION_PAYMENT_STATUSES} from '../../model/payment-transaction';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

const DEFAULT_UNPAID_LIMIT = 100;

interface ChargeSessionRow {
  id: number;
  companyId: number | null;
  siteId: number | null;
  chargerId: number;
  connectorId: number;
  driverId: number | null;
  idTag: string;
  startTime: string;
  endTime: string | null;
  status: string;
  durationSeconds: number | null;
  energyKWh: number | null;
  stopReason: string | null;
  tariffId: number | null;
  discountId: number | null;
  cost: number | null;
  paymentTransactionId: number | null;
  paymentStatus: string | null;
  paymentAmount: number | null;
}

const toChargeSession = (row: ChargeSessionRow): ChargeSession => ({
  id: row.id,
  companyId: row.companyId,
  siteId: row.siteId,
  chargerId: row.chargerId,
  connectorId: row.connectorId,
  driverId: row.driverId,
  idTag: row.idTag,
  startTime: row.startTime,
  endTime: row.endTime,
  status: SESSION_STATUSES.find((status) => status === row.status) ?? 'Started',
  durationSeconds: row.durationSeconds,
  energyKWh: row.energyKWh,
  stopReason: row.stopReason,
  tariffId: row.tariffId,
  discountId: row.discountId,
  cost: row.cost,
  paymentTransactionId: row.paymentTransactionId,
  paymentStatus:
    row.paymentStatus === null
      ? null
      : (SESSION_PAYMENT_STATUSES.find((status) => status === row.paymentStatus) ?? 'unknown'),
  paymentAmount: row.paymentAmount,
});

export class SqliteChargeSessionRepository implements ChargeSessionRepository {
  constructor(private db: Database) {
    logger.debug('SqliteChargeSessionRepository instantiated.');
  }

  async insertSession(session: NewChargeSession): Promise<number> {
    logger.debug(`Entering insertSession for charger ${session.chargerId}/${session.connectorId}`);
    try {
      const result = await this.db.run(
        `
            INSERT INTO charge_sessions (id, companyId, siteId, chargerId, connectorId, driverId, idTag,
                                         startTime, status, tariffId, discountId, createdAt)
            SELECT COALESCE(MAX(id), 0) + 1, ?, ?, ?, ?, ?, ?, ?, 'Started', ?, ?, ?
            FROM charge_sessions
        `,
        session.companyId,
        session.siteId,
        session.chargerId,
        session.connectorId,
        session.driverId,
        session.idTag,
        session.startTime,
        session.tariffId,
        session.discountId,
        new Date().toISOString()
      );
      if (!result.lastID) {
        throw new Error('Failed to retrieve session id');
      }
      logger.info(`Charge session ${result.lastID} inserted for charger ${session.chargerId}/${session.connectorId}`);
      return result.lastID;
    } catch (error) {
      logger.error(error, `Error in insertSession for charger ${session.chargerId}/${session.connectorId}`);
      throw new PersistenceError('Failed to insert charge session', {cause: error});
    }
  }

  async getSession(sessionId: number): Promise<ChargeSession | null> {
    try {
      const row = await this.db.get<ChargeSessionRow>('SELECT * FROM charge_sessions WHERE id = ?', sessionId);
      return row ? toChargeSession(row) : null;
    } catch (error) {
      logger.error(error, `Error in getSession for session ${sessionId}`);
      throw new PersistenceError(`Failed to load charge session ${sessionId}`, {cause: error});
    }
  }

  async findOpenSession(chargerId: number, connectorId: number): Promise<ChargeSession | null> {
    try {
      const row = await this.db.get<ChargeSessionRow>(
        'SELECT * FROM charge_sessions WHERE chargerId = ? AND connectorId = ? AND endTime IS NULL',
        chargerId,
        connectorId
      );
      return row ? toChargeSession(row) : null;
    } catch (error) {
      logger.error(error, `Error in findOpenSession for charger ${chargerId}/${connectorId}`);
      throw new PersistenceError(`Failed to look up open session on ${chargerId}/${connectorId}`, {cause: error});
    }
  }

  async updateSession(sessionId: number, updates: ChargeSessionUpdate): Promise<void> {
    logger.debug({updates}, `Entering updateSession for session ${sessionId}`);
    const columns: string[] = [];
    const values: Array<string | number | null> = [];

    if (updates.endTime !== undefined) {
      columns.push('endTime = ?');
      values.push(updates.endTime);
    }
    if (updates.status !== undefined) {
      columns.push('status = ?');
      values.push(updates.status);
    }
    if (updates.durationSeconds !== undefined) {
      columns.push('durationSeconds = ?');
      values.push(updates.durationSeconds);
    }
    if (updates.energyKWh !== undefined) {
      columns.push('energyKWh = ?');
      values.push(updates.energyKWh);
    }
    if (updates.stopReason !== undefined) {
      columns.push('stopReason = ?');
      values.push(updates.stopReason);
    }
    if (updates.cost !== undefined) {
      columns.push('cost = ?');
      values.push(updates.cost);
    }
    if (updates.paymentTransactionId !== undefined) {
      columns.push('paymentTransactionId = ?');
      values.push(updates.paymentTransactionId);
    }
    if (updates.paymentStatus !== undefined) {
      columns.push('paymentStatus = ?');
      values.push(updates.paymentStatus);
    }
    if (updates.paymentAmount !== undefined) {
      columns.push('paymentAmount = ?');
      values.push(updates.paymentAmount);
    }

    if (columns.length === 0) {
      logger.debug(`No updates provided for session ${sessionId}`);
      return;
    }

    try {
      await this.db.run(`UPDATE charge_sessions SET ${columns.join(', ')} WHERE id = ?`, ...values, sessionId);
      logger.debug(`Charge session ${sessionId} updated`);
    } catch (error) {
      logger.error(error, `Error in updateSession for session ${sessionId}`);
      throw new PersistenceError(`Failed to update charge session ${sessionId}`, {cause: error});
    }
  }

  async listUnpaidSessions(filter: UnpaidSessionFilter): Promise<ChargeSession[]> {
    logger.debug({filter}, 'Entering listUnpaidSessions');
    let query = `
        SELECT * FROM charge_sessions
        WHERE cost > 0
          AND (paymentStatus IS NULL OR paymentStatus IN ('pending', 'failed', 'unknown'))
    `;
    const params: number[] = [];

    if (filter.companyId !== undefined) {
      query += ' AND companyId = ?';
      params.push(filter.companyId);
    }
    if (filter.siteId !== undefined) {
      query += ' AND siteId = ?';
      params.push(filter.siteId);
    }
    if (filter.chargerId !== undefined) {
      query += ' AND chargerId = ?';
      params.push(filter.chargerId);
    }
    query += ' ORDER BY startTime DESC, id DESC LIMIT ?';
    params.push(filter.limit ?? DEFAULT_UNPAID_LIMIT);

    try {
      const rows = await this.db.all<ChargeSessionRow[]>(query, ...params);
      logger.debug(`Retrieved ${rows.length} unpaid session(s).`);
      return rows.map(toChargeSession);
    } catch (error) {
      logger.error(error, 'Error in listUnpaidSessions');
      throw new PersistenceError('Failed to list unpaid sessions', {cause: error});
    }
  }
}
