import {ConnectorRepository} from '../database';
import {Database} from 'sqlite';
import {CONNECTOR_STATUSES, Connector, ConnectorStatusUpdate} from '../../model/connector';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

interface ConnectorRow {
  chargerId: number;
  connectorId: number;
  status: string;
  errorCode: string | null;
  enabled: number;
  updatedAt: string;
}

export class SqliteConnectorRepository implements ConnectorRepository {
  constructor(private db: Database) {
    logger.debug('SqliteConnectorRepository instantiated.');
  }

  async getConnector(chargerId: number, connectorId: number): Promise<Connector | null> {
    try {
      const row = await this.db.get<ConnectorRow>(
        'SELECT * FROM connectors WHERE chargerId = ? AND connectorId = ?',
        chargerId,
        connectorId
      );
      if (!row) {
        return null;
      }
      return {
        chargerId: row.chargerId,
        connectorId: row.connectorId,
        status: CONNECTOR_STATUSES.find((status) => status === row.status) ?? 'Unavailable',
        errorCode: row.errorCode,
        enabled: row.enabled === 1,
        updatedAt: row.updatedAt,
      };
    } catch (error) {
      logger.error(error, `Error in getConnector for ${chargerId}/${connectorId}`);
      throw new PersistenceError(`Failed to load connector ${chargerId}/${connectorId}`, {cause: error});
    }
  }

  async upsertStatus(update: ConnectorStatusUpdate): Promise<void> {
    const {chargerId, connectorId, status, at} = update;
    logger.debug(`Entering upsertStatus for ${chargerId}/${connectorId}: ${status}`);
    try {
      // errorCode is only overwritten when the caller supplies one
      await this.db.run(
        `
            INSERT INTO connectors (chargerId, connectorId, status, errorCode, createdAt, updatedAt)
            VALUES (?, ?, ?, ?, ?, ?)
            ON CONFLICT (chargerId, connectorId) DO UPDATE
                SET status    = excluded.status,
                    errorCode = CASE WHEN ? THEN excluded.errorCode ELSE connectors.errorCode END,
                    updatedAt = excluded.updatedAt
        `,
        chargerId,
        connectorId,
        status,
        update.errorCode ?? null,
        at,
        at,
        update.errorCode !== undefined ? 1 : 0
      );
      logger.info(`Connector ${chargerId}/${connectorId} is now ${status}`);
    } catch (error) {
      logger.error(error, `Error in upsertStatus for ${chargerId}/${connectorId}`);
      throw new PersistenceError(`Failed to update connector ${chargerId}/${connectorId}`, {cause: error});
    }
  }
}
