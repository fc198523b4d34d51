import {EventRepository} from '../database';
import {Database} from 'sqlite';
import {ChargeEvent, ENERGY_REGISTER, NewChargeEvent} from '../../model/charge-event';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

const EVENT_TYPES = [
  'Authorize',
  'StatusNotification',
  'StartTransaction',
  'StopTransaction',
  'MeterValues',
  'DiagnosticsStatusNotification',
  'FirmwareStatusNotification',
] as const;

interface EventRow {
  id: number;
  type: string;
  timestamp: string;
  companyId: number | null;
  siteId: number | null;
  chargerId: number;
  connectorId: number | null;
  sessionId: number | null;
  measurand: string | null;
  meterValue: number | null;
  current: number | null;
  voltage: number | null;
  temperature: number | null;
  data: string | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseData = (text: string | null): Record<string, unknown> | null => {
  if (text === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(text);
  return isRecord(parsed) ? parsed : {value: parsed};
};

// Stored as UTC with milliseconds so that ordering by the text column is ordering by time
const toStoredTimestamp = (timestamp: string): string => {
  const millis = Date.parse(timestamp);
  return Number.isNaN(millis) ? timestamp : new Date(millis).toISOString();
};

const toChargeEvent = (row: EventRow): ChargeEvent => ({
  id: row.id,
  type: EVENT_TYPES.find((type) => type === row.type) ?? 'MeterValues',
  timestamp: row.timestamp,
  companyId: row.companyId,
  siteId: row.siteId,
  chargerId: row.chargerId,
  connectorId: row.connectorId,
  sessionId: row.sessionId,
  measurand: row.measurand,
  meterValue: row.meterValue,
  current: row.current,
  voltage: row.voltage,
  temperature: row.temperature,
  data: parseData(row.data),
});

export class SqliteEventRepository implements EventRepository {
  constructor(private db: Database) {
    logger.debug('SqliteEventRepository instantiated.');
  }

  async addEvent(event: NewChargeEvent): Promise<number> {
    try {
      const result = await this.db.run(
        `
            INSERT INTO events (type, timestamp, companyId, siteId, chargerId, connectorId, sessionId, measurand,
                                meterValue, current, voltage, temperature, data, createdAt)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `,
        event.type,
        toStoredTimestamp(event.timestamp),
        event.companyId,
        event.siteId,
        event.chargerId,
        event.connectorId,
        event.sessionId,
        event.measurand,
        event.meterValue,
        event.current,
        event.voltage,
        event.temperature,
        event.data === null ? null : JSON.stringify(event.data),
        new Date().toISOString()
      );
      if (!result.lastID) {
        throw new Error('Failed to retrieve event id');
      }
      logger.debug(`${event.type} event ${result.lastID} recorded for charger ${event.chargerId}`);
      return result.lastID;
    } catch (error) {
      logger.error(error, `Error in addEvent for ${event.type} on charger ${event.chargerId}`);
      throw new PersistenceError(`Failed to record ${event.type} event`, {cause: error});
    }
  }

  async getSessionSamples(sessionId: number): Promise<ChargeEvent[]> {
    try {
      const rows = await this.db.all<EventRow[]>(
        `
            SELECT * FROM events
            WHERE sessionId = ?
              AND type IN ('MeterValues', 'StartTransaction', 'StopTransaction')
            ORDER BY timestamp, id
        `,
        sessionId
      );
      return rows.map(toChargeEvent);
    } catch (error) {
      logger.error(error, `Error in getSessionSamples for session ${sessionId}`);
      throw new PersistenceError(`Failed to load samples of session ${sessionId}`, {cause: error});
    }
  }

  async getFirstEnergySample(sessionId: number): Promise<ChargeEvent | null> {
    try {
      const row = await this.db.get<EventRow>(
        `
            SELECT * FROM events
            WHERE sessionId = ?
              AND measurand = ?
              AND meterValue IS NOT NULL
            ORDER BY timestamp, id
            LIMIT 1
        `,
        sessionId,
        ENERGY_REGISTER
      );
      return row ? toChargeEvent(row) : null;
    } catch (error) {
      logger.error(error, `Error in getFirstEnergySample for session ${sessionId}`);
      throw new PersistenceError(`Failed to load first energy sample of session ${sessionId}`, {cause: error});
    }
  }
}
