import {ChargerRepository} from '../database';
import {Database} from 'sqlite';
import {BootInfo, Charger, NewCharger} from '../../model/charger';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

interface ChargerRow {
  id: number;
  companyId: number | null;
  siteId: number | null;
  name: string;
  enabled: number;
  vendor: string | null;
  model: string | null;
  serialNumber: string | null;
  firmwareVersion: string | null;
  meterType: string | null;
  meterSerialNumber: string | null;
  isOnline: number;
  lastConnect: string | null;
  lastDisconnect: string | null;
  lastHeartbeat: string | null;
}

const toCharger = (row: ChargerRow): Charger =>
  new Charger(
    row.id,
    row.companyId,
    row.siteId,
    row.name,
    row.enabled === 1,
    row.vendor,
    row.model,
    row.serialNumber,
    row.firmwareVersion,
    row.meterType,
    row.meterSerialNumber,
    row.isOnline === 1,
    row.lastConnect,
    row.lastDisconnect,
    row.lastHeartbeat
  );

export class SqliteChargerRepository implements ChargerRepository {
  constructor(private db: Database) {
    logger.debug('SqliteChargerRepository instantiated.');
  }

  async addCharger(charger: NewCharger): Promise<Charger> {
    logger.debug(`Entering addCharger for name: ${charger.name}`);
    try {
      const result = await this.db.run(
        'INSERT INTO chargers (name, companyId, siteId, enabled) VALUES (?, ?, ?, ?)',
        charger.name,
        charger.companyId,
        charger.siteId,
        charger.enabled ? 1 : 0
      );
      if (!result.lastID) {
        throw new Error('Failed to retrieve charger id');
      }
      logger.info(`Charger added with id ${result.lastID}: ${charger.name}`);
      return new Charger(result.lastID, charger.companyId, charger.siteId, charger.name, charger.enabled);
    } catch (error) {
      logger.error(error, `Error in addCharger for name: ${charger.name}`);
      throw new PersistenceError(`Failed to add charger ${charger.name}`, {cause: error});
    }
  }

  async getCharger(name: string): Promise<Charger | null> {
    logger.debug(`Entering getCharger with name: ${name}`);
    try {
      const row = await this.db.get<ChargerRow>('SELECT * FROM chargers WHERE name = ?', name);
      if (!row) {
        logger.info(`No charger found for name: ${name}`);
        return null;
      }
      return toCharger(row);
    } catch (error) {
      logger.error(error, `Error in getCharger for name: ${name}`);
      throw new PersistenceError(`Failed to load charger ${name}`, {cause: error});
    }
  }

  async updateBootInfo(chargerId: number, info: BootInfo, at: string): Promise<void> {
    logger.debug({info}, `Entering updateBootInfo for charger ${chargerId}`);
    try {
      await this.db.run(
        `
            UPDATE chargers
            SET vendor            = ?,
                model             = ?,
                serialNumber      = COALESCE(?, serialNumber),
                firmwareVersion   = COALESCE(?, firmwareVersion),
                meterType         = COALESCE(?, meterType),
                meterSerialNumber = COALESCE(?, meterSerialNumber),
                isOnline          = 1,
                lastConnect       = ?,
                updatedAt         = ?
            WHERE id = ?
        `,
        info.vendor,
        info.model,
        info.serialNumber,
        info.firmwareVersion,
        info.meterType,
        info.meterSerialNumber,
        at,
        at,
        chargerId
      );
      logger.info(`Charger boot info updated for charger ${chargerId}`);
    } catch (error) {
      logger.error(error, `Error in updateBootInfo for charger ${chargerId}`);
      throw new PersistenceError(`Failed to update boot info of charger ${chargerId}`, {cause: error});
    }
  }

  async recordHeartbeat(chargerId: number, at: string): Promise<void> {
    try {
      await this.db.run(
        'UPDATE chargers SET lastHeartbeat = ?, isOnline = 1, updatedAt = ? WHERE id = ?',
        at,
        at,
        chargerId
      );
    } catch (error) {
      logger.error(error, `Error in recordHeartbeat for charger ${chargerId}`);
      throw new PersistenceError(`Failed to record heartbeat of charger ${chargerId}`, {cause: error});
    }
  }

  async markOnline(name: string, at: string): Promise<void> {
    try {
      await this.db.run('UPDATE chargers SET isOnline = 1, lastConnect = ?, updatedAt = ? WHERE name = ?', at, at, name);
      logger.debug(`Charger ${name} marked online`);
    } catch (error) {
      logger.error(error, `Error in markOnline for name: ${name}`);
      throw new PersistenceError(`Failed to mark charger ${name} online`, {cause: error});
    }
  }

  async markOffline(name: string, at: string): Promise<void> {
    try {
      await this.db.run(
        'UPDATE chargers SET isOnline = 0, lastDisconnect = ?, updatedAt = ? WHERE name = ?',
        at,
        at,
        name
      );
      logger.debug(`Charger ${name} marked offline`);
    } catch (error) {
      logger.error(error, `Error in markOffline for name: ${name}`);
      throw new PersistenceError(`Failed to mark charger ${name} offline`, {cause: error});
    }
  }
}
