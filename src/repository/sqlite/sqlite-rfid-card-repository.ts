import {RfidCardRepository} from '../database';
import {Database} from 'sqlite';
import {ChargerUsePermit, DriverPricing, RfidCard} from '../../model/rfid-card';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

interface RfidCardRow {
  idTag: string;
  companyId: number | null;
  driverId: number | null;
  enabled: number;
  expiresOn: string | null;
}

interface ChargerUsePermitRow {
  companyId: number;
  siteId: number;
  driverId: number;
  enabled: number;
}

interface DriverPricingRow {
  driverId: number;
  driverGroupId: number | null;
  tariffId: number | null;
  discountId: number | null;
}

export class SqliteRfidCardRepository implements RfidCardRepository {
  constructor(private db: Database) {
    logger.debug('SqliteRfidCardRepository instantiated.');
  }

  async getCard(idTag: string): Promise<RfidCard | null> {
    try {
      const row = await this.db.get<RfidCardRow>('SELECT * FROM rfid_cards WHERE idTag = ?', idTag);
      if (!row) {
        return null;
      }
      return {
        idTag: row.idTag,
        companyId: row.companyId,
        driverId: row.driverId,
        enabled: row.enabled === 1,
        expiresOn: row.expiresOn,
      };
    } catch (error) {
      logger.error(error, `Error in getCard for idTag: ${idTag}`);
      throw new PersistenceError(`Failed to load RFID card ${idTag}`, {cause: error});
    }
  }

  async getUsePermit(companyId: number, siteId: number, driverId: number): Promise<ChargerUsePermit | null> {
    try {
      const row = await this.db.get<ChargerUsePermitRow>(
        'SELECT * FROM charger_use_permits WHERE companyId = ? AND siteId = ? AND driverId = ?',
        companyId,
        siteId,
        driverId
      );
      if (!row) {
        return null;
      }
      return {companyId: row.companyId, siteId: row.siteId, driverId: row.driverId, enabled: row.enabled === 1};
    } catch (error) {
      logger.error(error, `Error in getUsePermit for driver ${driverId} at site ${siteId}`);
      throw new PersistenceError(`Failed to load use permit of driver ${driverId}`, {cause: error});
    }
  }

  async getDriverPricing(idTag: string): Promise<DriverPricing | null> {
    try {
      const row = await this.db.get<DriverPricingRow>(
        `
            SELECT d.id         AS driverId,
                   g.id         AS driverGroupId,
                   g.tariffId   AS tariffId,
                   g.discountId AS discountId
            FROM rfid_cards c
                     JOIN drivers d ON d.id = c.driverId
                     LEFT JOIN driver_groups g ON g.id = d.groupId AND g.enabled = 1
            WHERE c.idTag = ?
        `,
        idTag
      );
      if (!row) {
        logger.debug(`No driver pricing found for idTag: ${idTag}`);
        return null;
      }
      return {
        driverId: row.driverId,
        driverGroupId: row.driverGroupId,
        tariffId: row.tariffId,
        discountId: row.discountId,
      };
    } catch (error) {
      logger.error(error, `Error in getDriverPricing for idTag: ${idTag}`);
      throw new PersistenceError(`Failed to load driver pricing for ${idTag}`, {cause: error});
    }
  }
}
