import {TariffRepository} from '../database';
import {Database} from 'sqlite';
import {Tariff} from '../../model/tariff';
import {PersistenceError} from '../../errors';
import logger from '../../logger';

interface TariffRow {
  id: number;
  companyId: number | null;
  name: string;
  enabled: number;
  type: string | null;
  per: string | null;
  dayRate: number | null;
  nightRate: number | null;
  daytimeFrom: string | null;
  daytimeTo: string | null;
  fixedStartFee: number | null;
  idleFee: number | null;
  idleGraceMinutes: number | null;
}

export class SqliteTariffRepository implements TariffRepository {
  constructor(private db: Database) {
    logger.debug('SqliteTariffRepository instantiated.');
  }

  async getTariff(tariffId: number): Promise<Tariff | null> {
    try {
      const row = await this.db.get<TariffRow>('SELECT * FROM tariffs WHERE id = ?', tariffId);
      if (!row) {
        logger.info(`No tariff found for id: ${tariffId}`);
        return null;
      }
      return {...row, enabled: row.enabled === 1};
    } catch (error) {
      logger.error(error, `Error in getTariff for id: ${tariffId}`);
      throw new PersistenceError(`Failed to load tariff ${tariffId}`, {cause: error});
    }
  }
}
