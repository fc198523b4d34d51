import {RfidCardRepository} from '../repository/database';
import {ChargerContext} from '../model/charger';
import {AuthorizationStatus} from '../model/rfid-card';
import logger from '../logger';

/**
 * Decides whether an RFID tag may be used on a charger. Always resolves to a terminal status;
 * a failed lookup counts as an unknown tag.
 */
export class AuthorizationService {
  constructor(
    private rfidCards: RfidCardRepository,
    private now: () => Date = () => new Date()
  ) {}

  async authorize(idTag: string | null | undefined, charger: ChargerContext): Promise<AuthorizationStatus> {
    if (!idTag) {
      logger.warn(`Authorization requested without idTag on ${charger.identity}`);
      return 'Invalid';
    }
    try {
      const card = await this.rfidCards.getCard(idTag);
      if (!card) {
        logger.info(`Unknown idTag ${idTag} on ${charger.identity}`);
        return 'Invalid';
      }
      if (!card.enabled) {
        logger.info(`Disabled idTag ${idTag} on ${charger.identity}`);
        return 'Blocked';
      }
      // Cards stay valid through the whole expiry day (UTC)
      if (card.expiresOn && this.now().toISOString().slice(0, 10) > card.expiresOn.slice(0, 10)) {
        logger.info(`Expired idTag ${idTag} on ${charger.identity}`);
        return 'Expired';
      }
      if (card.driverId !== null && charger.companyId !== null && charger.siteId !== null) {
        const permit = await this.rfidCards.getUsePermit(charger.companyId, charger.siteId, card.driverId);
        if (permit && !permit.enabled) {
          logger.info(`Driver ${card.driverId} is not permitted at site ${charger.siteId}`);
          return 'Blocked';
        }
      }
      return 'Accepted';
    } catch (err) {
      logger.error(err, `Authorization of ${idTag} failed on ${charger.identity}`);
      return 'Invalid';
    }
  }
}
