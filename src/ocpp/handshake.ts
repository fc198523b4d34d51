import {ChargerRepository} from '../repository/database';
import {Charger, ChargerContext} from '../model/charger';
import {CloseCode, HandshakeError} from '../errors';
import logger from '../logger';

/** Admits registered, enabled chargers. Identity lookup ignores case. */
export class HandshakeVerifier {
  constructor(private chargers: Pick<ChargerRepository, 'getCharger'>) {}

  async verify(identity: string): Promise<ChargerContext> {
    let charger: Charger | null;
    try {
      charger = await this.chargers.getCharger(identity);
    } catch (err) {
      logger.error(err, `Charger lookup failed for ${identity}`);
      throw new HandshakeError(CloseCode.VerificationFailed, 'Internal server error');
    }
    if (!charger) {
      throw new HandshakeError(CloseCode.ChargerUnknown, 'Charger not registered in system');
    }
    if (!charger.enabled) {
      throw new HandshakeError(CloseCode.ChargerDisabled, 'Charger is disabled');
    }
    logger.debug(`Charger ${identity} verified as ${charger.name} (#${charger.id})`);
    return charger.context();
  }
}
