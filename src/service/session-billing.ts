import {ChargeSessionRepository} from '../repository/database';
import {PaymentStatusSynchronizer} from './payment-status-synchronizer';
import {SessionCost, TariffEngine} from './tariff-engine';
import logger from '../logger';

/**
 * Prices closed sessions and passes the amount on to their payment. Works from the stored
 * energy and times only, so running it again for the same session writes the same values.
 */
export class SessionBilling {
  constructor(
    private sessions: ChargeSessionRepository,
    private tariffEngine: TariffEngine,
    private synchronizer: PaymentStatusSynchronizer
  ) {}

  async finalize(sessionId: number): Promise<SessionCost | null> {
    const session = await this.sessions.getSession(sessionId);
    if (!session || session.endTime === null) {
      logger.warn(`Session ${sessionId} is not closed, skipping billing`);
      return null;
    }
    if (session.tariffId === null) {
      logger.debug(`Session ${sessionId} has no tariff`);
      return null;
    }

    const cost = await this.tariffEngine.cost(
      session.tariffId,
      session.energyKWh ?? 0,
      session.startTime,
      session.endTime
    );
    await this.sessions.updateSession(sessionId, {cost: cost.amount});
    await this.synchronizer.settleAmount(sessionId, cost.amount);
    logger.info(`Session ${sessionId} billed ${cost.amount}`);
    return cost;
  }
}
