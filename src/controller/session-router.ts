import express from 'express';
import type {NextFunction, Request, Response} from 'express';
import {SessionController} from './session-controller';
import type {ChargeSessionTracker} from '../service/charge-session-tracker';
import type {PaymentStatusSynchronizer} from '../service/payment-status-synchronizer';

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Forwards rejected handlers to the express error middleware
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function createSessionRouter(synchronizer: PaymentStatusSynchronizer, tracker: ChargeSessionTracker) {
  const router = express.Router();
  const sessionController = new SessionController(synchronizer, tracker);

  router.get(
    '/sessions/unpaid',
    route((req, res) => sessionController.listUnpaid(req, res))
  );

  router.get(
    '/sessions/:sessionId/payment-status',
    route((req, res) => sessionController.getPaymentStatus(req, res))
  );

  router.get(
    '/sessions/:sessionId/telemetry',
    route((req, res) => sessionController.getTelemetry(req, res))
  );

  router.post(
    '/payment-transactions/:transactionId/status',
    route((req, res) => sessionController.updateTransactionStatus(req, res))
  );

  router.post(
    '/payment-events',
    route((req, res) => sessionController.receivePaymentEvent(req, res))
  );

  return router;
}
