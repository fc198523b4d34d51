import type {Request, Response} from 'express';
import {z} from 'zod';
import {ChargeSessionTracker} from '../service/charge-session-tracker';
import {PaymentStatusSynchronizer} from '../service/payment-status-synchronizer';
import logger from '../logger';

const IdParamSchema = z.coerce.number().int().positive();

const UnpaidQuerySchema = z.object({
  companyId: z.coerce.number().int().positive().optional(),
  siteId: z.coerce.number().int().positive().optional(),
  chargerId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const TransactionStatusSchema = z.object({
  paymentStatus: z.enum(['pending', 'succeeded', 'failed', 'canceled', 'refunded']),
});

const PaymentEventSchema = z.object({
  type: z.string().min(1),
  externalIntentId: z.string().min(1),
});

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

export class SessionController {
  constructor(
    private synchronizer: PaymentStatusSynchronizer,
    private tracker: ChargeSessionTracker
  ) {}

  async listUnpaid(req: Request, res: Response) {
    const query = UnpaidQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({error: 'Invalid filter', issues: describeIssues(query.error)});
    }
    logger.info({filters: query.data}, 'Entering listUnpaid');
    const sessions = await this.synchronizer.listUnpaidSessions(query.data);
    return res.json({count: sessions.length, sessions});
  }

  async getPaymentStatus(req: Request, res: Response) {
    const sessionId = IdParamSchema.safeParse(req.params.sessionId);
    if (!sessionId.success) {
      return res.status(400).json({error: 'Invalid session id'});
    }
    const summary = await this.synchronizer.statusFor(sessionId.data);
    if (!summary) {
      return res.status(404).json({error: `Session ${sessionId.data} not found`});
    }
    return res.json(summary);
  }

  async getTelemetry(req: Request, res: Response) {
    const sessionId = IdParamSchema.safeParse(req.params.sessionId);
    if (!sessionId.success) {
      return res.status(400).json({error: 'Invalid session id'});
    }
    const session = await this.tracker.getSession(sessionId.data);
    if (!session) {
      return res.status(404).json({error: `Session ${sessionId.data} not found`});
    }
    const [timeline, maxPowerKW, meteredEnergyKWh] = await Promise.all([
      this.tracker.timeline(session.id),
      this.tracker.maxPower(session.id),
      this.tracker.energyFor(session.id),
    ]);
    return res.json({
      sessionId: session.id,
      status: session.status,
      startTime: session.startTime,
      endTime: session.endTime,
      energyKWh: session.energyKWh,
      meteredEnergyKWh,
      maxPowerKW,
      timeline,
    });
  }

  async updateTransactionStatus(req: Request, res: Response) {
    const transactionId = IdParamSchema.safeParse(req.params.transactionId);
    const body = TransactionStatusSchema.safeParse(req.body);
    if (!transactionId.success || !body.success) {
      return res.status(400).json({error: 'Expected a numeric transaction id and a known paymentStatus'});
    }
    logger.info(`Payment transaction ${transactionId.data} reported ${body.data.paymentStatus}`);
    const projection = await this.synchronizer.onTransactionStatusChanged(
      {transactionId: transactionId.data},
      body.data.paymentStatus
    );
    return res.json({transactionId: transactionId.data, session: projection});
  }

  async receivePaymentEvent(req: Request, res: Response) {
    const event = PaymentEventSchema.safeParse(req.body);
    if (!event.success) {
      return res.status(400).json({error: 'Invalid payment event', issues: describeIssues(event.error)});
    }
    logger.info(`Payment gateway event ${event.data.type} for ${event.data.externalIntentId}`);
    const projection = await this.synchronizer.onGatewayEvent(event.data.type, event.data.externalIntentId);
    return res.json({received: true, session: projection});
  }
}
