import {Logger} from 'pino';
import {
  ChargerRepository,
  ConnectorRepository,
  EventRepository,
  PaymentTransactionRepository,
  RfidCardRepository,
} from '../repository/database';
import {ChargerContext} from '../model/charger';
import {ChargeEventType, ENERGY_REGISTER} from '../model/charge-event';
import {DriverPricing} from '../model/rfid-card';
import {AuthorizationService} from '../service/authorization-service';
import {ChargeSessionTracker, classifySampledValue} from '../service/charge-session-tracker';
import {PaymentStatusSynchronizer} from '../service/payment-status-synchronizer';
import {SessionBilling} from '../service/session-billing';
import {createDispatchTable, DispatchTable, handled, unsupported} from './dispatch-table';
import {
  AuthorizeRequest,
  AuthorizeRequestSchema,
  AuthorizeResponse,
  BootNotificationRequest,
  BootNotificationRequestSchema,
  BootNotificationResponse,
  DiagnosticsStatusNotificationRequestSchema,
  EmptyResponse,
  FirmwareStatusNotificationRequestSchema,
  HeartbeatRequestSchema,
  HeartbeatResponse,
  MeterValue,
  MeterValuesRequest,
  MeterValuesRequestSchema,
  StartTransactionRequest,
  StartTransactionRequestSchema,
  StartTransactionResponse,
  StatusNotificationRequest,
  StatusNotificationRequestSchema,
  StopTransactionRequest,
  StopTransactionRequestSchema,
  StopTransactionResponse,
} from './messages';

export interface ChargePointServices {
  chargers: ChargerRepository;
  connectors: ConnectorRepository;
  events: EventRepository;
  rfidCards: RfidCardRepository;
  payments: PaymentTransactionRepository;
  authorization: AuthorizationService;
  tracker: ChargeSessionTracker;
  billing: SessionBilling;
  synchronizer: PaymentStatusSynchronizer;
  heartbeatIntervalSec: number;
}

interface EventDetails {
  connectorId?: number | null;
  sessionId?: number | null;
  data: Record<string, unknown>;
}

/**
 * Handlers for the calls one charge point sends. Each connection gets its own instance, bound to
 * the charger that passed the handshake.
 */
export class ChargePointHandlers {
  constructor(
    private charger: ChargerContext,
    private services: ChargePointServices,
    private log: Logger
  ) {}

  dispatchTable(): DispatchTable {
    return createDispatchTable({
      BootNotification: handled(
        BootNotificationRequestSchema,
        (request) => this.bootNotification(request),
        () => this.bootAccepted(new Date().toISOString())
      ),
      Heartbeat: handled(
        HeartbeatRequestSchema,
        () => this.heartbeat(),
        () => ({currentTime: new Date().toISOString()})
      ),
      StatusNotification: handled(
        StatusNotificationRequestSchema,
        (request) => this.statusNotification(request),
        (): EmptyResponse => ({})
      ),
      Authorize: handled(
        AuthorizeRequestSchema,
        (request) => this.authorize(request),
        (): AuthorizeResponse => ({idTagInfo: {status: 'Accepted'}})
      ),
      StartTransaction: handled(
        StartTransactionRequestSchema,
        (request) => this.startTransaction(request),
        (): StartTransactionResponse => ({transactionId: 0, idTagInfo: {status: 'Invalid'}})
      ),
      StopTransaction: handled(
        StopTransactionRequestSchema,
        (request) => this.stopTransaction(request),
        (): StopTransactionResponse => ({idTagInfo: {status: 'Accepted'}})
      ),
      MeterValues: handled(
        MeterValuesRequestSchema,
        (request) => this.meterValues(request),
        (): EmptyResponse => ({})
      ),
      DiagnosticsStatusNotification: handled(
        DiagnosticsStatusNotificationRequestSchema,
        (request) => this.statusReport('DiagnosticsStatusNotification', request.status),
        (): EmptyResponse => ({})
      ),
      FirmwareStatusNotification: handled(
        FirmwareStatusNotificationRequestSchema,
        (request) => this.statusReport('FirmwareStatusNotification', request.status),
        (): EmptyResponse => ({})
      ),
      DataTransfer: unsupported('Vendor specific data transfer is not supported'),
    });
  }

  async bootNotification(request: BootNotificationRequest): Promise<BootNotificationResponse> {
    this.log.info({params: request}, `BootNotification received from ${this.charger.identity}`);
    const now = new Date().toISOString();
    await this.services.chargers.updateBootInfo(
      this.charger.chargerId,
      {
        vendor: request.chargePointVendor,
        model: request.chargePointModel,
        serialNumber: request.chargePointSerialNumber ?? request.chargeBoxSerialNumber ?? null,
        firmwareVersion: request.firmwareVersion ?? null,
        meterType: request.meterType ?? null,
        meterSerialNumber: request.meterSerialNumber ?? null,
      },
      now
    );
    return this.bootAccepted(now);
  }

  async heartbeat(): Promise<HeartbeatResponse> {
    const currentTime = new Date().toISOString();
    await this.services.chargers.recordHeartbeat(this.charger.chargerId, currentTime);
    this.log.debug(`Heartbeat recorded for ${this.charger.identity}`);
    return {currentTime};
  }

  async statusNotification(request: StatusNotificationRequest): Promise<EmptyResponse> {
    const {connectorId, status, errorCode} = request;
    this.log.info(`StatusNotification from ${this.charger.identity}: connector ${connectorId} is ${status}`);
    const at = new Date().toISOString();
    // Connector 0 reports on the charger as a whole
    if (connectorId !== 0) {
      await this.services.connectors.upsertStatus({chargerId: this.charger.chargerId, connectorId, status, errorCode, at});
    }
    await this.recordEvent('StatusNotification', request.timestamp ?? at, {
      connectorId,
      data: {status, errorCode, info: request.info ?? null, vendorErrorCode: request.vendorErrorCode ?? null},
    });
    return {};
  }

  async authorize(request: AuthorizeRequest): Promise<AuthorizeResponse> {
    const status = await this.services.authorization.authorize(request.idTag, this.charger);
    this.log.info(`Authorize ${request.idTag} on ${this.charger.identity}: ${status}`);
    await this.recordEvent('Authorize', new Date().toISOString(), {data: {idTag: request.idTag, status}});
    return {idTagInfo: {status}};
  }

  /** Opens a session. The tag is not re-authorized at start; the answer is always Accepted. */
  async startTransaction(request: StartTransactionRequest): Promise<StartTransactionResponse> {
    const {connectorId, idTag, meterStart, timestamp} = request;
    this.log.info({params: request}, `StartTransaction received from ${this.charger.identity}`);
    const pricing = await this.driverPricing(idTag);
    const {sessionId, staleSession} = await this.services.tracker.open(this.charger, {
      connectorId,
      idTag,
      startTime: timestamp,
      meterStart,
      driverId: pricing?.driverId,
      tariffId: pricing?.tariffId,
      discountId: pricing?.discountId,
    });
    if (staleSession && !staleSession.alreadyClosed) {
      await this.bestEffort(`bill stale session ${staleSession.sessionId}`, () =>
        this.services.billing.finalize(staleSession.sessionId)
      );
    }

    await this.bestEffort(`record meter start of session ${sessionId}`, () =>
      this.services.tracker.recordMeterSample(this.charger, {
        type: 'StartTransaction',
        sessionId,
        connectorId,
        timestamp,
        measurand: ENERGY_REGISTER,
        meterValue: meterStart,
        current: null,
        voltage: null,
        temperature: null,
        data: {idTag, reservationId: request.reservationId ?? null},
      })
    );
    await this.bestEffort(`mark connector ${connectorId} charging`, () =>
      this.services.connectors.upsertStatus({
        chargerId: this.charger.chargerId,
        connectorId,
        status: 'Charging',
        at: new Date().toISOString(),
      })
    );
    if (pricing && pricing.tariffId !== null) {
      await this.bestEffort(`open payment for session ${sessionId}`, () => this.openPayment(sessionId, pricing));
    }

    return {transactionId: sessionId, idTagInfo: {status: 'Accepted'}};
  }

  async stopTransaction(request: StopTransactionRequest): Promise<StopTransactionResponse> {
    const {transactionId, meterStop, timestamp} = request;
    this.log.info({params: request}, `StopTransaction received from ${this.charger.identity}`);
    const session = await this.services.tracker.getSession(transactionId);
    if (session && session.endTime !== null) {
      this.log.info(`Session ${transactionId} is already closed, acknowledging repeated StopTransaction`);
      return {idTagInfo: {status: 'Accepted'}};
    }
    const connectorId = session ? session.connectorId : null;

    for (const meterValue of request.transactionData ?? []) {
      await this.bestEffort(`record transaction data of session ${transactionId}`, () =>
        this.recordMeterValue(transactionId, connectorId, meterValue)
      );
    }

    const totals = await this.services.tracker.close(transactionId, timestamp, request.reason ?? 'Local', meterStop);
    if (!totals) {
      this.log.warn(`StopTransaction for unknown transaction ${transactionId} from ${this.charger.identity}`);
      return {idTagInfo: {status: 'Accepted'}};
    }
    if (totals.alreadyClosed) {
      return {idTagInfo: {status: 'Accepted'}};
    }

    await this.bestEffort(`mark connector ${totals.connectorId} available`, () =>
      this.services.connectors.upsertStatus({
        chargerId: this.charger.chargerId,
        connectorId: totals.connectorId,
        status: 'Available',
        at: new Date().toISOString(),
      })
    );
    await this.bestEffort(`bill session ${transactionId}`, () => this.services.billing.finalize(transactionId));
    await this.bestEffort(`record meter stop of session ${transactionId}`, () =>
      this.services.tracker.recordMeterSample(this.charger, {
        type: 'StopTransaction',
        sessionId: transactionId,
        connectorId: totals.connectorId,
        timestamp,
        measurand: ENERGY_REGISTER,
        meterValue: meterStop,
        current: null,
        voltage: null,
        temperature: null,
        data: {reason: request.reason ?? null, idTag: request.idTag ?? null},
      })
    );

    return {idTagInfo: {status: 'Accepted'}};
  }

  async meterValues(request: MeterValuesRequest): Promise<EmptyResponse> {
    const {connectorId} = request;
    let sessionId = request.transactionId ?? null;
    if (sessionId === null && connectorId !== 0) {
      const open = await this.services.tracker.findOpenSession(this.charger, connectorId);
      sessionId = open ? open.id : null;
    }
    this.log.debug(`MeterValues from ${this.charger.identity}/${connectorId} for session ${sessionId}`);
    for (const meterValue of request.meterValue) {
      await this.recordMeterValue(sessionId, connectorId, meterValue);
    }
    return {};
  }

  async statusReport(
    type: 'DiagnosticsStatusNotification' | 'FirmwareStatusNotification',
    status: string
  ): Promise<EmptyResponse> {
    this.log.info(`${type} from ${this.charger.identity}: ${status}`);
    await this.recordEvent(type, new Date().toISOString(), {data: {status}});
    return {};
  }

  private bootAccepted(currentTime: string): BootNotificationResponse {
    return {status: 'Accepted', currentTime, interval: this.services.heartbeatIntervalSec};
  }

  private async recordMeterValue(sessionId: number | null, connectorId: number | null, meterValue: MeterValue) {
    for (const sampledValue of meterValue.sampledValue) {
      await this.services.tracker.recordMeterSample(this.charger, {
        type: 'MeterValues',
        sessionId,
        connectorId,
        timestamp: meterValue.timestamp,
        ...classifySampledValue(sampledValue),
      });
    }
  }

  private async driverPricing(idTag: string): Promise<DriverPricing | null> {
    try {
      return await this.services.rfidCards.getDriverPricing(idTag);
    } catch (err) {
      this.log.error(err, `Driver pricing lookup failed for ${idTag}, starting without tariff`);
      return null;
    }
  }

  private async openPayment(sessionId: number, pricing: DriverPricing): Promise<void> {
    const {companyId, siteId, chargerId} = this.charger;
    if (companyId === null) {
      this.log.warn(`Charger ${this.charger.identity} has no company, session ${sessionId} gets no payment`);
      return;
    }
    const method = await this.services.payments.getDefaultPaymentMethod(companyId);
    if (!method) {
      this.log.warn(`No enabled payment method for company ${companyId}, session ${sessionId} gets no payment`);
      return;
    }
    const transaction = await this.services.payments.addTransaction({
      methodId: method.id,
      driverId: pricing.driverId,
      companyId,
      siteId,
      chargerId,
      sessionId,
      amount: 0,
      status: 'pending_completion',
      paymentStatus: 'pending',
      createdAt: new Date().toISOString(),
    });
    await this.services.synchronizer.syncSession(sessionId);
    this.log.info(`Payment transaction ${transaction.id} opened for session ${sessionId}`);
  }

  private async recordEvent(type: ChargeEventType, timestamp: string, details: EventDetails): Promise<void> {
    await this.bestEffort(`record ${type} event`, () =>
      this.services.events.addEvent({
        type,
        timestamp,
        companyId: this.charger.companyId,
        siteId: this.charger.siteId,
        chargerId: this.charger.chargerId,
        connectorId: details.connectorId ?? null,
        sessionId: details.sessionId ?? null,
        measurand: null,
        meterValue: null,
        current: null,
        voltage: null,
        temperature: null,
        data: details.data,
      })
    );
  }

  private async bestEffort(description: string, work: () => Promise<unknown>): Promise<void> {
    try {
      await work();
    } catch (err) {
      this.log.error(err, `Failed to ${description} for ${this.charger.identity}`);
    }
  }
}
