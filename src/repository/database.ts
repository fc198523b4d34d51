import {BootInfo, Charger, NewCharger} from '../model/charger';
import {Connector, ConnectorStatusUpdate} from '../model/connector';
import {ChargeSession, ChargeSessionUpdate, NewChargeSession, UnpaidSessionFilter} from '../model/charge-session';
import {ChargeEvent, NewChargeEvent} from '../model/charge-event';
import {Tariff} from '../model/tariff';
import {ChargerUsePermit, DriverPricing, RfidCard} from '../model/rfid-card';
import {
  NewPaymentTransaction,
  PaymentMethod,
  PaymentTransaction,
  PaymentTransactionUpdate,
} from '../model/payment-transaction';

export interface ChargerRepository {
  addCharger(charger: NewCharger): Promise<Charger>;
  // Charger names compare case-insensitively
  getCharger(name: string): Promise<Charger | null>;
  updateBootInfo(chargerId: number, info: BootInfo, at: string): Promise<void>;
  recordHeartbeat(chargerId: number, at: string): Promise<void>;
  markOnline(name: string, at: string): Promise<void>;
  markOffline(name: string, at: string): Promise<void>;
}

export interface ConnectorRepository {
  getConnector(chargerId: number, connectorId: number): Promise<Connector | null>;
  upsertStatus(update: ConnectorStatusUpdate): Promise<void>;
}

export interface ChargeSessionRepository {
  /** Inserts a session under the next free id (highest id + 1) and returns that id. */
  insertSession(session: NewChargeSession): Promise<number>;
  getSession(sessionId: number): Promise<ChargeSession | null>;
  findOpenSession(chargerId: number, connectorId: number): Promise<ChargeSession | null>;
  updateSession(sessionId: number, updates: ChargeSessionUpdate): Promise<void>;
  listUnpaidSessions(filter: UnpaidSessionFilter): Promise<ChargeSession[]>;
}

export interface EventRepository {
  addEvent(event: NewChargeEvent): Promise<number>;
  /** Meter-carrying events of a session, ordered by timestamp then insertion. */
  getSessionSamples(sessionId: number): Promise<ChargeEvent[]>;
  getFirstEnergySample(sessionId: number): Promise<ChargeEvent | null>;
}

export interface RfidCardRepository {
  getCard(idTag: string): Promise<RfidCard | null>;
  getUsePermit(companyId: number, siteId: number, driverId: number): Promise<ChargerUsePermit | null>;
  getDriverPricing(idTag: string): Promise<DriverPricing | null>;
}

export interface TariffRepository {
  getTariff(tariffId: number): Promise<Tariff | null>;
}

export interface PaymentTransactionRepository {
  addTransaction(transaction: NewPaymentTransaction): Promise<PaymentTransaction>;
  getTransaction(transactionId: number): Promise<PaymentTransaction | null>;
  getTransactionByIntentId(externalIntentId: string): Promise<PaymentTransaction | null>;
  getLatestForSession(sessionId: number): Promise<PaymentTransaction | null>;
  updateTransaction(transactionId: number, updates: PaymentTransactionUpdate, at: string): Promise<void>;
  getDefaultPaymentMethod(companyId: number): Promise<PaymentMethod | null>;
}
