import path from 'node:path';
import sqlite3 from 'sqlite3';
import {open, Database} from 'sqlite';
import {SqliteChargerRepository} from './repository/sqlite/sqlite-charger-repository';
import {SqliteConnectorRepository} from './repository/sqlite/sqlite-connector-repository';
import {SqliteChargeSessionRepository} from './repository/sqlite/sqlite-charge-session-repository';
import {SqliteEventRepository} from './repository/sqlite/sqlite-event-repository';
import {SqliteRfidCardRepository} from './repository/sqlite/sqlite-rfid-card-repository';
import {SqliteTariffRepository} from './repository/sqlite/sqlite-tariff-repository';
import {SqlitePaymentTransactionRepository} from './repository/sqlite/sqlite-payment-transaction-repository';
import type {
  ChargeSessionRepository,
  ChargerRepository,
  ConnectorRepository,
  EventRepository,
  PaymentTransactionRepository,
  RfidCardRepository,
  TariffRepository,
} from './repository/database';
import logger from './logger';

const MIGRATIONS_PATH = path.join(__dirname, '..', 'migrations');

export interface Repositories {
  chargers: ChargerRepository;
  connectors: ConnectorRepository;
  sessions: ChargeSessionRepository;
  events: EventRepository;
  rfidCards: RfidCardRepository;
  tariffs: TariffRepository;
  payments: PaymentTransactionRepository;
}

/**
 * Opens the SQLite database and brings its schema up to date.
 * Pass `:memory:` for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Database> {
  const db = await open({
    filename,
    driver: sqlite3.Database,
  });
  await db.migrate({migrationsPath: MIGRATIONS_PATH});
  logger.info(`Database ready at ${filename}`);
  return db;
}

export function createSQLiteRepositories(db: Database): Repositories {
  return {
    chargers: new SqliteChargerRepository(db),
    connectors: new SqliteConnectorRepository(db),
    sessions: new SqliteChargeSessionRepository(db),
    events: new SqliteEventRepository(db),
    rfidCards: new SqliteRfidCardRepository(db),
    tariffs: new SqliteTariffRepository(db),
    payments: new SqlitePaymentTransactionRepository(db),
  };
}
