import {Database} from 'sqlite';
import {SqliteRfidCardRepository} from '../sqlite-rfid-card-repository';
import {SqliteConnectorRepository} from '../sqlite-connector-repository';
import {createTestDatabase, seedCard, seedDriver, seedTariff} from './test-database';

describe('SqliteRfidCardRepository', () => {
  let db: Database;
  let repository: SqliteRfidCardRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new SqliteRfidCardRepository(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should load cards with their flags', async () => {
    await seedCard(db, {idTag: 'TAG-1', enabled: false, expiresOn: '2030-01-01'});

    expect(await repository.getCard('TAG-1')).toEqual({
      idTag: 'TAG-1',
      companyId: 1,
      driverId: null,
      enabled: false,
      expiresOn: '2030-01-01',
    });
    expect(await repository.getCard('TAG-2')).toBeNull();
  });

  it('should resolve pricing through the driver group', async () => {
    await seedTariff(db, {id: 3, dayRate: 0.3});
    await seedDriver(db, {id: 5, idTag: 'TAG-1', tariffId: 3});

    expect(await repository.getDriverPricing('TAG-1')).toEqual({
      driverId: 5,
      driverGroupId: 5,
      tariffId: 3,
      discountId: null,
    });
  });

  it('should ignore a disabled driver group', async () => {
    await seedDriver(db, {id: 5, idTag: 'TAG-1', tariffId: 3, groupEnabled: false});

    expect(await repository.getDriverPricing('TAG-1')).toEqual({
      driverId: 5,
      driverGroupId: null,
      tariffId: null,
      discountId: null,
    });
  });

  it('should return no pricing for a card without driver', async () => {
    await seedCard(db, {idTag: 'TAG-1'});

    expect(await repository.getDriverPricing('TAG-1')).toBeNull();
  });

  it('should load use permits', async () => {
    await db.run('INSERT INTO charger_use_permits (companyId, siteId, driverId, enabled) VALUES (1, 10, 5, 0)');

    expect(await repository.getUsePermit(1, 10, 5)).toEqual({companyId: 1, siteId: 10, driverId: 5, enabled: false});
    expect(await repository.getUsePermit(1, 11, 5)).toBeNull();
  });
});

describe('SqliteConnectorRepository', () => {
  let db: Database;
  let repository: SqliteConnectorRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new SqliteConnectorRepository(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should create a connector on first status and update it afterwards', async () => {
    await repository.upsertStatus({
      chargerId: 1,
      connectorId: 2,
      status: 'Faulted',
      errorCode: 'GroundFailure',
      at: '2025-03-01T10:00:00.000Z',
    });
    await repository.upsertStatus({chargerId: 1, connectorId: 2, status: 'Charging', at: '2025-03-01T10:05:00.000Z'});

    const connector = await repository.getConnector(1, 2);

    expect(connector).toEqual({
      chargerId: 1,
      connectorId: 2,
      status: 'Charging',
      errorCode: 'GroundFailure',
      enabled: true,
      updatedAt: '2025-03-01T10:05:00.000Z',
    });
  });

  it('should overwrite the error code when one is supplied', async () => {
    await repository.upsertStatus({
      chargerId: 1,
      connectorId: 1,
      status: 'Faulted',
      errorCode: 'GroundFailure',
      at: '2025-03-01T10:00:00.000Z',
    });
    await repository.upsertStatus({
      chargerId: 1,
      connectorId: 1,
      status: 'Available',
      errorCode: 'NoError',
      at: '2025-03-01T10:01:00.000Z',
    });

    expect((await repository.getConnector(1, 1))?.errorCode).toBe('NoError');
  });
});
