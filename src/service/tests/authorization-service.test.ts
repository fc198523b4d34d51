import {Database} from 'sqlite';
import {AuthorizationService} from '../authorization-service';
import {ChargerContext} from '../../model/charger';
import {RfidCardRepository} from '../../repository/database';
import {SqliteRfidCardRepository} from '../../repository/sqlite/sqlite-rfid-card-repository';
import {createTestDatabase, seedCard} from '../../repository/sqlite/tests/test-database';

const charger: ChargerContext = {identity: 'CP-1', chargerId: 100, companyId: 1, siteId: 10};
const now = () => new Date('2025-06-15T12:00:00.000Z');

describe('AuthorizationService', () => {
  let db: Database;
  let service: AuthorizationService;

  beforeEach(async () => {
    db = await createTestDatabase();
    service = new AuthorizationService(new SqliteRfidCardRepository(db), now);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should accept an enabled card', async () => {
    await seedCard(db, {idTag: 'TAG-1'});

    expect(await service.authorize('TAG-1', charger)).toBe('Accepted');
  });

  it('should answer Invalid for a missing or unknown tag', async () => {
    expect(await service.authorize('', charger)).toBe('Invalid');
    expect(await service.authorize(undefined, charger)).toBe('Invalid');
    expect(await service.authorize('TAG-404', charger)).toBe('Invalid');
  });

  it('should block a disabled card', async () => {
    await seedCard(db, {idTag: 'TAG-1', enabled: false});

    expect(await service.authorize('TAG-1', charger)).toBe('Blocked');
  });

  it('should expire a card the day after its expiry date', async () => {
    await seedCard(db, {idTag: 'TAG-OLD', expiresOn: '2025-06-14'});
    await seedCard(db, {idTag: 'TAG-LAST-DAY', expiresOn: '2025-06-15'});

    expect(await service.authorize('TAG-OLD', charger)).toBe('Expired');
    expect(await service.authorize('TAG-LAST-DAY', charger)).toBe('Accepted');
  });

  it('should block a driver whose permit for the site is disabled', async () => {
    await seedCard(db, {idTag: 'TAG-1', driverId: 5});
    await seedCard(db, {idTag: 'TAG-2', driverId: 6});
    await db.run('INSERT INTO charger_use_permits (companyId, siteId, driverId, enabled) VALUES (1, 10, 5, 0)');
    await db.run('INSERT INTO charger_use_permits (companyId, siteId, driverId, enabled) VALUES (1, 10, 6, 1)');

    expect(await service.authorize('TAG-1', charger)).toBe('Blocked');
    expect(await service.authorize('TAG-2', charger)).toBe('Accepted');
  });

  it('should answer Invalid when the lookup fails', async () => {
    const failing: RfidCardRepository = {
      getCard: () => Promise.reject(new Error('database is locked')),
      getUsePermit: () => Promise.resolve(null),
      getDriverPricing: () => Promise.resolve(null),
    };

    expect(await new AuthorizationService(failing, now).authorize('TAG-1', charger)).toBe('Invalid');
  });
});
