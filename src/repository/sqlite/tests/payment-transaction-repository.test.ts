import {Database} from 'sqlite';
import {SqlitePaymentTransactionRepository} from '../sqlite-payment-transaction-repository';
import {NewPaymentTransaction} from '../../../model/payment-transaction';
import {createTestDatabase, seedPaymentMethod} from './test-database';

const newTransaction = (overrides: Partial<NewPaymentTransaction> = {}): NewPaymentTransaction => ({
  methodId: 1,
  driverId: 5,
  companyId: 1,
  siteId: 10,
  chargerId: 100,
  sessionId: 1,
  amount: 0,
  status: 'pending_completion',
  paymentStatus: 'pending',
  createdAt: '2025-03-01T10:00:00.000Z',
  ...overrides,
});

describe('SqlitePaymentTransactionRepository', () => {
  let db: Database;
  let repository: SqlitePaymentTransactionRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new SqlitePaymentTransactionRepository(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should add a transaction and find it by id and intent', async () => {
    const added = await repository.addTransaction(newTransaction({externalIntentId: 'pi_test_1'}));

    expect(added.id).toBe(1);
    expect(added.updatedAt).toBe('2025-03-01T10:00:00.000Z');
    expect((await repository.getTransaction(1))?.externalIntentId).toBe('pi_test_1');
    expect((await repository.getTransactionByIntentId('pi_test_1'))?.id).toBe(1);
    expect(await repository.getTransactionByIntentId('pi_unknown')).toBeNull();
  });

  it('should return the most recent transaction of a session', async () => {
    await repository.addTransaction(newTransaction({createdAt: '2025-03-01T10:00:00.000Z'}));
    await repository.addTransaction(newTransaction({createdAt: '2025-03-01T12:00:00.000Z'}));
    await repository.addTransaction(newTransaction({createdAt: '2025-03-01T11:00:00.000Z'}));
    await repository.addTransaction(newTransaction({sessionId: 2, createdAt: '2025-03-02T00:00:00.000Z'}));

    const latest = await repository.getLatestForSession(1);

    expect(latest?.id).toBe(2);
    expect(await repository.getLatestForSession(3)).toBeNull();
  });

  it('should update only the supplied fields', async () => {
    await repository.addTransaction(newTransaction());

    await repository.updateTransaction(1, {amount: 4.2, paymentStatus: 'succeeded'}, '2025-03-01T13:00:00.000Z');

    const stored = await repository.getTransaction(1);
    expect(stored?.amount).toBe(4.2);
    expect(stored?.paymentStatus).toBe('succeeded');
    expect(stored?.status).toBe('pending_completion');
    expect(stored?.updatedAt).toBe('2025-03-01T13:00:00.000Z');
  });

  it('should pick the first enabled payment method of a company', async () => {
    await seedPaymentMethod(db, {id: 3, companyId: 1});
    await seedPaymentMethod(db, {id: 2, companyId: 1});
    await db.run('UPDATE payment_methods SET enabled = 0 WHERE id = 2');

    expect((await repository.getDefaultPaymentMethod(1))?.id).toBe(3);
    expect(await repository.getDefaultPaymentMethod(9)).toBeNull();
  });
});
