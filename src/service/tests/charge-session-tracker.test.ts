import {Database} from 'sqlite';
import {ChargeSessionTracker, classifySampledValue, MeterSampleInput} from '../charge-session-tracker';
import {ChargerContext} from '../../model/charger';
import {ENERGY_REGISTER} from '../../model/charge-event';
import {SqliteChargeSessionRepository} from '../../repository/sqlite/sqlite-charge-session-repository';
import {SqliteEventRepository} from '../../repository/sqlite/sqlite-event-repository';
import {createTestDatabase} from '../../repository/sqlite/tests/test-database';

const charger: ChargerContext = {identity: 'CP-1', chargerId: 100, companyId: 1, siteId: 10};

const sample = (overrides: Partial<MeterSampleInput>): MeterSampleInput => ({
  type: 'MeterValues',
  sessionId: 1,
  connectorId: 1,
  timestamp: '2025-03-01T10:00:00.000Z',
  measurand: ENERGY_REGISTER,
  meterValue: null,
  current: null,
  voltage: null,
  temperature: null,
  data: null,
  ...overrides,
});

describe('classifySampledValue', () => {
  it('should store energy registers in Wh', () => {
    expect(classifySampledValue({value: '1.5', unit: 'kWh'})).toEqual({
      measurand: ENERGY_REGISTER,
      meterValue: 1500,
      current: null,
      voltage: null,
      temperature: null,
      data: {value: '1.5', unit: 'kWh'},
    });
  });

  it('should route current, voltage and temperature to their own columns', () => {
    expect(classifySampledValue({value: '16', measurand: 'Current.Import', phase: 'L1'}).current).toBe(16);
    expect(classifySampledValue({value: '231.5', measurand: 'Voltage'}).voltage).toBe(231.5);
    expect(classifySampledValue({value: '41', measurand: 'Temperature'}).temperature).toBe(41);
  });

  it('should keep unreadable values only as raw data', () => {
    const reading = classifySampledValue({value: 'abc', measurand: 'Energy.Active.Import.Register'});

    expect(reading.meterValue).toBeNull();
    expect(reading.data).toEqual({value: 'abc'});
    expect(classifySampledValue({value: '12', format: 'SignedData'}).meterValue).toBeNull();
  });
});

describe('ChargeSessionTracker', () => {
  let db: Database;
  let sessions: SqliteChargeSessionRepository;
  let tracker: ChargeSessionTracker;

  beforeEach(async () => {
    db = await createTestDatabase();
    sessions = new SqliteChargeSessionRepository(db);
    tracker = new ChargeSessionTracker(sessions, new SqliteEventRepository(db));
  });

  afterEach(async () => {
    await db.close();
  });

  it('should compute energy and duration from the first register sample', async () => {
    const {sessionId} = await tracker.open(charger, {
      connectorId: 1,
      idTag: 'TAG-1',
      startTime: '2025-03-01T10:00:00.000Z',
      meterStart: 1000,
      tariffId: 3,
    });
    await tracker.recordMeterSample(charger, sample({type: 'StartTransaction', sessionId, meterValue: 1000}));
    await tracker.recordMeterSample(
      charger,
      sample({sessionId, timestamp: '2025-03-01T10:30:00.000Z', meterValue: 4000})
    );

    expect((await sessions.getSession(sessionId))?.energyKWh).toBe(3);

    const totals = await tracker.close(sessionId, '2025-03-01T11:00:00.000Z', 'Local', 7000);

    expect(totals).toEqual({sessionId, connectorId: 1, durationSeconds: 3600, energyKWh: 6, alreadyClosed: false});
    const stored = await sessions.getSession(sessionId);
    expect(stored?.status).toBe('Completed');
    expect(stored?.stopReason).toBe('Local');
    expect(stored?.tariffId).toBe(3);
  });

  it('should return the stored totals when closed twice', async () => {
    const {sessionId} = await tracker.open(charger, {
      connectorId: 1,
      idTag: 'TAG-1',
      startTime: '2025-03-01T10:00:00.000Z',
      meterStart: 0,
    });
    await tracker.close(sessionId, '2025-03-01T10:10:00.000Z', 'Local', 2000);

    const again = await tracker.close(sessionId, '2025-03-01T12:00:00.000Z', 'Remote', 9000);

    expect(again).toEqual({sessionId, connectorId: 1, durationSeconds: 600, energyKWh: 2, alreadyClosed: true});
    expect((await sessions.getSession(sessionId))?.stopReason).toBe('Local');
  });

  it('should return null when closing an unknown session', async () => {
    expect(await tracker.close(42, '2025-03-01T10:00:00.000Z', 'Local', 0)).toBeNull();
  });

  it('should close a stale session before opening a new one on the same connector', async () => {
    const {sessionId: stale} = await tracker.open(charger, {
      connectorId: 2,
      idTag: 'TAG-1',
      startTime: '2025-03-01T08:00:00.000Z',
      meterStart: 0,
    });

    const {sessionId: fresh, staleSession} = await tracker.open(charger, {
      connectorId: 2,
      idTag: 'TAG-2',
      startTime: '2025-03-01T09:00:00.000Z',
      meterStart: 5000,
    });

    expect(fresh).toBe(stale + 1);
    expect(staleSession).toEqual({
      sessionId: stale,
      connectorId: 2,
      durationSeconds: 3600,
      energyKWh: 5,
      alreadyClosed: false,
    });
    const closed = await sessions.getSession(stale);
    expect(closed?.endTime).toBe('2025-03-01T09:00:00.000Z');
    expect(closed?.stopReason).toBe('Other');
    expect(closed?.energyKWh).toBe(5);
    expect((await tracker.findOpenSession(charger, 2))?.id).toBe(fresh);
  });

  it('should take energy from the first and last register samples', async () => {
    await tracker.recordMeterSample(charger, sample({timestamp: '2025-03-01T10:00:00.000Z', meterValue: 1000}));
    await tracker.recordMeterSample(charger, sample({timestamp: '2025-03-01T10:20:00.000Z', meterValue: 2500}));
    await tracker.recordMeterSample(charger, sample({timestamp: '2025-03-01T10:40:00.000Z', measurand: 'Voltage', voltage: 230}));
    await tracker.recordMeterSample(charger, sample({timestamp: '2025-03-01T10:50:00.000Z', meterValue: 4000}));

    expect(await tracker.energyFor(1)).toBe(3);
  });

  it('should not report negative energy when the register goes backwards', async () => {
    await tracker.recordMeterSample(charger, sample({sessionId: 2, timestamp: '2025-03-01T10:00:00.000Z', meterValue: 5000}));
    await tracker.recordMeterSample(charger, sample({sessionId: 2, timestamp: '2025-03-01T10:30:00.000Z', meterValue: 3000}));

    expect(await tracker.energyFor(2)).toBe(0);
    expect(await tracker.energyFor(3)).toBe(0);
  });

  it('should pair current and voltage readings by timestamp for peak power', async () => {
    const t1 = '2025-03-01T10:01:00.000Z';
    const t2 = '2025-03-01T10:02:00.000Z';
    const t3 = '2025-03-01T10:03:00.000Z';
    await tracker.recordMeterSample(charger, sample({timestamp: t1, measurand: 'Current.Import', current: 16}));
    await tracker.recordMeterSample(charger, sample({timestamp: t1, measurand: 'Voltage', voltage: 230}));
    await tracker.recordMeterSample(charger, sample({timestamp: t2, measurand: 'Current.Import', current: 32}));
    await tracker.recordMeterSample(charger, sample({timestamp: t2, measurand: 'Voltage', voltage: 230}));
    await tracker.recordMeterSample(charger, sample({timestamp: t3, measurand: 'Current.Import', current: 64}));

    expect(await tracker.maxPower(1)).toBeCloseTo(7.36);
    expect(await tracker.maxPower(2)).toBeNull();
  });

  it('should list only numeric samples in the timeline', async () => {
    await tracker.recordMeterSample(charger, sample({meterValue: 100}));
    await tracker.recordMeterSample(
      charger,
      sample({timestamp: '2025-03-01T10:01:00.000Z', measurand: 'SoC', data: {value: 'n/a'}})
    );

    const timeline = await tracker.timeline(1);

    expect(timeline).toEqual([
      {
        timestamp: '2025-03-01T10:00:00.000Z',
        measurand: ENERGY_REGISTER,
        meterValue: 100,
        current: null,
        voltage: null,
        temperature: null,
      },
    ]);
  });
});
