import {ChargeSessionRepository, EventRepository} from '../repository/database';
import {ChargerContext} from '../model/charger';
import {ChargeSession} from '../model/charge-session';
import {ChargeEvent, ENERGY_REGISTER, MeterReading} from '../model/charge-event';
import logger from '../logger';

export interface OpenSessionRequest {
  connectorId: number;
  idTag: string;
  startTime: string;
  // Also used as the stop value of a stale session still open on the connector
  meterStart: number;
  driverId?: number | null;
  tariffId?: number | null;
  discountId?: number | null;
}

export interface SessionTotals {
  sessionId: number;
  connectorId: number;
  durationSeconds: number;
  energyKWh: number;
  alreadyClosed: boolean;
}

export interface OpenedSession {
  sessionId: number;
  // Set when a session left open on the connector had to be closed first
  staleSession: SessionTotals | null;
}

export type MeterSampleInput = MeterReading & {
  type: 'MeterValues' | 'StartTransaction' | 'StopTransaction';
  sessionId: number | null;
  connectorId: number | null;
  timestamp: string;
};

export interface TimelinePoint {
  timestamp: string;
  measurand: string | null;
  meterValue: number | null;
  current: number | null;
  voltage: number | null;
  temperature: number | null;
}

/** A sampled value as charge points report it in MeterValues. */
export interface RawSampledValue {
  value: string;
  measurand?: string;
  unit?: string;
  phase?: string;
  context?: string;
  location?: string;
  format?: string;
}

/**
 * Sorts a sampled value into the numeric columns it belongs to. Energy registers reported in kWh are
 * stored in Wh. Values that are not plain numbers only keep their raw form in `data`.
 */
export function classifySampledValue(sampled: RawSampledValue): MeterReading {
  const measurand = sampled.measurand ?? ENERGY_REGISTER;
  const raw = Object.fromEntries(
    Object.entries({
      value: sampled.value,
      unit: sampled.unit,
      phase: sampled.phase,
      context: sampled.context,
      location: sampled.location,
      format: sampled.format,
    }).filter(([, value]) => value !== undefined)
  );
  const reading: MeterReading = {measurand, meterValue: null, current: null, voltage: null, temperature: null, data: raw};

  const numeric = sampled.format === 'SignedData' || sampled.value.trim() === '' ? NaN : Number(sampled.value);
  if (!Number.isFinite(numeric)) {
    return reading;
  }
  if (measurand.startsWith('Energy.Active.Import')) {
    reading.meterValue = sampled.unit === 'kWh' ? numeric * 1000 : numeric;
  } else if (measurand === 'Current.Import') {
    reading.current = numeric;
  } else if (measurand === 'Voltage') {
    reading.voltage = numeric;
  } else if (measurand === 'Temperature') {
    reading.temperature = numeric;
  }
  return reading;
}

const durationSeconds = (startTime: string, endTime: string): number => {
  const seconds = Math.trunc((Date.parse(endTime) - Date.parse(startTime)) / 1000);
  return Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
};

const isEnergyRegister = (sample: ChargeEvent): boolean =>
  sample.measurand === ENERGY_REGISTER && sample.meterValue !== null;

export class ChargeSessionTracker {
  constructor(
    private sessions: ChargeSessionRepository,
    private events: EventRepository
  ) {}

  async open(charger: ChargerContext, request: OpenSessionRequest): Promise<OpenedSession> {
    const {connectorId} = request;
    const stale = await this.sessions.findOpenSession(charger.chargerId, connectorId);
    let staleSession: SessionTotals | null = null;
    if (stale) {
      logger.warn(`Closing stale session ${stale.id} on ${charger.identity}/${connectorId} before opening a new one`);
      staleSession = await this.close(stale.id, request.startTime, 'Other', request.meterStart);
    }
    const sessionId = await this.sessions.insertSession({
      companyId: charger.companyId,
      siteId: charger.siteId,
      chargerId: charger.chargerId,
      connectorId,
      driverId: request.driverId ?? null,
      idTag: request.idTag,
      startTime: request.startTime,
      tariffId: request.tariffId ?? null,
      discountId: request.discountId ?? null,
    });
    logger.info(`Session ${sessionId} opened on ${charger.identity}/${connectorId} for ${request.idTag}`);
    return {sessionId, staleSession};
  }

  findOpenSession(charger: ChargerContext, connectorId: number): Promise<ChargeSession | null> {
    return this.sessions.findOpenSession(charger.chargerId, connectorId);
  }

  getSession(sessionId: number): Promise<ChargeSession | null> {
    return this.sessions.getSession(sessionId);
  }

  /** Appends a sample; energy register readings also refresh the running total of an open session. */
  async recordMeterSample(charger: ChargerContext, sample: MeterSampleInput): Promise<void> {
    await this.events.addEvent({
      ...sample,
      companyId: charger.companyId,
      siteId: charger.siteId,
      chargerId: charger.chargerId,
    });
    if (sample.sessionId !== null && sample.measurand === ENERGY_REGISTER && sample.meterValue !== null) {
      await this.refreshLiveEnergy(sample.sessionId);
    }
  }

  /**
   * Finalizes duration and energy. The meter start is the session's earliest energy register sample
   * (0 without one). Closing a closed session returns what was stored the first time.
   */
  async close(sessionId: number, endTime: string, reason: string, meterStop: number): Promise<SessionTotals | null> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) {
      logger.warn(`Cannot close unknown session ${sessionId}`);
      return null;
    }
    if (session.endTime !== null) {
      logger.info(`Session ${sessionId} is already closed`);
      return {
        sessionId,
        connectorId: session.connectorId,
        durationSeconds: session.durationSeconds ?? 0,
        energyKWh: session.energyKWh ?? 0,
        alreadyClosed: true,
      };
    }

    const first = await this.events.getFirstEnergySample(sessionId);
    const meterStart = first?.meterValue ?? 0;
    const energyKWh = Math.max(0, (meterStop - meterStart) / 1000);
    const duration = durationSeconds(session.startTime, endTime);

    await this.sessions.updateSession(sessionId, {
      endTime,
      status: 'Completed',
      durationSeconds: duration,
      energyKWh,
      stopReason: reason,
    });
    logger.info(`Session ${sessionId} closed: ${energyKWh} kWh in ${duration}s (${reason})`);
    return {sessionId, connectorId: session.connectorId, durationSeconds: duration, energyKWh, alreadyClosed: false};
  }

  async energyFor(sessionId: number): Promise<number> {
    const samples = (await this.events.getSessionSamples(sessionId)).filter(isEnergyRegister);
    const first = samples[0];
    const last = samples[samples.length - 1];
    if (!first || !last || first.meterValue === null || last.meterValue === null) {
      return 0;
    }
    return Math.max(0, (last.meterValue - first.meterValue) / 1000);
  }

  async timeline(sessionId: number): Promise<TimelinePoint[]> {
    const samples = await this.events.getSessionSamples(sessionId);
    return samples
      .filter(
        (sample) =>
          sample.meterValue !== null || sample.current !== null || sample.voltage !== null || sample.temperature !== null
      )
      .map((sample) => ({
        timestamp: sample.timestamp,
        measurand: sample.measurand,
        meterValue: sample.meterValue,
        current: sample.current,
        voltage: sample.voltage,
        temperature: sample.temperature,
      }));
  }

  /**
   * Peak power in kW. Current and voltage arrive as separate sampled values, so readings taken at the
   * same timestamp are paired. Null when no timestamp has both.
   */
  async maxPower(sessionId: number): Promise<number | null> {
    const samples = await this.events.getSessionSamples(sessionId);
    const readings = new Map<string, {current: number | null; voltage: number | null}>();
    for (const sample of samples) {
      const reading = readings.get(sample.timestamp) ?? {current: null, voltage: null};
      if (sample.current !== null) {
        reading.current = sample.current;
      }
      if (sample.voltage !== null) {
        reading.voltage = sample.voltage;
      }
      readings.set(sample.timestamp, reading);
    }

    let max: number | null = null;
    for (const {current, voltage} of readings.values()) {
      if (current !== null && voltage !== null) {
        const power = (current * voltage) / 1000;
        max = max === null ? power : Math.max(max, power);
      }
    }
    return max;
  }

  private async refreshLiveEnergy(sessionId: number): Promise<void> {
    const session = await this.sessions.getSession(sessionId);
    if (!session || session.endTime !== null) {
      return;
    }
    const energyKWh = await this.energyFor(sessionId);
    if (energyKWh > 0) {
      await this.sessions.updateSession(sessionId, {energyKWh});
      logger.debug(`Session ${sessionId} live energy: ${energyKWh} kWh`);
    }
  }
}
