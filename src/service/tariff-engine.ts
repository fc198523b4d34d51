import {TariffRepository} from '../repository/database';
import {Tariff} from '../model/tariff';
import logger from '../logger';

export type RateType = 'flat_rate' | 'daytime' | 'nighttime' | 'fallback_daytime';

export interface CostBreakdown {
  tariffName: string | null;
  energyKWh: number;
  type: string | null;
  per: string | null;
  fixedStartFee: number;
  energyCost: number;
  rateUsed: number;
  rateType: RateType | null;
  sessionStartTime: string;
  sessionEndTime: string;
  daytimeHours: string | null;
  totalCost: number;
  // Why nothing was charged, when that is the case
  note: string | null;
}

export interface SessionCost {
  amount: number;
  breakdown: CostBreakdown;
}

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
// The wall-clock part of an ISO-8601 timestamp, read as written (no timezone shift)
const TIMESTAMP_TIME = /T(\d{2}):(\d{2})(?::(\d{2}))?/;

const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

function toSecondsOfDay(match: RegExpExecArray | null): number | null {
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Whether `time` falls in the [from, to] window. A window whose end is before its start
 * wraps past midnight (22:00-06:00 contains 23:00 and 05:00).
 */
export function isWithinWindow(time: number, from: number, to: number): boolean {
  if (from <= to) {
    return from <= time && time <= to;
  }
  return !(to < time && time < from);
}

function zeroCost(
  tariff: Tariff | null,
  energyKWh: number,
  startTime: string,
  endTime: string,
  note: string
): SessionCost {
  return {
    amount: 0,
    breakdown: {
      tariffName: tariff?.name ?? null,
      energyKWh,
      type: tariff?.type ?? null,
      per: tariff?.per ?? null,
      fixedStartFee: 0,
      energyCost: 0,
      rateUsed: 0,
      rateType: null,
      sessionStartTime: startTime,
      sessionEndTime: endTime,
      daytimeHours: null,
      totalCost: 0,
      note,
    },
  };
}

function selectRate(tariff: Tariff, startTime: string): {rate: number; rateType: RateType; daytimeHours: string | null} {
  const {dayRate, nightRate, daytimeFrom, daytimeTo} = tariff;
  if (dayRate !== null && nightRate !== null && daytimeFrom && daytimeTo) {
    const daytimeHours = `${daytimeFrom}-${daytimeTo}`;
    const from = toSecondsOfDay(TIME_OF_DAY.exec(daytimeFrom));
    const to = toSecondsOfDay(TIME_OF_DAY.exec(daytimeTo));
    const start = toSecondsOfDay(TIMESTAMP_TIME.exec(startTime));
    if (from === null || to === null || start === null) {
      logger.warn(`Cannot place ${startTime} in daytime window ${daytimeHours} of tariff ${tariff.id}`);
      return {rate: dayRate, rateType: 'fallback_daytime', daytimeHours};
    }
    return isWithinWindow(start, from, to)
      ? {rate: dayRate, rateType: 'daytime', daytimeHours}
      : {rate: nightRate, rateType: 'nighttime', daytimeHours};
  }
  return {rate: dayRate ?? nightRate ?? 0, rateType: 'flat_rate', daytimeHours: null};
}

/**
 * Prices a session. The rate is chosen once from the session's start time and applied to
 * all of its energy; energy is not split across a window boundary.
 */
export function calculateCost(
  tariff: Tariff | null,
  energyKWh: number,
  startTime: string,
  endTime: string
): SessionCost {
  if (!tariff) {
    return zeroCost(null, energyKWh, startTime, endTime, 'Tariff not found');
  }
  if (!tariff.enabled) {
    return zeroCost(tariff, energyKWh, startTime, endTime, 'Tariff disabled');
  }
  if (!(energyKWh > 0)) {
    return zeroCost(tariff, energyKWh, startTime, endTime, 'No energy consumed');
  }

  const fixedStartFee = tariff.fixedStartFee ?? 0;
  const {rate, rateType, daytimeHours} = selectRate(tariff, startTime);
  const energyCost = round2(energyKWh * rate);
  const totalCost = round2(fixedStartFee + energyKWh * rate);

  return {
    amount: totalCost,
    breakdown: {
      tariffName: tariff.name,
      energyKWh,
      type: tariff.type,
      per: tariff.per,
      fixedStartFee,
      energyCost,
      rateUsed: rate,
      rateType,
      sessionStartTime: startTime,
      sessionEndTime: endTime,
      daytimeHours,
      totalCost,
      note: null,
    },
  };
}

export class TariffEngine {
  constructor(private tariffs: TariffRepository) {}

  async cost(tariffId: number, energyKWh: number, startTime: string, endTime: string): Promise<SessionCost> {
    const tariff = await this.tariffs.getTariff(tariffId);
    const result = calculateCost(tariff, energyKWh, startTime, endTime);
    logger.debug({breakdown: result.breakdown}, `Tariff ${tariffId} priced ${energyKWh} kWh at ${result.amount}`);
    return result;
  }
}
