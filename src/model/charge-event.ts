export type ChargeEventType =
  | 'Authorize'
  | 'StatusNotification'
  | 'StartTransaction'
  | 'StopTransaction'
  | 'MeterValues'
  | 'DiagnosticsStatusNotification'
  | 'FirmwareStatusNotification';

export const ENERGY_REGISTER = 'Energy.Active.Import.Register';

/** Numeric readings extracted from one sampled value; `data` keeps the value as reported. */
export type MeterReading = {
  measurand: string;
  meterValue: number | null;
  current: number | null;
  voltage: number | null;
  temperature: number | null;
  data: Record<string, unknown> | null;
};

export type NewChargeEvent = Omit<MeterReading, 'measurand'> & {
  type: ChargeEventType;
  timestamp: string;
  companyId: number | null;
  siteId: number | null;
  chargerId: number;
  connectorId: number | null;
  sessionId: number | null;
  measurand: string | null;
};

export type ChargeEvent = NewChargeEvent & {
  id: number;
};
