export const CONNECTOR_STATUSES = [
  'Available',
  'Preparing',
  'Charging',
  'SuspendedEVSE',
  'SuspendedEV',
  'Finishing',
  'Reserved',
  'Unavailable',
  'Faulted',
] as const;

export type ConnectorStatus = (typeof CONNECTOR_STATUSES)[number];

export type Connector = {
  chargerId: number;
  connectorId: number;
  status: ConnectorStatus;
  errorCode: string | null;
  enabled: boolean;
  updatedAt: string;
};

export type ConnectorStatusUpdate = {
  chargerId: number;
  connectorId: number;
  status: ConnectorStatus;
  errorCode?: string | null;
  at: string;
};
