export class Charger {
  constructor(
    public id: number,
    public companyId: number | null,
    public siteId: number | null,
    public name: string,
    public enabled: boolean,
    public vendor: string | null = null,
    public model: string | null = null,
    public serialNumber: string | null = null,
    public firmwareVersion: string | null = null,
    public meterType: string | null = null,
    public meterSerialNumber: string | null = null,
    public isOnline = false,
    public lastConnect: string | null = null,
    public lastDisconnect: string | null = null,
    public lastHeartbeat: string | null = null
  ) {}

  /** The registered name is the identity, whatever case the charger presented it in. */
  context(): ChargerContext {
    return {identity: this.name, chargerId: this.id, companyId: this.companyId, siteId: this.siteId};
  }
}

/** What a live connection knows about the charger behind it once the handshake succeeded. */
export interface ChargerContext {
  identity: string;
  chargerId: number;
  companyId: number | null;
  siteId: number | null;
}

export interface BootInfo {
  vendor: string;
  model: string;
  serialNumber: string | null;
  firmwareVersion: string | null;
  meterType: string | null;
  meterSerialNumber: string | null;
}

export interface NewCharger {
  name: string;
  companyId: number | null;
  siteId: number | null;
  enabled: boolean;
}
