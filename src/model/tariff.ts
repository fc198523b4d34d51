export type Tariff = {
  id: number;
  companyId: number | null;
  name: string;
  enabled: boolean;
  type: string | null;
  per: string | null;
  dayRate: number | null;
  nightRate: number | null;
  // Wall-clock times, HH:MM or HH:MM:SS
  daytimeFrom: string | null;
  daytimeTo: string | null;
  fixedStartFee: number | null;
  idleFee: number | null;
  idleGraceMinutes: number | null;
};
