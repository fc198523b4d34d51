export type AuthorizationStatus = 'Accepted' | 'Blocked' | 'Expired' | 'Invalid' | 'ConcurrentTx';

export type RfidCard = {
  idTag: string;
  companyId: number | null;
  driverId: number | null;
  enabled: boolean;
  expiresOn: string | null;
};

export type ChargerUsePermit = {
  companyId: number;
  siteId: number;
  driverId: number;
  enabled: boolean;
};

/** Pricing that applies to sessions started with a tag, resolved through its driver's group. */
export type DriverPricing = {
  driverId: number;
  driverGroupId: number | null;
  tariffId: number | null;
  discountId: number | null;
};
