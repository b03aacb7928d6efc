// Domain types - clean models isolated from carrier and storage formats

export enum PackageStatus {
  PENDING = 'pending',
  IN_TRANSIT = 'in_transit',
  OUT_FOR_DELIVERY = 'out_for_delivery',
  DELIVERED = 'delivered',
  EXCEPTION = 'exception',
  UNKNOWN = 'unknown'
}

export interface TrackedPackage {
  id: number;
  trackingNumber: string;
  carrier: string | null;
  status: PackageStatus;
  lastUpdate: string | null;  // ISO 8601, null until first merge
  createdAt: string;          // ISO 8601
}

export interface TrackingEvent {
  timestamp: string | null;   // ISO 8601 when the carrier value parses as a date
  location: string | null;
  description: string;
}

export interface PackageWithEvents extends TrackedPackage {
  events: TrackingEvent[];
}

/**
 * Status and events reported by the carrier for one tracking number,
 * already normalized to domain values.
 */
export interface CarrierTrackingInfo {
  status: PackageStatus;
  events: TrackingEvent[];
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
