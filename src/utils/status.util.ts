import { PackageStatus } from '../types/domain.types';

const STATUS_VALUES: ReadonlySet<string> = new Set(Object.values(PackageStatus));

const TERMINAL_STATUSES: ReadonlySet<PackageStatus> = new Set([
  PackageStatus.DELIVERED,
  PackageStatus.EXCEPTION
]);

// Carrier codes, lowercased with separators stripped
const STATUS_ALIASES: Readonly<Record<string, PackageStatus>> = {
  pending: PackageStatus.PENDING,
  inforeceived: PackageStatus.PENDING,
  notfound: PackageStatus.PENDING,
  intransit: PackageStatus.IN_TRANSIT,
  transit: PackageStatus.IN_TRANSIT,
  pickedup: PackageStatus.IN_TRANSIT,
  availableforpickup: PackageStatus.IN_TRANSIT,
  outfordelivery: PackageStatus.OUT_FOR_DELIVERY,
  delivered: PackageStatus.DELIVERED,
  exception: PackageStatus.EXCEPTION,
  expired: PackageStatus.EXCEPTION,
  deliveryfailure: PackageStatus.EXCEPTION,
  undelivered: PackageStatus.EXCEPTION,
  alert: PackageStatus.EXCEPTION
};

export function isPackageStatus(value: string): value is PackageStatus {
  return STATUS_VALUES.has(value);
}

export function isTerminalStatus(status: PackageStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Maps a carrier-reported status code to a PackageStatus.
 * Unrecognized or missing codes become UNKNOWN.
 */
export function normalizeStatus(raw: string | null | undefined): PackageStatus {
  if (!raw) {
    return PackageStatus.UNKNOWN;
  }

  const trimmed = raw.trim();
  if (isPackageStatus(trimmed)) {
    return trimmed;
  }

  const key = trimmed.toLowerCase().replace(/[^a-z]/g, '');
  return STATUS_ALIASES[key] ?? PackageStatus.UNKNOWN;
}

/**
 * Decides the status a merge leaves behind. A terminal status only yields
 * to another terminal status; everything else is last-writer-wins.
 */
export function resolveNextStatus(current: PackageStatus, incoming: PackageStatus): PackageStatus {
  if (isTerminalStatus(current) && !isTerminalStatus(incoming)) {
    return current;
  }
  return incoming;
}
