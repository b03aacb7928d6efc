import { TrackingEvent } from '../types/domain.types';
import { CarrierEvent } from '../types/carrier.types';

// Trailing `Z` or a numeric UTC offset such as +02:00 / -0500
const EXPLICIT_ZONE = /(?:z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalizes an event timestamp: values with an explicit zone that parse as
 * dates become ISO 8601 UTC strings. Zone-less and unparseable values are
 * kept verbatim, so the result never depends on the host's time zone.
 * Blank becomes null.
 */
export function normalizeTimestamp(raw: string | null | undefined): string | null {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }
  if (!EXPLICIT_ZONE.test(trimmed)) {
    return trimmed;
  }

  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? trimmed : parsed.toISOString();
}

export function normalizeEvent(raw: CarrierEvent): TrackingEvent {
  return {
    timestamp: normalizeTimestamp(raw.time ?? raw.timestamp),
    location: raw.location?.trim() || null,
    description: raw.description?.trim() ?? ''
  };
}

// Ledger identity of an event
export function eventKey(event: Pick<TrackingEvent, 'timestamp' | 'description'>): string {
  return JSON.stringify([event.timestamp, event.description]);
}
