import { PackageStatus, PackageWithEvents, TrackedPackage, TrackingEvent } from '../types/domain.types';
import { MergeResult } from '../types/result.types';

/**
 * Durable Package/Event store keyed by tracking number.
 */
export interface IPackageStore {
  /**
   * Starts tracking a number with status `pending` and an empty ledger.
   * @throws DuplicateError when the number is already tracked
   * @throws ValidationError when the number is blank
   */
  add(trackingNumber: string, carrier?: string | null): Promise<TrackedPackage>;

  /**
   * Most recently created first, optionally restricted to one status.
   */
  list(status?: PackageStatus): Promise<TrackedPackage[]>;

  /**
   * Package with its events, newest timestamp first and missing timestamps last.
   * @throws NotFoundError
   */
  get(trackingNumber: string): Promise<PackageWithEvents>;

  /**
   * Removes the package and its events atomically.
   * @throws NotFoundError
   */
  delete(trackingNumber: string): Promise<void>;

  /**
   * Applies a status and events payload. Idempotent: events already in the
   * ledger (same timestamp and description) are not inserted again, and a
   * terminal status only yields to another terminal status.
   * @throws NotFoundError
   */
  mergeUpdate(trackingNumber: string, status: PackageStatus, events: TrackingEvent[]): Promise<MergeResult>;

  close(): void;
}
