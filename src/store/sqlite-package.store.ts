import Database from 'better-sqlite3';
import { inject, injectable } from 'tsyringe';
import {
  Clock,
  PackageStatus,
  PackageWithEvents,
  TrackedPackage,
  TrackingEvent
} from '../types/domain.types';
import { DuplicateError, NotFoundError, ValidationError } from '../types/error.types';
import { MergeResult } from '../types/result.types';
import { eventKey } from '../utils/event.util';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { Logger } from '../utils/logger';
import { isPackageStatus, resolveNextStatus } from '../utils/status.util';
import { IPackageStore } from './package-store.interface';

// Row shapes as stored (internal to the store)
interface PackageRow {
  id: number;
  tracking_number: string;
  carrier: string | null;
  status: string;
  last_update: string | null;
  created_at: string;
}

interface EventRow {
  timestamp: string | null;
  location: string | null;
  description: string;
}

@injectable()
export class SqlitePackageStore implements IPackageStore {
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;

  constructor(
    @inject('Database') private readonly db: Database.Database,
    @inject('Logger') logger: Logger,
    @inject('Clock') private readonly clock: Clock
  ) {
    this.logger = logger.child({ component: 'package-store' });
  }

  async add(trackingNumber: string, carrier?: string | null): Promise<TrackedPackage> {
    const number = this.requireTrackingNumber(trackingNumber);
    const carrierCode = carrier?.trim() || null;

    return this.locks.runExclusive(number, () => {
      const insert = this.db.transaction(() => {
        if (this.findPackageRow(number)) {
          throw new DuplicateError(number);
        }

        const row = this.db
          .prepare<[string, string | null, string, string], PackageRow>(
            `INSERT INTO packages (tracking_number, carrier, status, created_at)
             VALUES (?, ?, ?, ?)
             RETURNING *`
          )
          .get(number, carrierCode, PackageStatus.PENDING, this.clock().toISOString());

        if (!row) {
          throw new Error(`Insert of package ${number} returned no row`);
        }
        return row;
      });

      const created = this.toPackage(insert());
      this.logger.debug({ trackingNumber: number, carrier: carrierCode }, 'Package added');
      return created;
    });
  }

  async list(status?: PackageStatus): Promise<TrackedPackage[]> {
    const rows = status
      ? this.db
          .prepare<[string], PackageRow>(
            'SELECT * FROM packages WHERE status = ? ORDER BY created_at DESC, id DESC'
          )
          .all(status)
      : this.db
          .prepare<[], PackageRow>('SELECT * FROM packages ORDER BY created_at DESC, id DESC')
          .all();

    return rows.map(row => this.toPackage(row));
  }

  async get(trackingNumber: string): Promise<PackageWithEvents> {
    const number = trackingNumber.trim();

    return this.locks.runExclusive(number, () => {
      const read = this.db.transaction(() => {
        const row = this.findPackageRow(number);
        if (!row) {
          throw new NotFoundError(number);
        }
        return { ...this.toPackage(row), events: this.readEvents(row.id) };
      });
      return read();
    });
  }

  async delete(trackingNumber: string): Promise<void> {
    const number = trackingNumber.trim();

    await this.locks.runExclusive(number, () => {
      const remove = this.db.transaction(() => {
        const row = this.findPackageRow(number);
        if (!row) {
          throw new NotFoundError(number);
        }
        const events = this.db.prepare<[number]>('DELETE FROM events WHERE package_id = ?').run(row.id);
        this.db.prepare<[number]>('DELETE FROM packages WHERE id = ?').run(row.id);
        return events.changes;
      });

      const eventsRemoved = remove();
      this.logger.debug({ trackingNumber: number, eventsRemoved }, 'Package deleted');
    });
  }

  async mergeUpdate(
    trackingNumber: string,
    status: PackageStatus,
    events: TrackingEvent[]
  ): Promise<MergeResult> {
    const number = trackingNumber.trim();

    return this.locks.runExclusive(number, () => {
      const merge = this.db.transaction((): MergeResult => {
        const row = this.findPackageRow(number);
        if (!row) {
          throw new NotFoundError(number);
        }

        const previousStatus = this.toStatus(row.status);
        const nextStatus = resolveNextStatus(previousStatus, status);

        this.db
          .prepare<[string, string, number]>('UPDATE packages SET status = ?, last_update = ? WHERE id = ?')
          .run(nextStatus, this.clock().toISOString(), row.id);

        const known = new Set(this.readEvents(row.id).map(eventKey));
        const insertEvent = this.db.prepare<[number, string | null, string | null, string]>(
          'INSERT INTO events (package_id, timestamp, location, description) VALUES (?, ?, ?, ?)'
        );

        let eventsAdded = 0;
        for (const event of events) {
          const key = eventKey(event);
          if (known.has(key)) {
            continue;
          }
          insertEvent.run(row.id, event.timestamp, event.location, event.description);
          known.add(key);
          eventsAdded++;
        }

        return {
          trackingNumber: number,
          previousStatus,
          status: nextStatus,
          statusChanged: nextStatus !== previousStatus,
          eventsAdded
        };
      });

      const result = merge();
      if (result.status !== status) {
        this.logger.info(
          { trackingNumber: number, current: result.status, incoming: status },
          'Ignored non-terminal status for package in terminal state'
        );
      }
      return result;
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private findPackageRow(trackingNumber: string): PackageRow | undefined {
    return this.db
      .prepare<[string], PackageRow>('SELECT * FROM packages WHERE tracking_number = ?')
      .get(trackingNumber);
  }

  private readEvents(packageId: number): TrackingEvent[] {
    return this.db
      .prepare<[number], EventRow>(
        `SELECT timestamp, location, description FROM events
         WHERE package_id = ?
         ORDER BY timestamp IS NULL, timestamp DESC, id DESC`
      )
      .all(packageId)
      .map(row => ({
        timestamp: row.timestamp,
        location: row.location,
        description: row.description
      }));
  }

  private requireTrackingNumber(trackingNumber: string): string {
    const number = trackingNumber.trim();
    if (!number) {
      throw new ValidationError('Tracking number must not be empty');
    }
    return number;
  }

  private toStatus(value: string): PackageStatus {
    return isPackageStatus(value) ? value : PackageStatus.UNKNOWN;
  }

  private toPackage(row: PackageRow): TrackedPackage {
    return {
      id: row.id,
      trackingNumber: row.tracking_number,
      carrier: row.carrier,
      status: this.toStatus(row.status),
      lastUpdate: row.last_update,
      createdAt: row.created_at
    };
  }
}
