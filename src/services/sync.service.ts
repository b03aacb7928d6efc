import { inject, injectable } from 'tsyringe';
import { ICarrierApiClient } from '../adapters/carrier/carrier-client.interface';
import { IPackageStore } from '../store/package-store.interface';
import { isTrackingError } from '../types/error.types';
import { SyncItemError, SyncResult } from '../types/result.types';
import { Logger } from '../utils/logger';
import { ISyncService } from './sync.interface';

@injectable()
export class SyncService implements ISyncService {
  private readonly logger: Logger;

  constructor(
    @inject('IPackageStore') private readonly store: IPackageStore,
    @inject('ICarrierApiClient') private readonly carrierClient: ICarrierApiClient,
    @inject('Logger') logger: Logger
  ) {
    this.logger = logger.child({ component: 'sync' });
  }

  async sync(trackingNumber?: string): Promise<SyncResult> {
    const targets = await this.collectTargets(trackingNumber);
    if (targets.length === 0) {
      return {
        success: true,
        requested: 0,
        synced: 0,
        unchanged: [],
        errors: [],
        message: 'No packages to sync'
      };
    }

    // One outbound call; a transport or decode failure propagates before any write
    const carrierData = await this.carrierClient.query(targets);

    let synced = 0;
    const errors: SyncItemError[] = [];
    const unchanged: string[] = [];

    for (const number of targets) {
      const info = carrierData.get(number);
      // Absence from the response is not evidence of carrier-side deletion
      if (!info) {
        unchanged.push(number);
        continue;
      }
      try {
        await this.store.mergeUpdate(number, info.status, info.events);
        synced++;
      } catch (error) {
        errors.push({
          trackingNumber: number,
          errorType: isTrackingError(error) ? error.errorType : 'UnexpectedError',
          message: error instanceof Error ? error.message : String(error)
        });
      }
    }

    const extra = [...carrierData.keys()].filter(number => !targets.includes(number));
    if (extra.length > 0) {
      this.logger.debug({ extra }, 'Ignoring carrier data for numbers that were not requested');
    }

    const result: SyncResult = {
      success: true,
      requested: targets.length,
      synced,
      unchanged,
      errors,
      message: `Synced ${synced} of ${targets.length} packages`
    };

    this.logger.info(
      { requested: targets.length, synced, unchanged: unchanged.length, errors: errors.length },
      result.message
    );
    for (const itemError of errors) {
      this.logger.warn(itemError, 'Sync merge failed');
    }

    return result;
  }

  private async collectTargets(trackingNumber?: string): Promise<string[]> {
    if (trackingNumber !== undefined) {
      const pkg = await this.store.get(trackingNumber);
      return [pkg.trackingNumber];
    }

    const packages = await this.store.list();
    return packages.map(pkg => pkg.trackingNumber);
  }
}
