import { SyncResult } from '../types/result.types';

export interface ISyncService {
  /**
   * Reconciles one package, or every tracked package when no number is given,
   * against the carrier in a single batched request.
   * @throws NotFoundError when a given number is not tracked
   * @throws TransportError | DecodeError when the carrier call fails; nothing is written
   */
  sync(trackingNumber?: string): Promise<SyncResult>;
}
