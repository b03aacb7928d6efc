import { CarrierTrackingInfo } from '../../types/domain.types';

/**
 * Client for the carrier-aggregation API.
 */
export interface ICarrierApiClient {
  /**
   * Fetches status and events for a batch of tracking numbers in one call.
   * Numbers the carrier has nothing for are simply absent from the map.
   * @throws TransportError when the API is unreachable, times out or answers non-2xx
   * @throws DecodeError when the response body is malformed
   */
  query(trackingNumbers: string[]): Promise<Map<string, CarrierTrackingInfo>>;
}
