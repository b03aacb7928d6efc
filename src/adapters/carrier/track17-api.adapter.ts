import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { CarrierBatchResponse, CarrierBatchResponseSchema } from '../../types/carrier.types';
import { CarrierTrackingInfo } from '../../types/domain.types';
import { DecodeError, formatIssues, TransportError } from '../../types/error.types';
import { normalizeEvent } from '../../utils/event.util';
import { Logger } from '../../utils/logger';
import { isHttpRetryable, RetryExhaustedError, retryWithBackoff } from '../../utils/retry.util';
import { normalizeStatus } from '../../utils/status.util';
import { ICarrierApiClient } from './carrier-client.interface';

@injectable()
export class Track17ApiAdapter implements ICarrierApiClient {
  private readonly logger: Logger;

  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('Logger') logger: Logger
  ) {
    this.logger = logger.child({ component: 'track17-api' });
  }

  async query(trackingNumbers: string[]): Promise<Map<string, CarrierTrackingInfo>> {
    if (trackingNumbers.length === 0) {
      return new Map();
    }

    if (!this.config.carrier.apiKey) {
      throw new TransportError('Carrier API key is not configured (TRACK17_API_KEY)', false);
    }

    let response: CarrierBatchResponse;
    try {
      response = await retryWithBackoff(
        () => this.fetchPackageInfo(trackingNumbers),
        this.config.retry,
        {
          isRetryable: error => error instanceof TransportError && error.retryable,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn({ attempt, delayMs: Math.round(delayMs), error: error.message }, 'Retrying carrier request')
        }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new TransportError(
          `Carrier request failed after ${error.attempts} attempts: ${error.lastError.message}`,
          false,
          error.lastError instanceof TransportError ? error.lastError.statusCode : undefined,
          { cause: error.lastError }
        );
      }
      throw error;
    }

    if (response.error) {
      throw new TransportError(`Carrier API error: ${response.error}`, false);
    }

    return this.mapResponse(response);
  }

  private async fetchPackageInfo(trackingNumbers: string[]): Promise<CarrierBatchResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.config.carrier.apiUrl}/getpackageinfo`, {
        method: 'POST',
        headers: {
          APIKey: this.config.carrier.apiKey,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ number: trackingNumbers }),
        signal: AbortSignal.timeout(this.config.carrier.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      // Network failures and timeouts are retryable
      throw new TransportError(`Carrier request failed: ${reason}`, true, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new TransportError(
        `HTTP ${response.status}: ${response.statusText}`,
        isHttpRetryable(response.status),
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      // The timeout signal also covers reading the body
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TransportError(`Carrier response timed out: ${reason}`, true, undefined, { cause: error });
      }
      throw new DecodeError(`Carrier response is not valid JSON: ${reason}`);
    }

    const parsed = CarrierBatchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError('Carrier response failed validation', formatIssues(parsed.error.issues));
    }
    return parsed.data;
  }

  private mapResponse(response: CarrierBatchResponse): Map<string, CarrierTrackingInfo> {
    const result = new Map<string, CarrierTrackingInfo>();

    for (const [trackingNumber, info] of Object.entries(response.data ?? {})) {
      result.set(trackingNumber, {
        status: normalizeStatus(info.status),
        events: (info.events ?? []).map(normalizeEvent)
      });
    }

    return result;
  }
}
