import { WebhookResult } from '../types/result.types';

export interface IWebhookIngestor {
  /**
   * Applies a carrier push notification. Never throws: malformed payloads,
   * untracked numbers and store failures are logged and acknowledged.
   */
  handleWebhook(payload: unknown): Promise<WebhookResult>;
}
