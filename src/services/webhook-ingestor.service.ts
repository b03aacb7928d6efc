import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { IPackageStore } from '../store/package-store.interface';
import { CarrierEventSchema } from '../types/carrier.types';
import { formatIssues, NotFoundError } from '../types/error.types';
import { WebhookResult } from '../types/result.types';
import { normalizeEvent } from '../utils/event.util';
import { Logger } from '../utils/logger';
import { normalizeStatus } from '../utils/status.util';
import { IWebhookIngestor } from './webhook-ingestor.interface';

// Accepts both camelCase and snake_case tracking number fields
const WebhookPayloadSchema = z
  .object({
    trackingNumber: z.string().trim().min(1).optional(),
    tracking_number: z.string().trim().min(1).optional(),
    status: z.string().trim().min(1, 'status is required'),
    events: z.array(CarrierEventSchema).nullish()
  })
  .transform((payload, ctx) => {
    const trackingNumber = payload.trackingNumber ?? payload.tracking_number;
    if (!trackingNumber) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['trackingNumber'],
        message: 'trackingNumber is required'
      });
      return z.NEVER;
    }
    return {
      trackingNumber,
      status: payload.status,
      events: payload.events ?? []
    };
  });

@injectable()
export class WebhookIngestorService implements IWebhookIngestor {
  private readonly logger: Logger;

  constructor(
    @inject('IPackageStore') private readonly store: IPackageStore,
    @inject('Logger') logger: Logger
  ) {
    this.logger = logger.child({ component: 'webhook' });
  }

  async handleWebhook(payload: unknown): Promise<WebhookResult> {
    const parsed = WebhookPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ issues: formatIssues(parsed.error.issues) }, 'Rejected malformed webhook payload');
      return { success: true, trackingNumber: null, applied: false };
    }

    const { trackingNumber, status, events } = parsed.data;

    try {
      const merge = await this.store.mergeUpdate(
        trackingNumber,
        normalizeStatus(status),
        events.map(normalizeEvent)
      );
      this.logger.info(
        { trackingNumber, status: merge.status, eventsAdded: merge.eventsAdded },
        'Applied webhook update'
      );
      return { success: true, trackingNumber, applied: true };
    } catch (error) {
      if (error instanceof NotFoundError) {
        // Never create packages implicitly from a push
        this.logger.info({ trackingNumber }, 'Ignored webhook for untracked package');
      } else {
        this.logger.error({ trackingNumber, err: error }, 'Failed to apply webhook update');
      }
      return { success: true, trackingNumber, applied: false };
    }
  }
}
