import type { DeliveryOutcome } from '@root/types/discord.types.js'
import type {
  WebhookEventCounts,
  WebhookEventCreate,
  WebhookEventRecord,
} from '@root/types/webhook.types.js'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // WEBHOOK EVENTS
    /**
     * Records an accepted webhook before it is acknowledged
     * @returns The event ID
     */
    logWebhookEvent(event: WebhookEventCreate): Promise<number>

    markWebhookEventProcessed(
      id: number,
      outcome: DeliveryOutcome,
    ): Promise<void>

    getRecentWebhookEvents(limit?: number): Promise<WebhookEventRecord[]>

    countWebhookEvents(): Promise<WebhookEventCounts>
  }
}
