import type { NotificationEventType } from '@root/types/notification.types.js'

export interface WebhookEventCreate {
  eventType: NotificationEventType
  rawType: string
  seerrUsername: string | null
  payload: Record<string, unknown>
}

export interface WebhookEventRecord {
  id: number
  eventType: string
  rawType: string
  seerrUsername: string | null
  processed: boolean
  sentDm: boolean
  sentChannel: boolean
  recipient: string | null
  createdAt: string
  processedAt: string | null
}

export interface WebhookEventCounts {
  total: number
  processed: number
  sentDm: number
  sentChannel: number
}
