export type NotificationEventType =
  | 'request-pending'
  | 'request-auto-approved'
  | 'request-approved'
  | 'request-declined'
  | 'request-available'
  | 'request-failed'
  | 'issue-reported'
  | 'issue-comment'
  | 'issue-resolved'
  | 'issue-reopened'
  | 'test'
  | 'generic'

export type NotificationCategory = 'request' | 'issue' | 'test' | 'generic'

/** A Seerr user as referenced by a webhook payload */
export interface SeerrUserRef {
  username?: string
  email?: string
  avatar?: string
  discordId?: string
}

export interface MediaInfo {
  mediaType?: string
  tmdbId?: string
  tvdbId?: string
  status?: string
  status4k?: string
}

export interface ExtraField {
  name: string
  value: string
}

/**
 * A Seerr webhook after authentication and parsing. Every payload-derived
 * field is optional since Seerr's template may omit any of them.
 */
export interface NotificationEvent {
  type: NotificationEventType
  /** notification_type exactly as received, e.g. MEDIA_AVAILABLE */
  rawType: string
  category: NotificationCategory
  /** ISO timestamp of receipt */
  receivedAt: string
  event?: string
  subject?: string
  message?: string
  imageUrl?: string
  notifyUser: SeerrUserRef
  media: MediaInfo
  request: {
    id?: string
    requestedBy: SeerrUserRef
  }
  issue: {
    id?: string
    type?: string
    status?: string
    reportedBy: SeerrUserRef
  }
  comment: {
    message?: string
    commentedBy: SeerrUserRef
  }
  extra: ExtraField[]
}
