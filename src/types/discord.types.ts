export interface DiscordEmbed {
  title?: string
  description?: string
  url?: string
  color?: number
  timestamp?: string
  footer?: {
    text: string
    icon_url?: string
  }
  thumbnail?: {
    url: string
  }
  image?: {
    url: string
  }
  author?: {
    name: string
    icon_url?: string
  }
  fields?: EmbedField[]
}

export interface EmbedField {
  name: string
  value: string
  inline?: boolean
}

/** Link button rendered under a notification */
export interface LinkButton {
  label: string
  url: string
}

/**
 * Platform-neutral message produced by the formatter and sent by the
 * dispatcher, either by DM or to the notification channel.
 */
export interface RenderedMessage {
  title: string
  description: string
  color: number
  imageUrl: string | null
  author: { name: string; iconUrl: string | null } | null
  fields: EmbedField[]
  buttons: LinkButton[]
  timestamp: string
}

/**
 * Outbound side of the Discord client as the dispatcher sees it.
 */
export interface DiscordMessenger {
  sendDirectMessage(discordId: string, message: RenderedMessage): Promise<void>
  sendChannelMessage(channelId: string, message: RenderedMessage): Promise<void>
}

export interface DeliveryOutcome {
  dmSent: boolean
  /** A channel post was attempted, because no DM was possible or it failed */
  channelFallbackUsed: boolean
  channelSent: boolean
  recipient: string | null
}
