export type LinkOrigin = 'self' | 'admin'

export interface Link {
  id: number
  discordId: string
  seerrUsername: string
  seerrUserId: number | null
  linkedAt: string
  linkedBy: LinkOrigin
}

export interface LinkConflict {
  discordId: string
  seerrUsername: string
  /** Which side of the pair is shared with another link */
  reason: 'duplicate_discord_id' | 'duplicate_seerr_username'
}

export interface ForceLinkResult {
  link: Link
  displaced: Link[]
}
