import type {
  ForceLinkResult,
  Link,
  LinkConflict,
  LinkOrigin,
} from '@root/types/link.types.js'

declare module '@services/database.service.js' {
  interface DatabaseService {
    // LINKS
    /**
     * Creates a link, or returns the existing one when the same pair is
     * already linked
     * @throws LinkConflictError when either side is linked to someone else
     */
    upsertLink(
      discordId: string,
      seerrUsername: string,
      linkedBy: LinkOrigin,
      seerrUserId?: number | null,
    ): Promise<Link>

    /**
     * Replaces every link held by either side with the given pair, in one
     * transaction
     */
    forceLink(
      discordId: string,
      seerrUsername: string,
      seerrUserId?: number | null,
    ): Promise<ForceLinkResult>

    /** @returns true when at least one link was removed */
    removeLink(discordId: string): Promise<boolean>

    findByDiscordId(discordId: string): Promise<Link | null>

    /** Case-insensitive match on the Seerr username */
    findBySeerrUsername(seerrUsername: string): Promise<Link | null>

    /** Newest first */
    listLinks(limit?: number): Promise<Link[]>

    countLinks(): Promise<number>

    /**
     * Lists every link whose Discord ID or Seerr username is shared with
     * another row
     */
    findConflicts(): Promise<LinkConflict[]>
  }
}
