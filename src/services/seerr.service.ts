/**
 * Seerr API client
 *
 * Read-only access to the Seerr (Overseerr / Jellyseerr) v1 API, used to
 * verify account links, check administrator rights and report request
 * statistics. Every call authenticates with the `X-Api-Key` header.
 */
import {
  type SeerrUser,
  SeerrRequestPageSchema,
  SeerrStatusSchema,
  SeerrUserPageSchema,
  SeerrUserSchema,
  SeerrUserSettingsSchema,
} from '@root/schemas/seerr/seerr.schema.js'
import { SeerrApiError } from '@root/types/errors.js'
import {
  SEERR_ADMIN_PERMISSION,
  SeerrRequestStatus,
  type SeerrRequestStats,
} from '@root/types/seerr.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

export interface SeerrApiOptions {
  /** Base URL without trailing slash, e.g. http://seerr:5055 */
  baseUrl: string
  apiKey: string
  timeoutMs: number
}

const USER_PAGE_SIZE = 100
const REQUEST_PAGE_SIZE = 100

export class SeerrApiService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: SeerrApiOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'SEERR')
  }

  get baseUrl(): string {
    return this.options.baseUrl
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = `${this.options.baseUrl}/api/v1/${path}`
    let response: Response

    try {
      response = await fetch(url, {
        headers: {
          'X-Api-Key': this.options.apiKey,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
    } catch (error) {
      throw new SeerrApiError(`Seerr request to ${path} failed`, null, {
        cause: error,
      })
    }

    if (!response.ok) {
      throw new SeerrApiError(
        `Seerr API error: ${response.status} ${response.statusText} (${path})`,
        response.status,
      )
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new SeerrApiError(
        `Seerr returned invalid JSON (${path})`,
        response.status,
        { cause: error },
      )
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new SeerrApiError(
        `Unexpected Seerr response shape (${path})`,
        response.status,
        { cause: parsed.error },
      )
    }
    return parsed.data
  }

  /**
   * @returns true when the Seerr status endpoint answers
   */
  async testConnection(): Promise<boolean> {
    try {
      const status = await this.request('status', SeerrStatusSchema)
      this.log.debug({ version: status.version }, 'Seerr connection OK')
      return true
    } catch (error) {
      this.log.warn({ error }, 'Seerr connection test failed')
      return false
    }
  }

  /**
   * Fetches every user, following pagination.
   */
  async getUsers(): Promise<SeerrUser[]> {
    const users: SeerrUser[] = []
    let skip = 0

    for (;;) {
      const page = await this.request(
        `user?take=${USER_PAGE_SIZE}&skip=${skip}`,
        SeerrUserPageSchema,
      )
      users.push(...page.results)

      const total = page.pageInfo?.results
      skip += page.results.length
      if (
        page.results.length < USER_PAGE_SIZE ||
        (total !== undefined && skip >= total)
      ) {
        break
      }
    }

    return users
  }

  /**
   * @returns The user, or null when Seerr answers 404
   */
  async getUser(id: number): Promise<SeerrUser | null> {
    try {
      return await this.request(`user/${id}`, SeerrUserSchema)
    } catch (error) {
      if (error instanceof SeerrApiError && error.status === 404) {
        return null
      }
      throw error
    }
  }

  /**
   * Reads the Discord ID a user saved in Seerr, trying the general settings
   * first and the notification settings second.
   */
  async getUserDiscordId(id: number): Promise<string | null> {
    const main = await this.request(
      `user/${id}/settings/main`,
      SeerrUserSettingsSchema,
    )
    if (main.discordId) return main.discordId

    try {
      const notifications = await this.request(
        `user/${id}/settings/notifications`,
        SeerrUserSettingsSchema,
      )
      return notifications.discordId || null
    } catch (error) {
      this.log.debug(
        { error, userId: id },
        'Notification settings unavailable for Seerr user',
      )
      return null
    }
  }

  /**
   * Finds the Seerr user whose saved Discord ID matches. The user list often
   * carries settings inline; users without them are looked up one by one.
   */
  async findUserByDiscordId(discordId: string): Promise<SeerrUser | null> {
    const users = await this.getUsers()

    const inline = users.find((user) => user.settings?.discordId === discordId)
    if (inline) return inline

    for (const user of users) {
      if (user.settings?.discordId) continue
      try {
        if ((await this.getUserDiscordId(user.id)) === discordId) {
          return user
        }
      } catch (error) {
        this.log.debug(
          { error, userId: user.id },
          'Skipping Seerr user whose settings could not be read',
        )
      }
    }

    return null
  }

  /**
   * Case-insensitive match against every name a Seerr user can be known by.
   */
  async findUserByUsername(name: string): Promise<SeerrUser | null> {
    const wanted = name.trim().toLowerCase()
    if (!wanted) return null

    const users = await this.getUsers()
    return (
      users.find((user) =>
        [
          user.username,
          user.plexUsername,
          user.jellyfinUsername,
          user.displayName,
          user.email,
        ].some((candidate) => candidate?.toLowerCase() === wanted),
      ) ?? null
    )
  }

  async getUserRequestStats(id: number): Promise<SeerrRequestStats> {
    const page = await this.request(
      `user/${id}/requests?take=${REQUEST_PAGE_SIZE}&skip=0`,
      SeerrRequestPageSchema,
    )

    const count = (status: number) =>
      page.results.filter((request) => request.status === status).length

    return {
      total: page.pageInfo?.results ?? page.results.length,
      pending: count(SeerrRequestStatus.PENDING),
      approved: count(SeerrRequestStatus.APPROVED),
      declined: count(SeerrRequestStatus.DECLINED),
      failed: count(SeerrRequestStatus.FAILED),
      completed: count(SeerrRequestStatus.COMPLETED),
    }
  }

  /**
   * Seerr's owner account (ID 1) is always an administrator.
   */
  isAdmin(user: SeerrUser): boolean {
    return (
      user.id === 1 ||
      ((user.permissions ?? 0) & SEERR_ADMIN_PERMISSION) ===
        SEERR_ADMIN_PERMISSION
    )
  }

  /**
   * The name shown for a Seerr user, in the order Seerr itself prefers.
   */
  displayName(user: SeerrUser): string {
    return (
      user.displayName ||
      user.username ||
      user.plexUsername ||
      user.jellyfinUsername ||
      user.email ||
      `User-${user.id}`
    )
  }
}
