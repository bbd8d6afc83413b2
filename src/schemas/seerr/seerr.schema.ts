import { z } from 'zod'

const PageInfoSchema = z
  .object({
    pages: z.number(),
    page: z.number(),
    results: z.number(),
    pageSize: z.number(),
  })
  .partial()

export const SeerrUserSchema = z
  .object({
    id: z.number(),
    email: z.string().nullish(),
    username: z.string().nullish(),
    plexUsername: z.string().nullish(),
    jellyfinUsername: z.string().nullish(),
    displayName: z.string().nullish(),
    permissions: z.number().nullish(),
    avatar: z.string().nullish(),
    requestCount: z.number().nullish(),
    settings: z
      .object({
        discordId: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough()

export const SeerrUserPageSchema = z.object({
  pageInfo: PageInfoSchema.optional(),
  results: z.array(SeerrUserSchema),
})

// Both settings/main and settings/notifications carry discordId depending
// on the Seerr fork and version
export const SeerrUserSettingsSchema = z
  .object({
    discordId: z.string().nullish(),
  })
  .passthrough()

export const SeerrRequestPageSchema = z.object({
  pageInfo: PageInfoSchema.optional(),
  results: z.array(
    z
      .object({
        id: z.number(),
        status: z.number(),
      })
      .passthrough(),
  ),
})

export const SeerrStatusSchema = z
  .object({
    version: z.string().optional(),
  })
  .passthrough()

export type SeerrUser = z.infer<typeof SeerrUserSchema>
export type SeerrUserPage = z.infer<typeof SeerrUserPageSchema>
export type SeerrUserSettings = z.infer<typeof SeerrUserSettingsSchema>
export type SeerrRequestPage = z.infer<typeof SeerrRequestPageSchema>
