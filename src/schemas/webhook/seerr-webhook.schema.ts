import { z } from 'zod'

/**
 * A templated Seerr value. Unfilled template variables arrive as empty
 * strings, and numbers or booleans appear when an operator removes the
 * quotes from the template. Anything unusable becomes undefined.
 */
const TemplatedValue = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => {
    if (value == null) return undefined
    const text = String(value).trim()
    return text === '' ? undefined : text
  })
  .catch(undefined)

const ExtraSchema = z
  .array(
    z
      .object({
        name: TemplatedValue,
        value: TemplatedValue,
      })
      .catch({ name: undefined, value: undefined }),
  )
  .nullish()
  .transform((items) =>
    (items ?? []).flatMap((item) =>
      item.name ? [{ name: item.name, value: item.value ?? '' }] : [],
    ),
  )
  .catch([])

export const SeerrWebhookPayloadSchema = z.object({
  notification_type: TemplatedValue,
  event: TemplatedValue,
  subject: TemplatedValue,
  message: TemplatedValue,
  image: TemplatedValue,

  notifyuser_username: TemplatedValue,
  notifyuser_email: TemplatedValue,
  notifyuser_avatar: TemplatedValue,
  notifyuser_settings_discordId: TemplatedValue,

  media_type: TemplatedValue,
  media_tmdbid: TemplatedValue,
  media_tvdbid: TemplatedValue,
  media_status: TemplatedValue,
  media_status4k: TemplatedValue,

  request_id: TemplatedValue,
  requestedBy_username: TemplatedValue,
  requestedBy_email: TemplatedValue,
  requestedBy_avatar: TemplatedValue,
  requestedBy_settings_discordId: TemplatedValue,

  issue_id: TemplatedValue,
  issue_type: TemplatedValue,
  issue_status: TemplatedValue,
  reportedBy_username: TemplatedValue,
  reportedBy_email: TemplatedValue,
  reportedBy_avatar: TemplatedValue,
  reportedBy_settings_discordId: TemplatedValue,

  comment_message: TemplatedValue,
  commentedBy_username: TemplatedValue,
  commentedBy_email: TemplatedValue,
  commentedBy_avatar: TemplatedValue,
  commentedBy_settings_discordId: TemplatedValue,

  extra: ExtraSchema,
})

export type SeerrWebhookPayload = z.infer<typeof SeerrWebhookPayloadSchema>

export const WebhookAcceptedResponseSchema = z.object({
  status: z.literal('success'),
  eventId: z.number(),
})

export type WebhookAcceptedResponse = z.infer<
  typeof WebhookAcceptedResponseSchema
>
