/**
 * Command Reply Builders
 *
 * Pure functions producing the ephemeral embeds commands answer with.
 */

import type { EmbedField } from '@root/types/discord.types.js'
import type { CommandReply } from './types.js'

export const REPLY_COLORS = {
  success: 0x2ecc71,
  error: 0xe74c3c,
  info: 0x3498db,
  warning: 0xf1c40f,
} as const

export type ReplyTone = keyof typeof REPLY_COLORS

const FIELD_VALUE_LIMIT = 1024

/**
 * Embed field with the value clamped to Discord's limit
 */
export function field(name: string, value: string, inline = false): EmbedField {
  const text = value.trim() || '-'
  return {
    name,
    value:
      text.length > FIELD_VALUE_LIMIT
        ? `${text.slice(0, FIELD_VALUE_LIMIT - 3)}...`
        : text,
    inline,
  }
}

export function reply(
  tone: ReplyTone,
  title: string,
  description: string,
  fields: EmbedField[] = [],
  footer?: string,
): CommandReply {
  return {
    embeds: [
      {
        title,
        description,
        color: REPLY_COLORS[tone],
        ...(fields.length > 0 ? { fields } : {}),
        ...(footer ? { footer: { text: footer } } : {}),
      },
    ],
  }
}

export const successReply = (
  title: string,
  description: string,
  fields?: EmbedField[],
  footer?: string,
) => reply('success', title, description, fields, footer)

export const errorReply = (title: string, description: string) =>
  reply('error', title, description)

export const infoReply = (
  title: string,
  description: string,
  fields?: EmbedField[],
  footer?: string,
) => reply('info', title, description, fields, footer)

export const SEERR_UNAVAILABLE = errorReply(
  'Seerr Unavailable',
  'Could not reach Seerr. Please try again later.',
)

const SNOWFLAKE = /^\d{17,}$/

/** Discord IDs are numeric snowflakes of at least 17 digits */
export function isDiscordId(value: string): boolean {
  return SNOWFLAKE.test(value)
}

export function invalidDiscordIdReply(value: string): CommandReply {
  return errorReply(
    'Invalid Discord ID',
    `\`${value}\` is not a Discord ID. Use the numeric ID from "Copy User ID" (17 digits or more).`,
  )
}
