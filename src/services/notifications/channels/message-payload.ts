import type {
  DiscordEmbed,
  RenderedMessage,
} from '@root/types/discord.types.js'
import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js'

export interface DiscordMessagePayload {
  embeds: DiscordEmbed[]
  components: ActionRowBuilder<ButtonBuilder>[]
}

// Discord allows five buttons per action row
const BUTTONS_PER_ROW = 5

export function toDiscordEmbed(message: RenderedMessage): DiscordEmbed {
  const embed: DiscordEmbed = {
    title: message.title,
    description: message.description || undefined,
    color: message.color,
    timestamp: message.timestamp,
    fields: message.fields,
    footer: { text: 'Seerr' },
  }

  if (message.imageUrl) {
    embed.thumbnail = { url: message.imageUrl }
  }

  if (message.author) {
    embed.author = {
      name: message.author.name,
      icon_url: message.author.iconUrl ?? undefined,
    }
  }

  return embed
}

/**
 * Embed plus link buttons, in the shape both `user.send` and
 * `channel.send` accept.
 */
export function buildMessagePayload(
  message: RenderedMessage,
): DiscordMessagePayload {
  const components: ActionRowBuilder<ButtonBuilder>[] = []

  for (let i = 0; i < message.buttons.length; i += BUTTONS_PER_ROW) {
    const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
      message.buttons
        .slice(i, i + BUTTONS_PER_ROW)
        .map((button) =>
          new ButtonBuilder()
            .setLabel(button.label)
            .setStyle(ButtonStyle.Link)
            .setURL(button.url),
        ),
    )
    components.push(row)
  }

  return { embeds: [toDiscordEmbed(message)], components }
}
