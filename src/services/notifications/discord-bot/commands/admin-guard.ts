/**
 * Admin Guard
 *
 * Admin commands are open to any Discord member whose linked Seerr account
 * holds the Seerr admin permission. Rights are read from Seerr on every
 * invocation, so revoking them in Seerr takes effect immediately.
 */

import type { SeerrUser } from '@root/schemas/seerr/seerr.schema.js'
import type { Link } from '@root/types/link.types.js'
import { SEERR_UNAVAILABLE, errorReply } from './replies.js'
import type { CommandContext, CommandReply } from './types.js'

export type AdminCheck =
  | { ok: true; link: Link; seerrUser: SeerrUser }
  | { ok: false; reply: CommandReply }

export async function verifySeerrAdmin(
  ctx: CommandContext,
  discordId: string,
): Promise<AdminCheck> {
  const link = await ctx.db.findByDiscordId(discordId)
  if (!link) {
    return {
      ok: false,
      reply: errorReply(
        'Not Authorized',
        'Admin commands require a linked Seerr administrator account. Run /link-account first.',
      ),
    }
  }

  let seerrUser: SeerrUser | null
  try {
    seerrUser =
      link.seerrUserId !== null
        ? await ctx.seerr.getUser(link.seerrUserId)
        : await ctx.seerr.findUserByUsername(link.seerrUsername)
  } catch (error) {
    ctx.log.warn(
      { error, discordId },
      'Could not verify admin permissions with Seerr',
    )
    return { ok: false, reply: SEERR_UNAVAILABLE }
  }

  if (!seerrUser || !ctx.seerr.isAdmin(seerrUser)) {
    ctx.log.warn(
      { discordId, seerrUsername: link.seerrUsername },
      'Admin command refused',
    )
    return {
      ok: false,
      reply: errorReply(
        'Not Authorized',
        `Seerr user **${link.seerrUsername}** does not have admin permissions.`,
      ),
    }
  }

  return { ok: true, link, seerrUser }
}
