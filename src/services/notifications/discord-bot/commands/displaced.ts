import type { Link } from '@root/types/link.types.js'

/** One line per link removed by a force-link */
export function describeDisplaced(links: Link[]): string {
  return links
    .map((link) => `${link.seerrUsername} ↔ ${link.discordId}`)
    .join('\n')
}
