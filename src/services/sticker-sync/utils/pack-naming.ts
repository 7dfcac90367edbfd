const SHARE_LINK_BASE = 'https://t.me/addstickers/'

/**
 * Collection name owned by a bot: `<packName>_by_<username>`, unless the
 * name already carries a `_by_` suffix
 */
export function makeSetName(packName: string, username: string): string {
  if (packName.includes('_by_')) return packName
  return `${packName}_by_${username}`
}

/**
 * Collection name from a share link: its last path segment
 */
export function collectionNameFromLink(link: string): string {
  const segments = link.trim().replace(/\/+$/, '').split('/')
  return segments[segments.length - 1] ?? ''
}

export function shareLinkFor(name: string): string {
  return `${SHARE_LINK_BASE}${name}`
}
