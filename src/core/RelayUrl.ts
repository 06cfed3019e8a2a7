/**
 * Relay URL helpers shared by the pool and the configuration layer.
 */

/**
 * Basic URL normalization so that one relay maps to one pool entry:
 * trim, lowercase, default to wss:// and drop trailing slashes.
 */
export const normalizeRelayUrl = (url: string): string => {
  let normalized = url.trim().toLowerCase()

  // Add protocol if missing (default to wss://)
  if (!normalized.startsWith("ws://") && !normalized.startsWith("wss://")) {
    normalized = `wss://${normalized}`
  }

  while (normalized.endsWith("/")) {
    normalized = normalized.slice(0, -1)
  }

  return normalized
}

/**
 * Deduplicate a relay list by normalized URL, keeping first-seen order, and
 * put the local relay (when configured) at the front.
 */
export const prioritizeRelays = (
  urls: ReadonlyArray<string>,
  localRelay?: string
): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const ordered: string[] = []
  const push = (url: string) => {
    const normalized = normalizeRelayUrl(url)
    if (seen.has(normalized)) return
    seen.add(normalized)
    ordered.push(normalized)
  }

  if (localRelay !== undefined && localRelay.trim().length > 0) push(localRelay)
  for (const url of urls) push(url)
  return ordered
}
