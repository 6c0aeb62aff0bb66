import { isIPv6 } from 'node:net'

/**
 * Normalize a Node header value to a single string. Multi-valued headers
 * yield their first value. Anything other than a string, number or string
 * array, and values with bytes outside visible ASCII (tab allowed), are
 * treated as unreadable.
 */
export function headerValue(raw: unknown): string | undefined {
  const value: unknown = Array.isArray(raw) ? raw[0] : raw
  if (typeof value !== 'string' && typeof value !== 'number') return undefined
  const str = String(value)
  return isVisibleAscii(str) ? str : undefined
}

function isVisibleAscii(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i)
    if (code !== 0x09 && (code < 0x20 || code > 0x7e)) {
      return false
    }
  }
  return true
}

export function formatPeerAddr(
  address: string | undefined,
  port: number | undefined,
): string | undefined {
  if (!address) return undefined
  if (port === undefined) return address
  return isIPv6(address) ? `[${address}]:${port}` : `${address}:${port}`
}

/**
 * Derive the client address from proxy headers, falling back to the peer.
 *
 * Order: the `for` parameter of the first `Forwarded` element, then the
 * first `X-Forwarded-For` entry. Both are client-controlled, so only trust
 * the result behind a proxy that rewrites them.
 */
export function realIpRemoteAddr(
  header: (name: string) => string | undefined,
  peer: string | undefined,
): string | undefined {
  const forwarded = header('forwarded')
  if (forwarded) {
    const forwardedFor = parseForwardedFor(forwarded)
    if (forwardedFor) return forwardedFor
  }

  const xForwardedFor = header('x-forwarded-for')
  if (xForwardedFor) {
    const first = xForwardedFor.split(',')[0].trim()
    if (first) return first
  }

  return peer
}

function parseForwardedFor(forwarded: string): string | undefined {
  const first = forwarded.split(',')[0]
  for (const pair of first.split(';')) {
    const eq = pair.indexOf('=')
    if (eq === -1) continue
    const name = pair.slice(0, eq).trim().toLowerCase()
    if (name !== 'for') continue
    const value = pair
      .slice(eq + 1)
      .trim()
      .replace(/^"(.*)"$/, '$1')
    return value || undefined
  }
  return undefined
}

/** The request line as it appears in the access log. */
export function requestLine(req: {
  method: string
  path: string
  query: string
  version: string
}): string {
  const target = req.query ? `${req.path}?${req.query}` : req.path
  return `${req.method} ${target} ${req.version}`
}
