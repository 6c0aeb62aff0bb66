import { logger } from '../logger'
import type { FormatSlot, ResolvedFormat } from './format'
import { requestLine } from './request-info'
import type { EnvLookup, RequestInfo, ResponseInfo } from './types'

const SENTINEL = '-'

/**
 * Collapse every unit that depends only on the request. Runs before the
 * inner stage is called, so nothing here may hold on to `req`.
 */
export function resolveRequest(
  line: ResolvedFormat,
  startedAt: number,
  req: RequestInfo,
  env: EnvLookup,
): void {
  for (const slot of line) {
    const value = requestValue(slot, startedAt, req, env)
    if (value !== undefined) {
      slot.value = value
    }
  }
}

function requestValue(
  slot: FormatSlot,
  startedAt: number,
  req: RequestInfo,
  env: EnvLookup,
): string | undefined {
  const text = slot.text
  switch (text.type) {
    case 'request-line':
      return requestLine(req)
    case 'url-path':
      return req.path
    case 'request-time':
      return formatRequestTime(startedAt)
    case 'remote-addr':
      return req.peerAddr() ?? SENTINEL
    case 'real-ip-remote-addr':
      return req.realIpRemoteAddr() ?? SENTINEL
    case 'request-header':
      return req.header(text.name) ?? SENTINEL
    case 'environ':
      return env(text.name) ?? SENTINEL
    case 'custom-request': {
      if (!text.fn) return SENTINEL
      try {
        return text.fn(req)
      } catch (err) {
        logger.warn('custom request replacement {label} failed: {err}', {
          label: text.label,
          err,
        })
        return SENTINEL
      }
    }
    default:
      return undefined
  }
}

/**
 * Collapse status and response headers. Headers are read now because later
 * stages may still change them.
 */
export function resolveResponse(line: ResolvedFormat, res: ResponseInfo): void {
  for (const slot of line) {
    if (slot.value !== undefined) continue
    const text = slot.text
    if (text.type === 'response-status') {
      slot.value = String(res.status)
    } else if (text.type === 'response-header') {
      slot.value = res.header(text.name) ?? SENTINEL
    }
  }
}

/** `YYYY-MM-DDTHH:MM:SS` in UTC. */
export function formatRequestTime(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19)
}
