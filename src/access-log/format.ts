import { logger } from '../logger'
import type { CustomRequestFn } from './types'

export const DEFAULT_FORMAT = '%a "%r" %s %b "%{Referer}i" "%{User-Agent}i" %T'

const DIRECTIVE = /%(?:\{([A-Za-z0-9_-]+)\}(xi|[aioe])|([%atrsbUTD]))/g

/**
 * One unit of a compiled format.
 *
 * Everything is immutable except the callback of a `custom-request` unit,
 * which the access log rebinds while it is being configured. Per-request
 * copies hold these objects by reference so a callback is never copied.
 */
export type FormatText =
  | { readonly type: 'str'; readonly value: string }
  | { readonly type: 'percent' }
  | { readonly type: 'remote-addr' }
  | { readonly type: 'real-ip-remote-addr' }
  | { readonly type: 'request-line' }
  | { readonly type: 'request-time' }
  | { readonly type: 'response-status' }
  | { readonly type: 'response-size' }
  | { readonly type: 'time' }
  | { readonly type: 'time-millis' }
  | { readonly type: 'url-path' }
  | { readonly type: 'request-header'; readonly name: string }
  | { readonly type: 'response-header'; readonly name: string }
  | { readonly type: 'environ'; readonly name: string }
  | CustomRequest

export interface CustomRequest {
  readonly type: 'custom-request'
  readonly label: string
  fn?: CustomRequestFn
}

/** A unit paired with the string it collapsed to, once known. */
export interface FormatSlot {
  readonly text: FormatText
  value?: string
}

export type ResolvedFormat = FormatSlot[]

const SINGLE: Record<string, FormatText> = {
  '%': { type: 'percent' },
  a: { type: 'remote-addr' },
  t: { type: 'request-time' },
  r: { type: 'request-line' },
  s: { type: 'response-status' },
  b: { type: 'response-size' },
  U: { type: 'url-path' },
  T: { type: 'time' },
  D: { type: 'time-millis' },
}

export class Format {
  readonly units: readonly FormatText[]

  constructor(units: readonly FormatText[]) {
    this.units = units
  }

  /**
   * Compile a format string. Never fails: anything that is not a recognized
   * directive is kept as literal text.
   */
  static parse(format: string): Format {
    logger.trace('access log format: {format}', { format })

    const units: FormatText[] = []
    let literal = ''
    let idx = 0

    for (const match of format.matchAll(DIRECTIVE)) {
      const pos = match.index ?? 0
      literal += format.slice(idx, pos)
      idx = pos + match[0].length

      const unit = toFormatText(match[0], match[1], match[2], match[3])
      if (unit.type === 'str') {
        literal += unit.value
        continue
      }
      if (literal) {
        units.push({ type: 'str', value: literal })
        literal = ''
      }
      units.push(unit)
    }

    literal += format.slice(idx)
    if (literal) {
      units.push({ type: 'str', value: literal })
    }

    return new Format(units)
  }

  /** Fresh per-request copy with every slot still pending. */
  bind(): ResolvedFormat {
    return this.units.map((text) => ({ text }))
  }

  customRequests(label?: string): CustomRequest[] {
    const found: CustomRequest[] = []
    for (const unit of this.units) {
      if (
        unit.type === 'custom-request' &&
        (label === undefined || unit.label === label)
      ) {
        found.push(unit)
      }
    }
    return found
  }

  unboundLabels(): string[] {
    const labels = new Set<string>()
    for (const unit of this.customRequests()) {
      if (!unit.fn) labels.add(unit.label)
    }
    return [...labels]
  }
}

function toFormatText(
  raw: string,
  key: string | undefined,
  kind: string | undefined,
  single: string | undefined,
): FormatText {
  if (key !== undefined) {
    switch (kind) {
      case 'i':
        return { type: 'request-header', name: key }
      case 'o':
        return { type: 'response-header', name: key }
      case 'e':
        return { type: 'environ', name: key }
      case 'xi':
        return { type: 'custom-request', label: key }
      case 'a':
        if (key === 'r') return { type: 'real-ip-remote-addr' }
        logger.debug('reserved directive {directive} kept as literal text', {
          directive: raw,
        })
        return { type: 'str', value: raw }
    }
  }
  const unit = single !== undefined ? SINGLE[single] : undefined
  return unit ?? { type: 'str', value: raw }
}

export function compileFormat(format: string): Format {
  return Format.parse(format)
}
