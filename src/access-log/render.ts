import type { ResolvedFormat } from './format'

/**
 * Produce the final line. Size and elapsed time are the only values still
 * computed here; a unit that never collapsed contributes nothing.
 */
export function renderLine(
  line: ResolvedFormat,
  size: number,
  elapsedMs: number,
): string {
  let out = ''
  for (const slot of line) {
    if (slot.value !== undefined) {
      out += slot.value
      continue
    }
    const text = slot.text
    switch (text.type) {
      case 'str':
        out += text.value
        break
      case 'percent':
        out += '%'
        break
      case 'response-size':
        out += String(size)
        break
      case 'time':
        out += (elapsedMs / 1000).toFixed(6)
        break
      case 'time-millis':
        out += elapsedMs.toFixed(6)
        break
    }
  }
  return out
}
