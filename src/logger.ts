import { defaultTextFormatter, getLogger } from '@logtape/logtape'
import type { TextFormatter } from '@logtape/logtape'

export const logger = getLogger(['acclog'])

/** Category access lines are emitted under. */
export const accessLogger = getLogger(['acclog', 'access'])

/**
 * Console formatter that prints access lines as-is and everything else with
 * logtape's default text layout.
 */
export const accessLineFormatter: TextFormatter = (record) => {
  const line = record.properties.line
  if (
    record.category.join('.') === 'acclog.access' &&
    typeof line === 'string'
  ) {
    return `${line}\n`
  }
  return defaultTextFormatter(record)
}
