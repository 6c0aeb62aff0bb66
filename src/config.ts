import { envInt, envList, envStr } from '@atproto/common'
import { DEFAULT_FORMAT } from './access-log'

export function readEnv() {
  return {
    port: envInt('ACCLOG_PORT'),
    format: envStr('ACCLOG_FORMAT'),
    exclude: envList('ACCLOG_EXCLUDE'),
    // whitespace-separated; commas are part of the patterns
    excludeRegex: envStr('ACCLOG_EXCLUDE_REGEX')?.split(/\s+/),
    logLevel: envStr('LOG_LEVEL'),
  }
}

export type ServerEnvironment = Partial<ReturnType<typeof readEnv>>

export type LogLevel = 'trace' | 'debug' | 'info' | 'warning' | 'error'

export interface AccessLogServiceConfig {
  service: {
    port: number
  }
  accessLog: {
    format: string
    /** Exact request paths that are never logged */
    exclude: string[]
    /** Path patterns that are never logged; whitespace-separated in env */
    excludeRegex: string[]
  }
  logging: {
    level: LogLevel
  }
}

export function envToConfig(env: ServerEnvironment): AccessLogServiceConfig {
  return {
    service: {
      port: env.port ?? 2590,
    },
    accessLog: {
      format: env.format || DEFAULT_FORMAT,
      exclude: cleanList(env.exclude),
      excludeRegex: cleanList(env.excludeRegex),
    },
    logging: {
      level: parseLogLevel(env.logLevel),
    },
  }
}

function cleanList(values: string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v.length > 0)
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase() || 'info'
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'error':
      return level
    case 'warn':
    case 'warning':
      return 'warning'
    default:
      throw new Error(`Invalid LOG_LEVEL: ${value}`)
  }
}
