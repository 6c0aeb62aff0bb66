import { afterEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_FORMAT } from '../access-log'
import { envToConfig, readEnv } from '../config'

describe('envToConfig', () => {
  it('applies defaults', () => {
    expect(envToConfig({})).toEqual({
      service: { port: 2590 },
      accessLog: { format: DEFAULT_FORMAT, exclude: [], excludeRegex: [] },
      logging: { level: 'info' },
    })
  })

  it('uses provided values', () => {
    const cfg = envToConfig({
      port: 8080,
      format: '%s %b',
      exclude: ['/health', ' /ready ', ''],
      excludeRegex: ['^/static/'],
      logLevel: 'DEBUG',
    })

    expect(cfg.service.port).toBe(8080)
    expect(cfg.accessLog).toEqual({
      format: '%s %b',
      exclude: ['/health', '/ready'],
      excludeRegex: ['^/static/'],
    })
    expect(cfg.logging.level).toBe('debug')
  })

  it('accepts warn as an alias for warning', () => {
    expect(envToConfig({ logLevel: 'warn' }).logging.level).toBe('warning')
  })

  it('rejects unknown log levels', () => {
    expect(() => envToConfig({ logLevel: 'verbose' })).toThrow(
      'Invalid LOG_LEVEL: verbose',
    )
  })
})

describe('readEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('reads the service variables', () => {
    vi.stubEnv('ACCLOG_PORT', '3000')
    vi.stubEnv('ACCLOG_FORMAT', '%r')
    vi.stubEnv('ACCLOG_EXCLUDE', '/health,/ready')
    vi.stubEnv('ACCLOG_EXCLUDE_REGEX', '^/static/')
    vi.stubEnv('LOG_LEVEL', 'error')

    const cfg = envToConfig(readEnv())

    expect(cfg).toEqual({
      service: { port: 3000 },
      accessLog: {
        format: '%r',
        exclude: ['/health', '/ready'],
        excludeRegex: ['^/static/'],
      },
      logging: { level: 'error' },
    })
  })

  it('splits exclusion patterns on whitespace so they may contain commas', () => {
    vi.stubEnv('ACCLOG_EXCLUDE_REGEX', ' ^/v\\d{1,3}/  ^/static/\n^/(a|b),c ')

    const cfg = envToConfig(readEnv())

    expect(cfg.accessLog.excludeRegex).toEqual([
      '^/v\\d{1,3}/',
      '^/static/',
      '^/(a|b),c',
    ])
  })
})
