import { describe, it, expect } from 'vitest'
import {
  formatPeerAddr,
  headerValue,
  realIpRemoteAddr,
  requestLine,
} from '../request-info'

function headers(values: Record<string, string>) {
  return (name: string) => values[name.toLowerCase()]
}

describe('headerValue', () => {
  it('returns plain string values', () => {
    expect(headerValue('text/plain')).toBe('text/plain')
  })

  it('returns the first of multiple values', () => {
    expect(headerValue(['a=1', 'b=2'])).toBe('a=1')
  })

  it('stringifies numeric values', () => {
    expect(headerValue(42)).toBe('42')
  })

  it('returns undefined for absent values', () => {
    expect(headerValue(undefined)).toBeUndefined()
    expect(headerValue([])).toBeUndefined()
  })

  it('rejects values outside visible ASCII', () => {
    expect(headerValue('café')).toBeUndefined()
    expect(headerValue('line\nbreak')).toBeUndefined()
  })

  it('allows tabs', () => {
    expect(headerValue('a\tb')).toBe('a\tb')
  })

  it('rejects values that are not header values', () => {
    expect(headerValue(Object.prototype.toString)).toBeUndefined()
    expect(headerValue({})).toBeUndefined()
    expect(headerValue([Object])).toBeUndefined()
  })
})

describe('formatPeerAddr', () => {
  it('joins IPv4 addresses and ports', () => {
    expect(formatPeerAddr('127.0.0.1', 8081)).toBe('127.0.0.1:8081')
  })

  it('brackets IPv6 addresses', () => {
    expect(formatPeerAddr('::1', 5000)).toBe('[::1]:5000')
  })

  it('returns the address alone without a port', () => {
    expect(formatPeerAddr('10.1.2.3', undefined)).toBe('10.1.2.3')
  })

  it('returns undefined without an address', () => {
    expect(formatPeerAddr(undefined, 80)).toBeUndefined()
  })
})

describe('realIpRemoteAddr', () => {
  it('prefers the Forwarded for parameter', () => {
    const header = headers({
      forwarded: 'for=192.0.2.60;proto=http;by=203.0.113.43',
      'x-forwarded-for': '198.51.100.1',
    })

    expect(realIpRemoteAddr(header, '10.0.0.1:1')).toBe('192.0.2.60')
  })

  it('uses the first Forwarded element and strips quotes', () => {
    const header = headers({
      forwarded: 'proto=https; For="[2001:db8:cafe::17]:4711", for=198.51.100.2',
    })

    expect(realIpRemoteAddr(header, undefined)).toBe('[2001:db8:cafe::17]:4711')
  })

  it('falls back to the first X-Forwarded-For entry', () => {
    const header = headers({
      forwarded: 'proto=https',
      'x-forwarded-for': ' 203.0.113.7 , 10.0.0.1',
    })

    expect(realIpRemoteAddr(header, '10.0.0.1:1')).toBe('203.0.113.7')
  })

  it('falls back to the peer address', () => {
    expect(realIpRemoteAddr(headers({}), '10.0.0.1:1')).toBe('10.0.0.1:1')
    expect(realIpRemoteAddr(headers({}), undefined)).toBeUndefined()
  })
})

describe('requestLine', () => {
  it('appends the query only when present', () => {
    const req = { method: 'GET', path: '/a', query: '', version: 'HTTP/1.0' }

    expect(requestLine(req)).toBe('GET /a HTTP/1.0')
    expect(requestLine({ ...req, query: 'b=1' })).toBe('GET /a?b=1 HTTP/1.0')
  })
})
